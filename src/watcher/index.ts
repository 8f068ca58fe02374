export { FolderWatcher, WatcherFatalError, createFileEvent } from './FolderWatcher.js';
export { AsyncEventQueue } from './AsyncEventQueue.js';
export {
  normalizeExtension,
  parseExtensionList,
  getExtension,
  isMonitoredFile,
} from './extensionFilter.js';
export type { FileEvent, FileEventSource, FolderWatcherConfig } from './types.js';
