/**
 * Types for Folder Watcher
 */

/**
 * A new file detected in the watched folder
 */
export interface FileEvent {
  /** Absolute path */
  path: string;
  name: string;
  /** Folder containing the file */
  folder: string;
  /** Lower-case, without the leading dot; '' when the name has none */
  extension: string;
  detectedAt: Date;
}

/**
 * Sequential stream of file events, consumed with `for await`
 */
export interface FileEventSource extends AsyncIterable<FileEvent> {
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Configuration for Folder Watcher
 */
export interface FolderWatcherConfig {
  folder: string;
  recursive: boolean;
  stabilityThresholdMs: number;
}
