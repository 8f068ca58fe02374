/**
 * Folder Watcher
 *
 * Subscribes to file creation in one folder and exposes the new files
 * as a sequential stream of FileEvents.
 *
 * Only the first creation of a path is reported: content changes are
 * ignored, and a file must keep the same size for the stability threshold
 * before it is reported. A file removed before that produces no event.
 */

import chokidar, { type FSWatcher, type WatchOptions } from 'chokidar';
import { stat } from 'fs/promises';
import path from 'path';
import { logger } from '../logger.js';
import { AsyncEventQueue } from './AsyncEventQueue.js';
import { getExtension } from './extensionFilter.js';
import type { FileEvent, FileEventSource, FolderWatcherConfig } from './types.js';

const STABILITY_POLL_INTERVAL_MS = 100;

/**
 * The watched folder is gone or can no longer be watched
 */
export class WatcherFatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WatcherFatalError';
  }
}

export function createFileEvent(filePath: string, detectedAt: Date = new Date()): FileEvent {
  const absolutePath = path.resolve(filePath);
  return {
    path: absolutePath,
    name: path.basename(absolutePath),
    folder: path.dirname(absolutePath),
    extension: getExtension(absolutePath),
    detectedAt,
  };
}

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

function getWatchedPath(details: unknown): string | null {
  if (typeof details !== 'object' || details === null || !('watchedPath' in details)) {
    return null;
  }
  return typeof details.watchedPath === 'string' ? path.resolve(details.watchedPath) : null;
}

export class FolderWatcher implements FileEventSource {
  private config: FolderWatcherConfig;
  private folder: string;
  private queue = new AsyncEventQueue<FileEvent>();
  private watcher: FSWatcher | null = null;
  // Serializes path handling so events keep their arrival order
  private pending: Promise<void> = Promise.resolve();
  private stopped = false;
  // Lets stop() release a start() still waiting for 'ready'
  private releaseStart: (() => void) | null = null;

  constructor(config: FolderWatcherConfig) {
    this.config = config;
    this.folder = path.resolve(config.folder);
  }

  /**
   * Options passed to chokidar for this configuration
   */
  public getWatchOptions(): WatchOptions {
    const { recursive, stabilityThresholdMs } = this.config;

    return {
      persistent: true,
      ignoreInitial: true,
      ...(recursive ? {} : { depth: 0 }),
      awaitWriteFinish:
        stabilityThresholdMs > 0
          ? { stabilityThreshold: stabilityThresholdMs, pollInterval: STABILITY_POLL_INTERVAL_MS }
          : false,
    };
  }

  /**
   * Attach to the folder. Resolves once the initial scan is done.
   */
  public async start(): Promise<void> {
    if (this.stopped || this.watcher) return;

    logger.info('Starting Folder Watcher', {
      folder: this.folder,
      recursive: this.config.recursive,
      stabilityThresholdMs: this.config.stabilityThresholdMs,
    });

    const watcher = chokidar.watch(this.folder, this.getWatchOptions());
    this.watcher = watcher;

    await new Promise<void>((resolve) => {
      this.releaseStart = resolve;
      watcher.once('ready', () => resolve());
      this.attachEventHandlers(watcher);
    });
    this.releaseStart = null;

    if (this.stopped) return;
    logger.info('Folder Watcher ready', { folder: this.folder });
  }

  /**
   * Detach from the folder and end the event stream
   */
  public async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    logger.info('Stopping Folder Watcher', { folder: this.folder, pending: this.queue.size });

    const watcher = this.watcher;
    this.watcher = null;
    this.queue.close();
    this.releaseStart?.();

    if (watcher) {
      await watcher.close();
    }
  }

  public [Symbol.asyncIterator](): AsyncIterator<FileEvent> {
    return this.queue[Symbol.asyncIterator]();
  }

  private attachEventHandlers(watcher: FSWatcher): void {
    watcher.on('add', (filePath: string) => {
      this.enqueue(() => this.handleAdd(filePath));
    });

    watcher.on('addDir', (dirPath: string) => {
      logger.debug('Ignoring new directory', { path: dirPath });
    });

    watcher.on('unlinkDir', (dirPath: string) => {
      if (path.resolve(dirPath) === this.folder) {
        this.enqueue(async () => this.fail(`Watched folder was removed: ${this.folder}`));
      }
    });

    // chokidar reports removal of the watched root only as a raw rename
    watcher.on('raw', (_eventName: string, _rawPath: string, details: unknown) => {
      if (getWatchedPath(details) === this.folder) {
        this.enqueue(() => this.checkFolder());
      }
    });

    watcher.on('error', (error: Error) => {
      logger.error('Folder Watcher error', { folder: this.folder, error: error.message });
      this.enqueue(() => this.checkFolder());
    });
  }

  private enqueue(task: () => Promise<void>): void {
    this.pending = this.pending.then(task).catch((error: unknown) => {
      logger.error('Failed to handle watcher event', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  private async handleAdd(filePath: string): Promise<void> {
    const absolutePath = path.resolve(filePath);

    try {
      const stats = await stat(absolutePath);
      if (!stats.isFile()) {
        logger.debug('Ignoring entry that is not a regular file', { path: absolutePath });
        return;
      }
    } catch (error) {
      if (isMissingFileError(error)) {
        logger.debug('File disappeared before processing', { path: absolutePath });
        return;
      }
      throw error;
    }

    logger.debug('New file detected', { path: absolutePath });
    if (!this.queue.push(createFileEvent(absolutePath))) {
      logger.debug('Watcher stopped, dropping file event', { path: absolutePath });
    }
  }

  /**
   * After a backend error or a raw event on the root, keep watching only if
   * the folder is still there
   */
  private async checkFolder(): Promise<void> {
    try {
      const stats = await stat(this.folder);
      if (!stats.isDirectory()) {
        this.fail(`Watched path is no longer a directory: ${this.folder}`);
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.fail(`Watched folder is not accessible: ${reason}`);
    }
  }

  private fail(message: string): void {
    if (this.stopped) return;
    logger.error('Folder Watcher failed', { folder: this.folder, reason: message });
    this.queue.fail(new WatcherFatalError(message));
  }
}
