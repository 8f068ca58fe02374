/**
 * Tests for App
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { App } from '../src/app.js';
import type { Config } from '../src/config.js';
import { logger } from '../src/logger.js';
import { NotificationService } from '../src/notification/NotificationService.js';
import { TelegramClient } from '../src/notification/TelegramClient.js';
import {
  formatCrashMessage,
  formatFileMessage,
  formatShutdownMessage,
  formatStartupMessage,
} from '../src/notification/formatter.js';
import { AsyncEventQueue } from '../src/watcher/AsyncEventQueue.js';
import { WatcherFatalError, createFileEvent } from '../src/watcher/FolderWatcher.js';
import type { FileEvent, FileEventSource } from '../src/watcher/types.js';

// Mock the TelegramClient
vi.mock('../src/notification/TelegramClient.js', () => ({
  TelegramClient: vi.fn(),
}));

class FakeSource implements FileEventSource {
  queue = new AsyncEventQueue<FileEvent>();
  start = vi.fn(async () => {});
  stop = vi.fn(async () => {
    this.queue.close();
  });

  [Symbol.asyncIterator](): AsyncIterator<FileEvent> {
    return this.queue[Symbol.asyncIterator]();
  }
}

function createConfig(lifecycle: boolean): Config {
  return {
    environment: 'dev',
    telegram: { botToken: 'test-token', chatId: '-100123' },
    watch: {
      folder: '/srv/incoming',
      extensions: new Set(['mkv', 'mp4']),
      recursive: false,
      stabilityThresholdMs: 0,
    },
    notifications: { lifecycle },
    logging: { level: 'INFO', folder: '/tmp/log' },
  };
}

describe('App', () => {
  let source: FakeSource;
  let sendMessage: Mock;
  let verifyConnection: Mock;
  let notifications: NotificationService;

  function createApp(lifecycle = false): App {
    return new App(createConfig(lifecycle), { source, notifications });
  }

  beforeEach(() => {
    source = new FakeSource();
    sendMessage = vi.fn().mockResolvedValue(true);
    verifyConnection = vi.fn().mockResolvedValue(true);

    const mockClient: Partial<TelegramClient> = { sendMessage, verifyConnection };
    notifications = new NotificationService(
      { botToken: 'test-token', chatId: '-100123', environment: 'dev' },
      mockClient as TelegramClient
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('run', () => {
    it('should notify only files with monitored extensions', async () => {
      const app = createApp();
      const movie = createFileEvent('/srv/incoming/movie.MKV');
      const clip = createFileEvent('/srv/incoming/clip.mp4');
      source.queue.push(movie);
      source.queue.push(createFileEvent('/srv/incoming/movie.txt'));
      source.queue.push(createFileEvent('/srv/incoming/README'));
      source.queue.push(clip);
      source.queue.close();

      const exitCode = await app.run();

      expect(exitCode).toBe(0);
      expect(sendMessage.mock.calls).toEqual([
        [formatFileMessage(movie, 'dev')],
        [formatFileMessage(clip, 'dev')],
      ]);
      expect(app.getStatus()).toEqual({ state: 'stopped', sent: 2, failed: 0, ignored: 2 });
    });

    it('should attempt a notification if and only if the extension is allowed', async () => {
      const app = createApp();
      const names = ['a.mkv', 'b.MKV', 'c.Mp4', 'd.avi', 'e.mkv.part', 'f'];
      for (const name of names) {
        source.queue.push(createFileEvent(`/srv/incoming/${name}`));
      }
      source.queue.close();

      await app.run();

      expect(sendMessage).toHaveBeenCalledTimes(3);
    });

    it('should keep watching after a delivery failure', async () => {
      const errorSpy = vi.spyOn(logger, 'error');
      sendMessage.mockResolvedValueOnce(false).mockResolvedValueOnce(true);
      const app = createApp();
      source.queue.push(createFileEvent('/srv/incoming/first.mkv'));
      source.queue.push(createFileEvent('/srv/incoming/second.mkv'));
      source.queue.close();

      const exitCode = await app.run();

      expect(exitCode).toBe(0);
      expect(sendMessage).toHaveBeenCalledTimes(2);
      expect(errorSpy).toHaveBeenCalledWith('Failed to send file notification, event dropped', {
        file: '/srv/incoming/first.mkv',
      });
      expect(app.getStatus()).toMatchObject({ sent: 1, failed: 1 });
    });

    it('should keep watching when processing an event throws', async () => {
      const app = createApp();
      vi.spyOn(notifications, 'notifyFile').mockRejectedValueOnce(new Error('boom'));
      source.queue.push(createFileEvent('/srv/incoming/first.mkv'));
      source.queue.push(createFileEvent('/srv/incoming/second.mkv'));
      source.queue.close();

      const exitCode = await app.run();

      expect(exitCode).toBe(0);
      expect(sendMessage).toHaveBeenCalledTimes(1);
    });

    it('should keep running when the token cannot be verified', async () => {
      verifyConnection.mockResolvedValue(false);
      const app = createApp();
      source.queue.push(createFileEvent('/srv/incoming/movie.mkv'));
      source.queue.close();

      await expect(app.run()).resolves.toBe(0);
      expect(sendMessage).toHaveBeenCalledTimes(1);
    });

    it('should exit with 1 when the watcher cannot start', async () => {
      source.start.mockRejectedValue(new Error('EACCES: permission denied'));
      const app = createApp(true);

      const exitCode = await app.run();

      expect(exitCode).toBe(1);
      expect(sendMessage).not.toHaveBeenCalled();
      expect(source.stop).toHaveBeenCalled();
    });

    it('should exit with 1 and report a fatal watcher failure', async () => {
      const app = createApp(true);
      source.queue.fail(new WatcherFatalError('Watched folder was removed: /srv/incoming'));

      const exitCode = await app.run();

      expect(exitCode).toBe(1);
      expect(source.stop).toHaveBeenCalled();
      expect(sendMessage).toHaveBeenLastCalledWith(
        formatCrashMessage('Watched folder was removed: /srv/incoming')
      );
      expect(app.getStatus().state).toBe('stopped');
    });
  });

  describe('stop', () => {
    it('should finish buffered events and send lifecycle messages', async () => {
      const app = createApp(true);
      const movie = createFileEvent('/srv/incoming/movie.mkv');

      const running = app.run();
      await vi.waitFor(() => expect(app.getStatus().state).toBe('running'));
      source.queue.push(movie);
      await app.stop('Received SIGTERM');
      const exitCode = await running;

      expect(exitCode).toBe(0);
      expect(sendMessage.mock.calls).toEqual([
        [
          formatStartupMessage({
            environment: 'dev',
            folder: '/srv/incoming',
            extensions: ['mkv', 'mp4'],
          }),
        ],
        [formatFileMessage(movie, 'dev')],
        [formatShutdownMessage('Received SIGTERM')],
      ]);
    });

    it('should end a run that is still starting', async () => {
      const app = createApp(true);

      const running = app.run();
      await app.stop('Received SIGINT');

      await expect(running).resolves.toBe(0);
      expect(sendMessage).not.toHaveBeenCalled();
    });

    it('should ignore a second stop', async () => {
      const app = createApp();
      source.queue.close();
      await app.run();

      await app.stop();

      expect(source.stop).toHaveBeenCalledTimes(1);
    });
  });
});
