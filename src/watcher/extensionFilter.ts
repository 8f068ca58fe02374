/**
 * Extension Filter
 *
 * Decides which detected files are worth a notification.
 */

import path from 'path';
import type { FileEvent } from './types.js';

/**
 * `' .MKV '` -> `'mkv'`
 */
export function normalizeExtension(raw: string): string {
  return raw.trim().replace(/^\.+/, '').toLowerCase();
}

/**
 * Parse a comma-separated allow-list such as `"mkv, .MP4,,avi"`
 */
export function parseExtensionList(raw: string): Set<string> {
  const extensions = new Set<string>();
  for (const entry of raw.split(',')) {
    const extension = normalizeExtension(entry);
    if (extension) {
      extensions.add(extension);
    }
  }
  return extensions;
}

/**
 * Lower-cased suffix after the last dot of the base name.
 * Dot-files (`.env`) and names without a dot have no extension.
 */
export function getExtension(filePath: string): string {
  return path.extname(path.basename(filePath)).slice(1).toLowerCase();
}

export function isMonitoredFile(event: FileEvent, allowList: ReadonlySet<string>): boolean {
  const extension = event.extension.toLowerCase();
  return extension !== '' && allowList.has(extension);
}
