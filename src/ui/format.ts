import fs from 'node:fs';
import path from 'node:path';
import type { Entry } from '../types/entry.js';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
const MAX_FILENAME_LENGTH = 255;
const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::\d{2}(?:\.\d+)?)?)?(?:Z|[+-]\d{2}:?\d{2})?$/;

let mimeDescriptions: Map<string, string> | undefined;

function loadMimeDescriptions(): Map<string, string> {
  if (mimeDescriptions) return mimeDescriptions;
  const raw: unknown = JSON.parse(fs.readFileSync(new URL('../../data/mimeTypes.json', import.meta.url), 'utf8'));
  const table = new Map<string, string>();
  if (typeof raw === 'object' && raw !== null) {
    for (const [mime, description] of Object.entries(raw)) {
      if (typeof description === 'string') table.set(mime, description);
    }
  }
  mimeDescriptions = table;
  return table;
}

export function formatFileSize(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return '0 B';
  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit += 1;
  }
  return unit === 0 ? `${Math.floor(size)} B` : `${size.toFixed(1)} ${SIZE_UNITS[unit]}`;
}

/** Renders an ISO timestamp as `YYYY-MM-DD HH:MM` in the timestamp's own offset. */
export function formatDateTime(value: string): string {
  if (!value) return '-';
  const match = ISO_DATE_TIME.exec(value);
  if (match) return `${match[1]} ${match[2] ?? '00:00'}`;
  return value.slice(0, 16).replace('T', ' ');
}

export function fileTypeDescription(mimeType: string): string {
  if (!mimeType) return 'Unknown';
  const known = loadMimeDescriptions().get(mimeType);
  if (known) return known;
  const slash = mimeType.indexOf('/');
  if (slash > 0) {
    const main = mimeType.slice(0, slash);
    if (['image', 'audio', 'video', 'text'].includes(main)) {
      return `${main.charAt(0).toUpperCase()}${main.slice(1)} File`;
    }
  }
  return titleCase(mimeType.replace('application/', '').replace(/\//g, ' '));
}

// Capitalizes each run of letters, lower-casing the rest.
function titleCase(text: string): string {
  return text.toLowerCase().replace(/[a-z]+/g, (word) => `${word.charAt(0).toUpperCase()}${word.slice(1)}`);
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function formatDuration(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) return 'Unknown';
  if (seconds < 60) return `${Math.floor(seconds)}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ${Math.floor(seconds % 60)}s`;
  return `${Math.floor(seconds / 3600)}h ${Math.floor((seconds % 3600) / 60)}m`;
}

/** Makes a remote title safe to use as a local file name. */
export function sanitizeFilename(name: string): string {
  // eslint-disable-next-line no-control-regex
  let sanitized = name.replace(/[<>:"/\\|?*\x00-\x1f]/g, '_').replace(/^[. ]+|[. ]+$/g, '');
  if (!sanitized) return 'untitled';
  if (sanitized.length > MAX_FILENAME_LENGTH) {
    const ext = path.extname(sanitized);
    sanitized = sanitized.slice(0, MAX_FILENAME_LENGTH - ext.length) + ext;
  }
  return sanitized;
}

/**
 * Sanitized local names for a batch of titles. A name already taken in the
 * batch, compared without case, gets ` (n)` before its extension.
 */
export function uniqueFilenames(titles: readonly string[]): string[] {
  const used = new Set<string>();
  return titles.map((title) => {
    const base = sanitizeFilename(title);
    const ext = path.extname(base);
    const stem = base.slice(0, base.length - ext.length);
    let name = base;
    for (let n = 1; used.has(name.toLowerCase()); n += 1) name = `${stem} (${n})${ext}`;
    used.add(name.toLowerCase());
    return name;
  });
}

/** Multi-line properties text for an entry. */
export function describeEntry(entry: Entry): string {
  return [
    `Name: ${entry.title}`,
    `Type: ${fileTypeDescription(entry.mimeType)}`,
    `Size: ${entry.isFolder ? '-' : formatFileSize(entry.size)}`,
    `Modified: ${formatDateTime(entry.modifiedTimestamp)}`,
    `ID: ${entry.id}`,
    `Parent: ${entry.parentId}`
  ].join('\n');
}
