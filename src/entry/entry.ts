import type { Entry, EntryInit } from '../types/entry.js';
import { FOLDER_MIME_TYPE } from '../types/entry.js';
import { ROOT_FOLDER_ID } from '../types/ids.js';
import { ValidationError } from '../ops/errors.js';

export function isFolderMimeType(mimeType: string | undefined): boolean {
  return mimeType === FOLDER_MIME_TYPE;
}

export function createEntry(init: EntryInit): Entry {
  if (!init.id) throw new ValidationError('File ID cannot be empty');
  if (!init.title) throw new ValidationError('File title cannot be empty');
  const mimeType = init.mimeType ?? '';
  const isFolder = isFolderMimeType(mimeType);
  return Object.freeze({
    id: init.id,
    title: init.title,
    size: isFolder ? 0 : normalizeSize(init.size),
    modifiedTimestamp: init.modifiedTimestamp ?? '',
    mimeType,
    isFolder,
    parentId: init.parentId || ROOT_FOLDER_ID
  });
}

// Folders first, then case-insensitive title.
export function compareEntries(a: Entry, b: Entry): number {
  if (a.isFolder !== b.isFolder) return a.isFolder ? -1 : 1;
  const left = a.title.toLowerCase();
  const right = b.title.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export function sortEntries(entries: readonly Entry[]): Entry[] {
  return [...entries].sort(compareEntries);
}

function normalizeSize(size: number | undefined): number {
  if (size === undefined || !Number.isFinite(size) || size < 0) return 0;
  return Math.floor(size);
}
