import type { Entry } from '../types/entry.js';
import type { RowHandle } from '../types/ids.js';
import { sortEntries } from '../entry/entry.js';
import { fileTypeDescription, formatDateTime, formatFileSize } from './format.js';

export const FOLDER_ICON = '📁';
export const FILE_ICON = '📄';

export interface ListingRow {
  readonly handle: RowHandle;
  /** 1-based position in the listing. */
  readonly position: number;
  readonly icon: string;
  readonly name: string;
  readonly size: string;
  readonly modified: string;
  readonly type: string;
  readonly entry: Entry;
}

export interface ListingCounts {
  folders: number;
  files: number;
  total: number;
}

export function countsSummary(counts: ListingCounts): string {
  if (counts.folders > 0 && counts.files > 0) return `${counts.folders} folders, ${counts.files} files`;
  if (counts.folders > 0) return `${counts.folders} folders`;
  if (counts.files > 0) return `${counts.files} files`;
  return 'Empty';
}

/**
 * Visible rows of the current folder. Handles are opaque and never reused, so
 * a handle kept from an older listing resolves to nothing.
 */
export class ListingModel {
  private current: ListingRow[] = [];
  private readonly byHandle = new Map<RowHandle, ListingRow>();
  private nextHandle = 0;

  get rows(): readonly ListingRow[] {
    return this.current;
  }

  replace(entries: readonly Entry[]): readonly ListingRow[] {
    this.byHandle.clear();
    this.current = sortEntries(entries).map((entry, index) => {
      this.nextHandle += 1;
      const row: ListingRow = {
        handle: `row-${this.nextHandle}`,
        position: index + 1,
        icon: entry.isFolder ? FOLDER_ICON : FILE_ICON,
        name: entry.title,
        size: entry.isFolder ? '-' : formatFileSize(entry.size),
        modified: formatDateTime(entry.modifiedTimestamp),
        type: fileTypeDescription(entry.mimeType),
        entry
      };
      this.byHandle.set(row.handle, row);
      return row;
    });
    return this.current;
  }

  clear(): void {
    this.replace([]);
  }

  resolve(handle: RowHandle): Entry | undefined {
    return this.byHandle.get(handle)?.entry;
  }

  at(position: number): ListingRow | undefined {
    return Number.isInteger(position) && position >= 1 ? this.current[position - 1] : undefined;
  }

  counts(): ListingCounts {
    const folders = this.current.filter((row) => row.entry.isFolder).length;
    return { folders, files: this.current.length - folders, total: this.current.length };
  }

  summary(): string {
    return countsSummary(this.counts());
  }
}
