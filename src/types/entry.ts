import type { EntryId, FolderId, Instant } from './ids.js';

export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

export interface Entry {
  readonly id: EntryId;
  readonly title: string;
  readonly size: number;
  readonly modifiedTimestamp: Instant | '';
  readonly mimeType: string;
  readonly isFolder: boolean;
  readonly parentId: FolderId;
}

export interface EntryInit {
  id: EntryId;
  title: string;
  size?: number;
  modifiedTimestamp?: string;
  mimeType?: string;
  parentId?: FolderId;
}
