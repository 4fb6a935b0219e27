import type { Entry } from './entry.js';
import type { EntryId, FolderId } from './ids.js';

export interface RemoteStorageService {
  listChildren(folderId: FolderId): Promise<Entry[]>;
  upload(localPath: string, parentId: FolderId): Promise<EntryId>;
  download(id: EntryId, localPath: string): Promise<void>;
  createFolder(name: string, parentId: FolderId): Promise<EntryId>;
  delete(id: EntryId): Promise<void>;
  getInfo(id: EntryId): Promise<Entry>;
  testConnection(): Promise<void>;
}
