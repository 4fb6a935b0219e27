import fs from 'node:fs';
import path from 'node:path';
import type { Entry } from '../../types/entry.js';
import { FOLDER_MIME_TYPE } from '../../types/entry.js';
import type { RemoteStorageService } from '../../types/remote.js';
import type { EntryId, FolderId } from '../../types/ids.js';
import { ROOT_FOLDER_ID } from '../../types/ids.js';
import { ErrorCode } from '../../types/enums.js';
import { createEntry, sortEntries } from '../../entry/entry.js';
import { RemoteError, ValidationError } from '../../ops/errors.js';
import { guessMimeType } from '../drive/GoogleDriveStorage.js';
import { nowInstant, systemClock, type Clock } from '../../utils/time.js';

export type RemoteMethod = 'listChildren' | 'upload' | 'download' | 'createFolder' | 'delete' | 'getInfo' | 'testConnection';

export interface RemoteCall {
  method: RemoteMethod;
  args: string[];
}

export type CallInterceptor = (call: RemoteCall) => Promise<void> | void;

interface StoredItem {
  entry: Entry;
  content?: Buffer;
}

interface FailureRule {
  match: (call: RemoteCall) => boolean;
  error: unknown;
  remaining: number;
}

export interface MemoryRemoteStorageOptions {
  now?: Clock;
}

/**
 * In-process drive. Records every call, supports scripted failures and an
 * interceptor that can hold a call open.
 */
export class MemoryRemoteStorage implements RemoteStorageService {
  readonly calls: RemoteCall[] = [];
  private readonly items = new Map<EntryId, StoredItem>();
  private readonly failures: FailureRule[] = [];
  private interceptor: CallInterceptor | undefined;
  private readonly clock: Clock;
  private seq = 0;

  constructor(options: MemoryRemoteStorageOptions = {}) {
    this.clock = options.now ?? systemClock;
  }

  addFolder(name: string, parentId: FolderId = ROOT_FOLDER_ID): Entry {
    return this.store({ title: name, parentId, mimeType: FOLDER_MIME_TYPE });
  }

  addFile(name: string, content: string | Buffer, parentId: FolderId = ROOT_FOLDER_ID, mimeType = 'text/plain'): Entry {
    const buffer = typeof content === 'string' ? Buffer.from(content, 'utf8') : content;
    return this.store({ title: name, parentId, mimeType }, buffer);
  }

  failWhen(match: (call: RemoteCall) => boolean, error: unknown, times = Number.POSITIVE_INFINITY): void {
    this.failures.push({ match, error, remaining: times });
  }

  intercept(interceptor: CallInterceptor | undefined): void {
    this.interceptor = interceptor;
  }

  has(id: EntryId): boolean {
    return this.items.has(id);
  }

  children(parentId: FolderId): Entry[] {
    return sortEntries([...this.items.values()].filter((item) => item.entry.parentId === parentId).map((item) => item.entry));
  }

  contentOf(id: EntryId): string | undefined {
    return this.items.get(id)?.content?.toString('utf8');
  }

  /** Looks up an entry by `/`-separated titles below the root. */
  find(titlePath: string): Entry | undefined {
    let parentId: FolderId = ROOT_FOLDER_ID;
    let found: Entry | undefined;
    for (const title of titlePath.split('/').filter(Boolean)) {
      found = this.children(parentId).find((entry) => entry.title === title);
      if (!found) return undefined;
      parentId = found.id;
    }
    return found;
  }

  async listChildren(folderId: FolderId): Promise<Entry[]> {
    await this.enter('listChildren', folderId);
    this.requireFolder(folderId);
    return this.children(folderId);
  }

  async upload(localPath: string, parentId: FolderId): Promise<EntryId> {
    await this.enter('upload', localPath, parentId);
    this.requireFolder(parentId);
    let content: Buffer;
    try {
      content = await fs.promises.readFile(localPath);
    } catch {
      throw new ValidationError(`File not found: ${localPath}`);
    }
    return this.store({ title: path.basename(localPath), parentId, mimeType: guessMimeType(localPath) }, content).id;
  }

  async download(id: EntryId, localPath: string): Promise<void> {
    await this.enter('download', id, localPath);
    const item = this.requireItem(id);
    if (item.entry.isFolder) {
      throw new RemoteError({ code: ErrorCode.REMOTE, status: 400, message: `Cannot download a folder: ${item.entry.title}` });
    }
    await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
    await fs.promises.writeFile(localPath, item.content ?? Buffer.alloc(0));
  }

  async createFolder(name: string, parentId: FolderId): Promise<EntryId> {
    await this.enter('createFolder', name, parentId);
    this.requireFolder(parentId);
    return this.addFolder(name, parentId).id;
  }

  async delete(id: EntryId): Promise<void> {
    await this.enter('delete', id);
    this.requireItem(id);
    this.removeTree(id);
  }

  async getInfo(id: EntryId): Promise<Entry> {
    await this.enter('getInfo', id);
    return this.requireItem(id).entry;
  }

  async testConnection(): Promise<void> {
    await this.enter('testConnection');
  }

  private async enter(method: RemoteMethod, ...args: string[]): Promise<void> {
    const call: RemoteCall = { method, args };
    this.calls.push(call);
    if (this.interceptor) await this.interceptor(call);
    const rule = this.failures.find((candidate) => candidate.remaining > 0 && candidate.match(call));
    if (rule) {
      rule.remaining -= 1;
      throw rule.error;
    }
  }

  private store(init: { title: string; parentId: FolderId; mimeType: string }, content?: Buffer): Entry {
    this.seq += 1;
    const entry = createEntry({
      id: `mem-${this.seq}`,
      title: init.title,
      size: content?.length ?? 0,
      modifiedTimestamp: nowInstant(this.clock),
      mimeType: init.mimeType,
      parentId: init.parentId
    });
    this.items.set(entry.id, content ? { entry, content } : { entry });
    return entry;
  }

  private requireItem(id: EntryId): StoredItem {
    const item = this.items.get(id);
    if (!item) throw new RemoteError({ code: ErrorCode.NOT_FOUND, status: 404, message: `File not found: ${id}` });
    return item;
  }

  private requireFolder(id: FolderId): void {
    if (id === ROOT_FOLDER_ID) return;
    const item = this.requireItem(id);
    if (!item.entry.isFolder) {
      throw new RemoteError({ code: ErrorCode.REMOTE, status: 400, message: `Not a folder: ${item.entry.title}` });
    }
  }

  private removeTree(id: EntryId): void {
    for (const child of this.children(id)) this.removeTree(child.id);
    this.items.delete(id);
  }
}
