import fs from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { Entry } from '../../types/entry.js';
import { FOLDER_MIME_TYPE } from '../../types/entry.js';
import type { EntryId, FolderId } from '../../types/ids.js';
import { ROOT_FOLDER_ID } from '../../types/ids.js';
import { ErrorCode } from '../../types/enums.js';
import type { RemoteStorageService } from '../../types/remote.js';
import { createEntry, sortEntries } from '../../entry/entry.js';
import { RemoteError, ValidationError } from '../../ops/errors.js';
import type { DriveClient } from './DriveClient.js';
import { isRecord, numberField, stringArrayField, stringField, type JsonObject } from './json.js';

export const FILE_FIELDS = 'id,name,size,modifiedTime,mimeType,parents';

export const MULTIPART_LIMIT_BYTES = 5 * 1024 * 1024;

const UPLOAD_MIME_TYPES: Record<string, string> = {
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.csv': 'text/csv',
  '.html': 'text/html',
  '.json': 'application/json',
  '.pdf': 'application/pdf',
  '.zip': 'application/zip',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.mp3': 'audio/mpeg',
  '.mp4': 'video/mp4'
};

export function guessMimeType(fileName: string): string {
  return UPLOAD_MIME_TYPES[path.extname(fileName).toLowerCase()] ?? 'application/octet-stream';
}

export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function entryFromDriveFile(file: unknown, fallbackParent: FolderId = ROOT_FOLDER_ID): Entry {
  if (!isRecord(file)) throw new RemoteError({ code: ErrorCode.REMOTE, message: 'Malformed file resource' });
  return createEntry({
    id: stringField(file, 'id') ?? '',
    title: stringField(file, 'name') ?? '',
    size: numberField(file, 'size'),
    modifiedTimestamp: stringField(file, 'modifiedTime'),
    mimeType: stringField(file, 'mimeType'),
    parentId: stringArrayField(file, 'parents')[0] ?? fallbackParent
  });
}

function requireObject(value: unknown, what: string): JsonObject {
  if (!isRecord(value)) throw new RemoteError({ code: ErrorCode.REMOTE, message: `Unexpected response for ${what}` });
  return value;
}

function requireId(value: unknown, what: string): EntryId {
  const id = stringField(requireObject(value, what), 'id');
  if (!id) throw new RemoteError({ code: ErrorCode.REMOTE, message: `Missing id in response for ${what}` });
  return id;
}

async function* multipartBody(head: Buffer, localPath: string, tail: Buffer): AsyncGenerator<Uint8Array> {
  yield head;
  for await (const chunk of fs.createReadStream(localPath)) {
    if (chunk instanceof Uint8Array) yield chunk;
  }
  yield tail;
}

export interface GoogleDriveStorageOptions {
  /** Files above this size go through a resumable upload session. */
  multipartLimitBytes?: number;
}

/** Drive v3 files API behind the RemoteStorageService seam. */
export class GoogleDriveStorage implements RemoteStorageService {
  private readonly multipartLimitBytes: number;

  constructor(
    private readonly client: DriveClient,
    options: GoogleDriveStorageOptions = {}
  ) {
    this.multipartLimitBytes = options.multipartLimitBytes ?? MULTIPART_LIMIT_BYTES;
  }

  async listChildren(folderId: FolderId): Promise<Entry[]> {
    const entries: Entry[] = [];
    let pageToken: string | undefined;
    do {
      const query: Record<string, string> = {
        q: `'${escapeQueryValue(folderId)}' in parents and trashed=false`,
        fields: `nextPageToken,files(${FILE_FIELDS})`,
        pageSize: '1000'
      };
      if (pageToken) query.pageToken = pageToken;
      const page = requireObject(await this.client.json({ path: '/drive/v3/files', query }), 'file list');
      const files = page.files;
      if (Array.isArray(files)) {
        for (const file of files) entries.push(entryFromDriveFile(file, folderId));
      }
      pageToken = stringField(page, 'nextPageToken');
    } while (pageToken);
    return sortEntries(entries);
  }

  async upload(localPath: string, parentId: FolderId): Promise<EntryId> {
    let size: number;
    try {
      const stat = await fs.promises.stat(localPath);
      if (!stat.isFile()) throw new ValidationError(`Not a file: ${localPath}`);
      size = stat.size;
    } catch (err) {
      if (err instanceof ValidationError) throw err;
      throw new ValidationError(`File not found: ${localPath}`);
    }

    const name = path.basename(localPath);
    const mimeType = guessMimeType(name);
    const metadata = JSON.stringify({ name, parents: [parentId] });
    const created =
      size > this.multipartLimitBytes
        ? await this.uploadResumable(localPath, size, mimeType, metadata)
        : await this.uploadMultipart(localPath, size, mimeType, metadata);
    return requireId(created, `upload of ${name}`);
  }

  private async uploadMultipart(localPath: string, size: number, mimeType: string, metadata: string): Promise<unknown> {
    const boundary = `drivepane-${randomUUID()}`;
    const head = Buffer.from(
      `--${boundary}\r\nContent-Type: application/json; charset=UTF-8\r\n\r\n${metadata}\r\n` +
        `--${boundary}\r\nContent-Type: ${mimeType}\r\n\r\n`,
      'utf8'
    );
    const tail = Buffer.from(`\r\n--${boundary}--\r\n`, 'utf8');
    return this.client.json({
      method: 'POST',
      path: '/upload/drive/v3/files',
      query: { uploadType: 'multipart', fields: 'id' },
      headers: {
        'Content-Type': `multipart/related; boundary=${boundary}`,
        'Content-Length': String(head.length + size + tail.length)
      },
      body: () => multipartBody(head, localPath, tail)
    });
  }

  private async uploadResumable(localPath: string, size: number, mimeType: string, metadata: string): Promise<unknown> {
    const session = await this.client.send({
      method: 'POST',
      path: '/upload/drive/v3/files',
      query: { uploadType: 'resumable', fields: 'id' },
      headers: {
        'Content-Type': 'application/json; charset=UTF-8',
        'X-Upload-Content-Type': mimeType,
        'X-Upload-Content-Length': String(size)
      },
      body: metadata
    });
    const location = session.headers.get('Location');
    if (!location) throw new RemoteError({ code: ErrorCode.REMOTE, message: 'Missing upload session location' });
    return this.client.json({
      method: 'PUT',
      path: '/upload/drive/v3/files',
      location,
      headers: { 'Content-Type': mimeType, 'Content-Length': String(size) },
      body: () => fs.createReadStream(localPath)
    });
  }

  async download(id: EntryId, localPath: string): Promise<void> {
    const res = await this.client.send({ path: `/drive/v3/files/${encodeURIComponent(id)}`, query: { alt: 'media' } });
    await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
    if (!res.body) {
      await fs.promises.writeFile(localPath, '');
      return;
    }
    try {
      await pipeline(Readable.fromWeb(res.body), fs.createWriteStream(localPath));
    } catch (err) {
      await fs.promises.rm(localPath, { force: true });
      throw err;
    }
  }

  async createFolder(name: string, parentId: FolderId): Promise<EntryId> {
    const created = await this.client.json({
      method: 'POST',
      path: '/drive/v3/files',
      query: { fields: 'id' },
      headers: { 'Content-Type': 'application/json; charset=UTF-8' },
      body: JSON.stringify({ name, mimeType: FOLDER_MIME_TYPE, parents: [parentId] })
    });
    return requireId(created, `folder ${name}`);
  }

  async delete(id: EntryId): Promise<void> {
    await this.client.send({ method: 'DELETE', path: `/drive/v3/files/${encodeURIComponent(id)}` });
  }

  async getInfo(id: EntryId): Promise<Entry> {
    const file = await this.client.json({
      path: `/drive/v3/files/${encodeURIComponent(id)}`,
      query: { fields: FILE_FIELDS }
    });
    return entryFromDriveFile(file);
  }

  async testConnection(): Promise<void> {
    await this.client.json({ path: '/drive/v3/about', query: { fields: 'user' } });
  }
}
