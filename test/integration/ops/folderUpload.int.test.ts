import { afterEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FolderUploader } from '../../../src/ops/FolderUploader.js';
import { OperationRunner } from '../../../src/ops/OperationRunner.js';
import { CancellableOperation } from '../../../src/ops/CancellableOperation.js';
import { RemoteError } from '../../../src/ops/errors.js';
import { planFolderUpload } from '../../../src/ops/folderPlan.js';
import { MemoryRemoteStorage } from '../../../src/remote/memory/MemoryRemoteStorage.js';
import { QueuedContext } from '../../../src/ui/InteractiveContext.js';
import { BatchKind, ErrorCode } from '../../../src/types/enums.js';
import type { BatchSink } from '../../../src/types/operations.js';

const dirs: string[] = [];

function makeTree(files: Record<string, string>): string {
  const base = fs.mkdtempSync(path.join(os.tmpdir(), 'folder-upload-'));
  dirs.push(base);
  const root = path.join(base, 'project');
  fs.mkdirSync(root);
  for (const [rel, content] of Object.entries(files)) {
    const target = path.join(root, rel);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
  return root;
}

const noopSink: BatchSink = {
  onItemFailed: () => {},
  onFatal: () => {},
  onCompleted: () => {},
  onRefresh: () => {},
  onFinished: () => {}
};

function setup(root: string) {
  const storage = new MemoryRemoteStorage();
  const context = new QueuedContext((err) => {
    throw err;
  });
  const runner = new OperationRunner({ context });
  const plan = planFolderUpload(root);
  const operation = new CancellableOperation('Uploading Folder', plan.steps.length, { onStatus: () => {} }, context);
  return { storage, context, uploader: new FolderUploader(storage, runner), plan, operation };
}

afterEach(() => {
  for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe('FolderUploader', () => {
  it('creates sub before uploading b.txt and keeps a.txt in the top folder', async () => {
    const root = makeTree({ 'a.txt': 'alpha', 'sub/b.txt': 'beta' });
    const { storage, uploader, plan, operation } = setup(root);
    const dest = storage.addFolder('Backups');

    const result = await uploader.upload(operation, plan, dest.id, noopSink);

    expect(storage.calls.map((c) => [c.method, path.basename(c.args[0])])).toEqual([
      ['createFolder', 'project'],
      ['createFolder', 'sub'],
      ['upload', 'a.txt'],
      ['upload', 'b.txt']
    ]);
    const top = storage.find('Backups/project');
    const sub = storage.find('Backups/project/sub');
    expect(result.folderId).toBe(top?.id);
    expect(storage.find('Backups/project/a.txt')?.parentId).toBe(top?.id);
    expect(storage.find('Backups/project/sub/b.txt')?.parentId).toBe(sub?.id);
    expect(result.report).toMatchObject({ kind: BatchKind.FOLDER_UPLOAD, total: 4, succeeded: 4, cancelled: false });
  });

  it('fails the children of a folder that could not be created and carries on', async () => {
    const root = makeTree({ 'a.txt': 'alpha', 'sub/b.txt': 'beta' });
    const { storage, uploader, plan, operation } = setup(root);
    storage.failWhen(
      (call) => call.method === 'createFolder' && call.args[0] === 'sub',
      new RemoteError({ code: ErrorCode.REMOTE, status: 500, message: 'Backend Error' })
    );

    const { report } = await uploader.upload(operation, plan, 'root', noopSink);

    expect(report.succeeded).toBe(2);
    expect(report.failures.map((f) => [f.subject, f.message])).toEqual([
      ['sub', 'Backend Error'],
      ['sub/b.txt', 'Parent folder was not created: sub']
    ]);
    expect(storage.find('project/a.txt')).toBeDefined();
    expect(storage.find('project/sub')).toBeUndefined();
  });

  it('stops between steps once cancelled', async () => {
    const root = makeTree({ 'a.txt': 'alpha', 'sub/b.txt': 'beta' });
    const { storage, uploader, plan, operation } = setup(root);
    storage.intercept((call) => {
      if (call.method === 'upload' && path.basename(call.args[0]) === 'a.txt') operation.requestCancel();
    });

    const { report } = await uploader.upload(operation, plan, 'root', noopSink);

    expect(report.attempted).toBe(3);
    expect(report.skipped).toBe(1);
    expect(report.cancelled).toBe(true);
    expect(storage.find('project/a.txt')).toBeDefined();
    expect(storage.find('project/sub/b.txt')).toBeUndefined();
  });
});
