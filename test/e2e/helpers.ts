import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { createApp, type App } from '../../src/app/createApp.js';
import { Shell } from '../../src/app/shell.js';
import { MemoryRemoteStorage } from '../../src/remote/memory/MemoryRemoteStorage.js';
import { TextView, type Prompt } from '../../src/ui/TextView.js';

// --- Filesystem helpers ----------------------------------------------------

// Each E2E test uses its own temp root.
export function createTempDir(prefix = 'drivepane-e2e-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

// --- Output capture --------------------------------------------------------

export interface CapturedStream {
  stream: Writable;
  text(): string;
  lines(): string[];
  clear(): void;
}

export function captureStream(): CapturedStream {
  let chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    }
  });
  const text = () => chunks.join('');
  return {
    stream,
    text,
    lines: () => text().split('\n').filter((line, index, all) => index < all.length - 1 || line !== ''),
    clear: () => {
      chunks = [];
    }
  };
}

// --- Shell sessions --------------------------------------------------------

// Fixed clock so listings render the same modified time.
export const FIXED_NOW = Date.UTC(2026, 0, 2, 3, 4, 5);

export function createDrive(): MemoryRemoteStorage {
  return new MemoryRemoteStorage({ now: () => FIXED_NOW });
}

export interface ShellSession {
  app: App;
  shell: Shell;
  output: CapturedStream;
  logs: CapturedStream;
  questions: string[];
  /** Runs one command line and waits until the browser is idle. */
  run(line: string): Promise<boolean>;
}

export interface SessionOptions {
  baseDir: string;
  /** Drive to connect to; omit to use the real Google Drive factory. */
  drive?: MemoryRemoteStorage;
  answers?: string[];
}

export function startSession(options: SessionOptions): ShellSession {
  const output = captureStream();
  const logs = captureStream();
  const questions: string[] = [];
  const answers = [...(options.answers ?? [])];
  const prompt: Prompt = async (question) => {
    questions.push(question);
    return answers.shift() ?? '';
  };
  const view = new TextView({ out: output.stream, prompt });
  const drive = options.drive;
  const app = createApp({
    view,
    configFile: path.join(options.baseDir, 'config.json'),
    logStream: logs.stream,
    connect: drive ? () => drive : undefined
  });
  const shell = new Shell(app.browser, output.stream);
  return {
    app,
    shell,
    output,
    logs,
    questions,
    async run(line) {
      const more = await shell.run(line);
      await app.browser.whenIdle();
      return more;
    }
  };
}
