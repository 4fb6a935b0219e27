import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DriveBrowser } from '../../../src/browser/DriveBrowser.js';
import { ConfigStore } from '../../../src/config/ConfigStore.js';
import { MemoryLogSink, SinkLogger } from '../../../src/log/Logger.js';
import { MemoryRemoteStorage } from '../../../src/remote/memory/MemoryRemoteStorage.js';
import { EventLoopContext } from '../../../src/ui/InteractiveContext.js';
import type { DriveView, NavigationView, ProgressSurface } from '../../../src/ui/DriveView.js';
import type { ListingRow } from '../../../src/ui/ListingModel.js';
import type { RowHandle } from '../../../src/types/ids.js';
import { LogLevel } from '../../../src/types/config.js';
import type { RemoteStorageService } from '../../../src/types/remote.js';

export type ViewEvent =
  | { kind: 'status'; message: string }
  | { kind: 'listing'; names: string[]; summary: string }
  | { kind: 'navigation'; path: string; canGoBack: boolean }
  | { kind: 'info' | 'warning' | 'error' | 'confirm'; title: string; message: string }
  | { kind: 'progress-open' | 'progress-close'; title: string }
  | { kind: 'progress'; label: string; percent?: number };

/** DriveView that records every call in order. */
export class RecordingView implements DriveView {
  readonly events: ViewEvent[] = [];
  confirmAnswer = true;

  showStatus(message: string): void {
    this.events.push({ kind: 'status', message });
  }

  showListing(rows: readonly ListingRow[], summary: string): void {
    this.events.push({ kind: 'listing', names: rows.map((row) => row.name), summary });
  }

  showNavigation(navigation: NavigationView): void {
    this.events.push({ kind: 'navigation', path: navigation.path, canGoBack: navigation.canGoBack });
  }

  showInfo(title: string, message: string): void {
    this.events.push({ kind: 'info', title, message });
  }

  showWarning(title: string, message: string): void {
    this.events.push({ kind: 'warning', title, message });
  }

  showError(title: string, message: string): void {
    this.events.push({ kind: 'error', title, message });
  }

  async confirm(title: string, message: string): Promise<boolean> {
    this.events.push({ kind: 'confirm', title, message });
    return this.confirmAnswer;
  }

  openProgress(title: string): ProgressSurface {
    this.events.push({ kind: 'progress-open', title });
    return {
      update: (status) => {
        const event: { kind: 'progress'; label: string; percent?: number } = { kind: 'progress', label: status.label };
        if (status.percent !== undefined) event.percent = status.percent;
        this.events.push(event);
      },
      close: () => this.events.push({ kind: 'progress-close', title })
    };
  }

  statuses(): string[] {
    return this.events.flatMap((e) => (e.kind === 'status' ? [e.message] : []));
  }

  dialogs(kind: 'info' | 'warning' | 'error' | 'confirm'): Array<{ title: string; message: string }> {
    return this.events.flatMap((e) => (e.kind === kind ? [{ title: e.title, message: e.message }] : []));
  }

  progress(): Array<{ label: string; percent?: number }> {
    return this.events.flatMap((e) => (e.kind === 'progress' ? [{ label: e.label, percent: e.percent }] : []));
  }

  lastListing(): { names: string[]; summary: string } | undefined {
    const listings = this.events.flatMap((e) => (e.kind === 'listing' ? [{ names: e.names, summary: e.summary }] : []));
    return listings[listings.length - 1];
  }

  lastNavigation(): { path: string; canGoBack: boolean } | undefined {
    const navs = this.events.flatMap((e) => (e.kind === 'navigation' ? [{ path: e.path, canGoBack: e.canGoBack }] : []));
    return navs[navs.length - 1];
  }

  clear(): void {
    this.events.length = 0;
  }
}

export interface BrowserHarness {
  dir: string;
  configFile: string;
  config: ConfigStore;
  storage: MemoryRemoteStorage;
  view: RecordingView;
  context: EventLoopContext;
  logs: MemoryLogSink;
  logger: SinkLogger;
  taskErrors: unknown[];
  browser: DriveBrowser;
  connects: number;
  handleOf(name: string): RowHandle;
  writeLocal(rel: string, content?: string): string;
  cleanup(): void;
}

export interface HarnessOptions {
  storage?: MemoryRemoteStorage;
  connect?: () => RemoteStorageService;
}

export function createHarness(options: HarnessOptions = {}): BrowserHarness {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'drivepane-browser-'));
  const configFile = path.join(dir, 'config.json');
  const config = new ConfigStore(configFile, { homeDir: dir });
  const storage = options.storage ?? new MemoryRemoteStorage();
  const view = new RecordingView();
  const taskErrors: unknown[] = [];
  const context = new EventLoopContext((err) => taskErrors.push(err));
  const logs = new MemoryLogSink();
  const logger = new SinkLogger([logs], { level: LogLevel.DEBUG });

  const harness: BrowserHarness = {
    dir,
    configFile,
    config,
    storage,
    view,
    context,
    logs,
    logger,
    taskErrors,
    connects: 0,
    browser: new DriveBrowser({
      config,
      view,
      context,
      logger,
      connect: () => {
        harness.connects += 1;
        return options.connect ? options.connect() : storage;
      }
    }),
    handleOf(name) {
      const row = harness.browser.listing.rows.find((r) => r.name === name);
      if (!row) throw new Error(`No row named ${name}`);
      return row.handle;
    },
    writeLocal(rel, content = rel) {
      const target = path.join(dir, 'local', rel);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, content);
      return target;
    },
    cleanup() {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  };
  return harness;
}

/** Connects, waits for the first listing and forgets the events so far. */
export async function connected(harness: BrowserHarness): Promise<BrowserHarness> {
  await harness.browser.connect();
  await harness.browser.whenIdle();
  harness.view.clear();
  return harness;
}
