import fs from 'node:fs';
import path from 'node:path';
import type { AppConfig } from '../types/config.js';
import type { Entry } from '../types/entry.js';
import type { RowHandle } from '../types/ids.js';
import type { RemoteStorageService } from '../types/remote.js';
import type { BatchJob, BatchReport, BatchSink } from '../types/operations.js';
import type { DriveError } from '../types/error.js';
import { BatchKind, ErrorStage } from '../types/enums.js';
import type { ConfigStore } from '../config/ConfigStore.js';
import type { Logger } from '../log/Logger.js';
import { silentLogger } from '../log/Logger.js';
import { NavigationState } from '../navigation/NavigationState.js';
import { CancellableOperation } from '../ops/CancellableOperation.js';
import { OperationRunner, itemLabel } from '../ops/OperationRunner.js';
import { FolderUploader } from '../ops/FolderUploader.js';
import { planFolderUpload, type FolderPlan } from '../ops/folderPlan.js';
import { describeError, mapRemoteError } from '../ops/errorMapper.js';
import type { InteractiveContext } from '../ui/InteractiveContext.js';
import type { DriveView, ProgressSurface } from '../ui/DriveView.js';
import { ListingModel } from '../ui/ListingModel.js';
import { describeEntry, plural, sanitizeFilename, uniqueFilenames } from '../ui/format.js';
import { systemClock, type Clock } from '../utils/time.js';

export type ServiceFactory = (config: AppConfig, logger: Logger) => RemoteStorageService | Promise<RemoteStorageService>;

export interface DriveBrowserOptions {
  config: ConfigStore;
  view: DriveView;
  context: InteractiveContext;
  connect: ServiceFactory;
  logger?: Logger;
  now?: Clock;
}

const MAX_LISTED_FAILURES = 10;

interface BatchPresentation {
  title: string;
  summaryTitle: string;
  errorTitle: string;
  /** Verb used in "<Verb> failed" and "<Verb> aborted". */
  verb: string;
  success(report: BatchReport): string;
}

export function failureLines(failures: readonly DriveError[]): string {
  const lines = failures.slice(0, MAX_LISTED_FAILURES).map((failure) => `- ${describeError(failure)}`);
  if (failures.length > MAX_LISTED_FAILURES) lines.push(`...and ${failures.length - MAX_LISTED_FAILURES} more`);
  return lines.join('\n');
}

/**
 * Wires user actions to background operations. Remote work runs off the
 * caller's stack; results reach the navigation state, the listing and the
 * view only through tasks posted to the interactive context.
 */
export class DriveBrowser {
  readonly navigation = new NavigationState();
  readonly listing = new ListingModel();

  private readonly config: ConfigStore;
  private readonly view: DriveView;
  private readonly context: InteractiveContext;
  private readonly factory: ServiceFactory;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly runner: OperationRunner;
  private readonly tasks = new Set<Promise<unknown>>();
  private readonly active = new Set<CancellableOperation>();
  private service: RemoteStorageService | undefined;
  private connectSeq = 0;
  private refreshSeq = 0;

  constructor(options: DriveBrowserOptions) {
    this.config = options.config;
    this.view = options.view;
    this.context = options.context;
    this.factory = options.connect;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.now ?? systemClock;
    this.runner = new OperationRunner({
      context: this.context,
      logger: this.logger.child('runner'),
      autoRefresh: () => this.config.get('auto_refresh'),
      now: this.clock
    });
  }

  get connected(): boolean {
    return this.service !== undefined;
  }

  get activeOperations(): readonly CancellableOperation[] {
    return [...this.active];
  }

  connect(): Promise<boolean> {
    const seq = ++this.connectSeq;
    this.service = undefined;
    this.view.showStatus('Connecting to Google Drive...');
    return this.track(this.establish(seq));
  }

  refresh(): void {
    const service = this.service;
    if (!service) {
      this.view.showStatus('Not connected to Google Drive');
      return;
    }
    const seq = ++this.refreshSeq;
    const folderId = this.navigation.currentFolderId;
    this.view.showStatus('Loading files...');
    void this.track(
      service.listChildren(folderId).then(
        (entries) => {
          this.context.post(() => {
            if (seq !== this.refreshSeq) {
              this.logger.debug(`Dropping stale listing of ${folderId}`);
              return;
            }
            this.populate(entries);
          });
        },
        (err: unknown) => {
          const error = mapRemoteError(err, ErrorStage.LIST, folderId);
          this.logger.error(`Failed to refresh files: ${error.message}`);
          this.context.post(() => {
            if (seq !== this.refreshSeq) return;
            this.view.showError('Error', `Failed to load files:\n${error.message}`);
            this.view.showStatus('Error loading files');
          });
        }
      )
    );
  }

  open(handle: RowHandle): void {
    const entry = this.listing.resolve(handle);
    if (!entry) {
      this.view.showWarning('No Selection', 'The selected item is no longer listed');
      return;
    }
    if (entry.isFolder) {
      this.navigation.navigateInto(entry.id, entry.title);
      this.refresh();
      return;
    }
    this.download([handle]);
  }

  goBack(): void {
    if (this.navigation.goBack()) this.refresh();
  }

  goHome(): void {
    this.navigation.goHome();
    this.refresh();
  }

  uploadFiles(localPaths: readonly string[]): CancellableOperation | undefined {
    const service = this.requireService();
    if (!service || localPaths.length === 0) return undefined;
    for (const localPath of localPaths) {
      if (!isFile(localPath)) {
        this.view.showError('Upload Error', `File not found: ${localPath}`);
        return undefined;
      }
    }
    const parentId = this.navigation.currentFolderId;
    const items = [...localPaths];
    const job: BatchJob<string> = {
      kind: BatchKind.UPLOAD,
      items,
      label: (item, index, total) => itemLabel('Uploading', path.basename(item), index, total),
      subject: (item) => path.basename(item),
      perform: async (item) => {
        await service.upload(item, parentId);
      },
      refreshOnSuccess: true
    };
    return this.launch(
      {
        title: 'Uploading Files',
        summaryTitle: 'Upload Complete',
        errorTitle: 'Upload Error',
        verb: 'Upload',
        success: (report) => `Successfully uploaded ${plural(report.succeeded, 'file')}`
      },
      items.length,
      (operation, sink) => this.runner.run(operation, job, sink)
    );
  }

  uploadFolder(localFolder: string): CancellableOperation | undefined {
    const service = this.requireService();
    if (!service) return undefined;
    let plan: FolderPlan;
    try {
      plan = planFolderUpload(localFolder, {
        skipHidden: this.config.get('skip_hidden_files'),
        ignore: this.config.get('upload_ignore')
      });
    } catch (err) {
      const error = mapRemoteError(err, ErrorStage.UPLOAD, localFolder);
      this.logger.error(`Folder upload failed: ${error.message}`);
      this.view.showError('Upload Error', `Folder upload failed:\n${error.message}`);
      return undefined;
    }
    if (plan.ignoredCount > 0) this.logger.info(`Skipping ${plan.ignoredCount} ignored item(s) in ${plan.localFolder}`);

    const parentId = this.navigation.currentFolderId;
    const uploader = new FolderUploader(service, this.runner);
    return this.launch(
      {
        title: 'Uploading Folder',
        summaryTitle: 'Upload Complete',
        errorTitle: 'Upload Error',
        verb: 'Folder upload',
        success: () => `Successfully uploaded folder: ${plan.rootName}`
      },
      plan.steps.length,
      async (operation, sink) => (await uploader.upload(operation, plan, parentId, sink)).report
    );
  }

  download(handles: readonly RowHandle[], targetDir?: string): CancellableOperation | undefined {
    const service = this.requireService();
    if (!service) return undefined;
    const entries = this.resolveAll(handles);
    if (entries.length === 0) {
      this.view.showWarning('No Selection', 'Please select files to download');
      return undefined;
    }
    const files = entries.filter((entry) => !entry.isFolder);
    if (files.length === 0) {
      this.view.showWarning('No Files Selected', 'Only files can be downloaded (folders not supported yet)');
      return undefined;
    }

    const target = targetDir ?? this.config.get('last_download_path');
    this.config.set('last_download_path', target);
    this.config.save();

    const names = uniqueFilenames(files.map((entry) => entry.title));
    const localNames = new Map(files.map((entry, index) => [entry, names[index]]));
    const job: BatchJob<Entry> = {
      kind: BatchKind.DOWNLOAD,
      items: files,
      label: (entry, index, total) => itemLabel('Downloading', entry.title, index, total),
      subject: (entry) => entry.title,
      perform: (entry) => service.download(entry.id, path.join(target, localNames.get(entry) ?? sanitizeFilename(entry.title))),
      refreshOnSuccess: false
    };
    return this.launch(
      {
        title: 'Downloading Files',
        summaryTitle: 'Download Complete',
        errorTitle: 'Download Error',
        verb: 'Download',
        success: (report) => `Successfully downloaded ${plural(report.succeeded, 'file')} to:\n${target}`
      },
      files.length,
      (operation, sink) => this.runner.run(operation, job, sink)
    );
  }

  async delete(handles: readonly RowHandle[]): Promise<CancellableOperation | undefined> {
    const service = this.requireService();
    if (!service) return undefined;
    const entries = this.resolveAll(handles);
    if (entries.length === 0) {
      this.view.showWarning('No Selection', 'Please select items to delete');
      return undefined;
    }
    if (this.config.get('confirm_operations')) {
      const confirmed = await this.view.confirm(
        'Confirm Delete',
        `Are you sure you want to delete ${plural(entries.length, 'item')}?\n\nThis action cannot be undone.`
      );
      if (!confirmed) return undefined;
    }

    const job: BatchJob<Entry> = {
      kind: BatchKind.DELETE,
      items: entries,
      label: (entry, index, total) => itemLabel('Deleting', entry.title, index, total),
      subject: (entry) => entry.title,
      perform: (entry) => service.delete(entry.id),
      refreshOnSuccess: true
    };
    return this.launch(
      {
        title: 'Deleting Items',
        summaryTitle: 'Delete Complete',
        errorTitle: 'Delete Error',
        verb: 'Delete',
        success: (report) => `Successfully deleted ${plural(report.succeeded, 'item')}`
      },
      entries.length,
      (operation, sink) => this.runner.run(operation, job, sink)
    );
  }

  createFolder(name: string): void {
    const folderName = name.trim();
    if (!folderName) return;
    const service = this.requireService();
    if (!service) return;
    const parentId = this.navigation.currentFolderId;
    this.view.showStatus(`Creating folder: ${folderName}`);
    void this.track(
      service.createFolder(folderName, parentId).then(
        () => {
          this.logger.info(`Created folder ${folderName} in ${parentId}`);
          this.context.post(() => {
            this.view.showStatus(`Created folder: ${folderName}`);
            if (this.config.get('auto_refresh')) this.refresh();
          });
        },
        (err: unknown) => {
          const error = mapRemoteError(err, ErrorStage.CREATE_FOLDER, folderName);
          this.logger.error(`Folder creation failed: ${describeError(error)}`);
          this.context.post(() => {
            this.view.showError('Error', `Failed to create folder:\n${error.message}`);
            this.view.showStatus('Ready');
          });
        }
      )
    );
  }

  showInfo(handle: RowHandle): void {
    const service = this.requireService();
    if (!service) return;
    const entry = this.listing.resolve(handle);
    if (!entry) {
      this.view.showWarning('No Selection', 'The selected item is no longer listed');
      return;
    }
    void this.track(
      service.getInfo(entry.id).then(
        (info) => {
          this.context.post(() => this.view.showInfo('Properties', describeEntry(info)));
        },
        (err: unknown) => {
          const error = mapRemoteError(err, ErrorStage.INFO, entry.title);
          this.logger.error(`Failed to get info: ${describeError(error)}`);
          this.context.post(() => this.view.showError('Error', `Failed to get file info:\n${error.message}`));
        }
      )
    );
  }

  applySettings(updates: Partial<AppConfig>): boolean {
    const previousCredentials = this.config.get('credentials_file');
    this.config.update(updates);
    if (updates.log_level !== undefined) this.logger.setLevel(updates.log_level);
    const saved = this.config.save();
    if (!saved) this.view.showWarning('Settings', 'Settings were applied but could not be saved');
    if (updates.credentials_file !== undefined && updates.credentials_file !== previousCredentials) {
      void this.connect();
    }
    return saved;
  }

  /** Requests cancellation of every running batch; returns how many were asked. */
  cancelAll(): number {
    for (const operation of this.active) operation.requestCancel();
    return this.active.size;
  }

  /**
   * Resolves once no background work is pending and every task posted so far
   * has run. Needs a context that drains itself.
   */
  async whenIdle(): Promise<void> {
    for (;;) {
      if (this.tasks.size > 0) {
        await Promise.allSettled([...this.tasks]);
        continue;
      }
      await new Promise<void>((resolve) => this.context.post(resolve));
      if (this.tasks.size === 0) return;
    }
  }

  async close(windowGeometry?: string): Promise<void> {
    const cancelled = this.cancelAll();
    if (cancelled > 0) this.logger.info(`Cancelling ${cancelled} running operation(s)`);
    if (windowGeometry) this.config.set('window_geometry', windowGeometry);
    this.config.save();
    await this.whenIdle();
    this.logger.info('Application closing');
  }

  private async establish(seq: number): Promise<boolean> {
    try {
      const service = await this.factory(this.config.snapshot(), this.logger.child('drive'));
      await service.testConnection();
      if (seq !== this.connectSeq) return false;
      this.service = service;
      this.logger.info('Connected to Google Drive');
      this.context.post(() => {
        this.view.showStatus('Connected to Google Drive');
        this.refresh();
      });
      return true;
    } catch (err) {
      const error = mapRemoteError(err, ErrorStage.CONNECT);
      this.logger.error(`Failed to initialize Google Drive: ${error.message}`);
      if (seq !== this.connectSeq) return false;
      this.context.post(() => {
        this.view.showStatus('Google Drive connection failed');
        this.view.showError(
          'Google Drive Connection Error',
          `Failed to connect to Google Drive:\n\n${error.message}\n\n` +
            'Please check your credentials and internet connection.\n' +
            'You can change the credentials file in the settings.'
        );
      });
      return false;
    }
  }

  private populate(entries: readonly Entry[]): void {
    const rows = this.listing.replace(entries);
    this.view.showListing(rows, this.listing.summary());
    this.view.showStatus(`Loaded ${rows.length} items`);
    this.view.showNavigation({
      path: this.navigation.path(),
      folderName: this.navigation.currentFolderName,
      canGoBack: this.navigation.canGoBack
    });
  }

  private launch(
    presentation: BatchPresentation,
    totalItems: number,
    execute: (operation: CancellableOperation, sink: BatchSink) => Promise<BatchReport>
  ): CancellableOperation {
    let surface: ProgressSurface | undefined;
    const operation = new CancellableOperation(
      presentation.title,
      totalItems,
      { onStatus: (status) => surface?.update(status) },
      this.context,
      { now: this.clock }
    );
    surface = this.view.openProgress(presentation.title, () => operation.requestCancel());
    this.active.add(operation);

    const sink: BatchSink = {
      onItemFailed: (error) => this.view.showStatus(`Failed: ${describeError(error)}`),
      onFatal: (error) => {
        this.view.showError(presentation.errorTitle, `${presentation.verb} aborted: ${error.message}`);
      },
      onCompleted: (report) => {
        const message = presentation.success(report);
        this.view.showInfo(
          presentation.summaryTitle,
          report.failures.length > 0
            ? `${message}\n\n${plural(report.failures.length, 'item')} failed:\n${failureLines(report.failures)}`
            : message
        );
      },
      onRefresh: () => this.refresh(),
      onFinished: (report) => {
        this.active.delete(operation);
        surface?.close();
        this.view.showStatus(operation.status.label);
        if (!report.fatal && !report.cancelled && report.succeeded === 0 && report.failures.length > 0) {
          this.view.showError(presentation.errorTitle, `${presentation.verb} failed:\n${failureLines(report.failures)}`);
        }
      }
    };
    void this.track(execute(operation, sink));
    return operation;
  }

  private requireService(): RemoteStorageService | undefined {
    if (!this.service) this.view.showWarning('No Connection', 'Not connected to Google Drive');
    return this.service;
  }

  private resolveAll(handles: readonly RowHandle[]): Entry[] {
    const entries: Entry[] = [];
    for (const handle of handles) {
      const entry = this.listing.resolve(handle);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  private track<T>(work: Promise<T>): Promise<T> {
    this.tasks.add(work);
    const forget = (): void => {
      this.tasks.delete(work);
    };
    void work.then(forget, forget);
    return work;
  }
}

function isFile(localPath: string): boolean {
  try {
    return fs.statSync(localPath).isFile();
  } catch {
    return false;
  }
}
