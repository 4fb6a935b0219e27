export * from './types/ids.js';
export * from './types/enums.js';
export * from './types/entry.js';
export * from './types/error.js';
export * from './types/config.js';
export * from './types/operations.js';
export * from './types/remote.js';

export { createEntry, compareEntries, sortEntries, isFolderMimeType } from './entry/entry.js';
export { NavigationState, ROOT_LOCATION, type FolderLocation } from './navigation/NavigationState.js';
export { ProgressTracker, type ProgressTrackerOptions } from './progress/ProgressTracker.js';

export { RemoteError, AuthError, ValidationError } from './ops/errors.js';
export { mapRemoteError, describeError } from './ops/errorMapper.js';
export { CancellableOperation, CANCELLING_LABEL } from './ops/CancellableOperation.js';
export { OperationRunner, itemLabel, type OperationRunnerOptions } from './ops/OperationRunner.js';
export { planFolderUpload, isHiddenName, TOP_FOLDER, type FolderPlan, type FolderStep, type FolderPlanOptions } from './ops/folderPlan.js';
export { FolderUploader, folderStepPath, type FolderUploadResult } from './ops/FolderUploader.js';
export { IgnoreMatcher } from './ops/ignore/IgnoreMatcher.js';

export { ConfigStore, defaultConfig, parseSetting, CONFIG_KEYS, DEFAULT_CONFIG_FILE } from './config/ConfigStore.js';
export { createLogger, SinkLogger, StreamLogSink, MemoryLogSink, silentLogger, type Logger, type LogSink, type LogRecord } from './log/Logger.js';

export { CredentialsFileTokenProvider, type TokenProvider } from './remote/drive/DriveAuth.js';
export { DriveClient, type DriveClientOptions } from './remote/drive/DriveClient.js';
export { GoogleDriveStorage } from './remote/drive/GoogleDriveStorage.js';
export { MemoryRemoteStorage, type RemoteCall } from './remote/memory/MemoryRemoteStorage.js';

export { QueuedContext, EventLoopContext, type InteractiveContext } from './ui/InteractiveContext.js';
export { ListingModel, type ListingRow } from './ui/ListingModel.js';
export { TextView, type TextViewOptions } from './ui/TextView.js';
export type { DriveView, NavigationView, ProgressSurface } from './ui/DriveView.js';
export * from './ui/format.js';

export { DriveBrowser, type DriveBrowserOptions, type ServiceFactory } from './browser/DriveBrowser.js';
export { createApp, connectGoogleDrive, type App, type CreateAppOptions } from './app/createApp.js';
export { Shell, parseCommand, type ShellCommand } from './app/shell.js';
