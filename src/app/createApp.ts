import type { Writable } from 'node:stream';
import type { AppConfig } from '../types/config.js';
import type { RemoteStorageService } from '../types/remote.js';
import { ConfigStore, DEFAULT_CONFIG_FILE } from '../config/ConfigStore.js';
import { createLogger, type Logger } from '../log/Logger.js';
import { DriveBrowser, type ServiceFactory } from '../browser/DriveBrowser.js';
import { CredentialsFileTokenProvider } from '../remote/drive/DriveAuth.js';
import { DriveClient } from '../remote/drive/DriveClient.js';
import { GoogleDriveStorage } from '../remote/drive/GoogleDriveStorage.js';
import { EventLoopContext, type InteractiveContext } from '../ui/InteractiveContext.js';
import type { DriveView } from '../ui/DriveView.js';

export function connectGoogleDrive(config: AppConfig, logger: Logger): RemoteStorageService {
  const tokens = new CredentialsFileTokenProvider(config.credentials_file, { logger: logger.child('auth') });
  return new GoogleDriveStorage(new DriveClient({ tokens, logger }));
}

export interface CreateAppOptions {
  view: DriveView;
  configFile?: string;
  logFile?: string;
  logStream?: Writable;
  context?: InteractiveContext;
  connect?: ServiceFactory;
}

export interface App {
  config: ConfigStore;
  logger: Logger;
  context: InteractiveContext;
  browser: DriveBrowser;
}

export function createApp(options: CreateAppOptions): App {
  const logger = createLogger({ file: options.logFile, stream: options.logStream });
  const config = new ConfigStore(options.configFile ?? DEFAULT_CONFIG_FILE, { logger: logger.child('config') });
  logger.setLevel(config.get('log_level'));
  const context =
    options.context ??
    new EventLoopContext((err) => {
      logger.error(`Interactive task failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    });
  const browser = new DriveBrowser({
    config,
    view: options.view,
    context,
    logger,
    connect: options.connect ?? connectGoogleDrive
  });
  logger.info('Starting drivepane');
  return { config, logger, context, browser };
}
