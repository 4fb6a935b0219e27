export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARNING = 'WARNING',
  ERROR = 'ERROR'
}

export interface IgnoreRules {
  glob?: string[];
  regex?: string[];
}

export interface AppConfig {
  last_download_path: string;
  auto_refresh: boolean;
  confirm_operations: boolean;
  credentials_file: string;
  log_level: LogLevel;
  window_geometry: string;
  skip_hidden_files: boolean;
  upload_ignore: IgnoreRules;
}

export type ConfigKey = keyof AppConfig;
