import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { AppConfig, ConfigKey, IgnoreRules } from '../types/config.js';
import { LogLevel } from '../types/config.js';
import { ValidationError } from '../ops/errors.js';
import type { Logger } from '../log/Logger.js';
import { parseLogLevel, silentLogger } from '../log/Logger.js';

export const DEFAULT_CONFIG_FILE = 'config.json';

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'last_download_path',
  'auto_refresh',
  'confirm_operations',
  'credentials_file',
  'log_level',
  'window_geometry',
  'skip_hidden_files',
  'upload_ignore'
];

export function defaultConfig(homeDir: string = os.homedir()): AppConfig {
  return {
    last_download_path: path.join(homeDir, 'Downloads'),
    auto_refresh: true,
    confirm_operations: true,
    credentials_file: 'mycreds.json',
    log_level: LogLevel.INFO,
    window_geometry: '1000x700',
    skip_hidden_files: false,
    upload_ignore: {}
  };
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function asBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function asStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const strings = value.filter((v): v is string => typeof v === 'string');
  return strings.length === value.length ? strings : undefined;
}

function asIgnoreRules(value: unknown): IgnoreRules | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
  const rules: IgnoreRules = {};
  for (const [key, list] of Object.entries(value)) {
    if (key !== 'glob' && key !== 'regex') return undefined;
    const patterns = asStringList(list);
    if (!patterns) return undefined;
    rules[key] = patterns;
  }
  return rules;
}

const VALIDATORS: { [K in ConfigKey]: (value: unknown) => AppConfig[K] | undefined } = {
  last_download_path: asString,
  auto_refresh: asBoolean,
  confirm_operations: asBoolean,
  credentials_file: asString,
  log_level: parseLogLevel,
  window_geometry: asString,
  skip_hidden_files: asBoolean,
  upload_ignore: asIgnoreRules
};

function copyKey<K extends ConfigKey>(target: AppConfig, source: Partial<AppConfig>, key: K): void {
  const value = source[key];
  if (value !== undefined) target[key] = value;
}

/**
 * Turns a `key value` pair typed by a user into a typed config update.
 * Booleans accept true/false, yes/no, on/off and 1/0; `upload_ignore` takes JSON.
 */
export function parseSetting(key: string, raw: string): Partial<AppConfig> {
  if (!isConfigKey(key)) throw new ValidationError(`Unknown setting: ${key}`);
  let input: unknown = raw;
  const lowered = raw.trim().toLowerCase();
  if (typeof defaultConfig()[key] === 'boolean') {
    if (['true', 'yes', 'on', '1'].includes(lowered)) input = true;
    else if (['false', 'no', 'off', '0'].includes(lowered)) input = false;
  } else if (key === 'upload_ignore') {
    try {
      input = JSON.parse(raw);
    } catch {
      throw new ValidationError(`Invalid value for ${key}: expected JSON like {"glob":["*.log"]}`);
    }
  }
  const update: Partial<AppConfig> = {};
  if (!assignValidated(update, key, input)) throw new ValidationError(`Invalid value for ${key}: ${raw}`);
  return update;
}

function assignValidated<K extends ConfigKey>(target: Partial<AppConfig>, key: K, value: unknown): boolean {
  const validated = VALIDATORS[key](value);
  if (validated === undefined) return false;
  target[key] = validated;
  return true;
}

export interface ConfigStoreOptions {
  logger?: Logger;
  homeDir?: string;
}

/** Application settings persisted as a JSON document. */
export class ConfigStore {
  private values: AppConfig;
  private readonly defaults: AppConfig;
  private readonly logger: Logger;

  constructor(readonly file: string = DEFAULT_CONFIG_FILE, options: ConfigStoreOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.defaults = defaultConfig(options.homeDir);
    this.values = this.load();
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.values[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.values[key] = value;
  }

  update(updates: Partial<AppConfig>): void {
    for (const key of CONFIG_KEYS) copyKey(this.values, updates, key);
  }

  snapshot(): AppConfig {
    return structuredClone(this.values);
  }

  resetToDefaults(): void {
    this.values = structuredClone(this.defaults);
    this.logger.info('Configuration reset to defaults');
  }

  save(): boolean {
    try {
      fs.mkdirSync(path.dirname(path.resolve(this.file)), { recursive: true });
      fs.writeFileSync(this.file, `${JSON.stringify(this.values, null, 2)}\n`, 'utf8');
      this.logger.info('Configuration saved successfully');
      return true;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error(`Failed to save config: ${reason}`);
      return false;
    }
  }

  private load(): AppConfig {
    const config = structuredClone(this.defaults);
    if (!fs.existsSync(this.file)) {
      this.logger.info('Using default configuration');
      return config;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.file, 'utf8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Failed to load config: ${reason}`);
      this.logger.info('Using default configuration');
      return config;
    }
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      this.logger.warn('Failed to load config: expected a JSON object');
      return config;
    }
    for (const [key, value] of Object.entries(raw)) {
      if (!isConfigKey(key)) {
        this.logger.debug(`Ignoring unknown config key: ${key}`);
        continue;
      }
      if (!assignValidated(config, key, value)) {
        this.logger.warn(`Invalid value for ${key}, using default`);
      }
    }
    this.logger.info('Configuration loaded successfully');
    return config;
  }
}
