import fs from 'node:fs';
import type { Writable } from 'node:stream';
import { LogLevel } from '../types/config.js';
import { nowInstant, systemClock, type Clock } from '../utils/time.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARNING]: 30,
  [LogLevel.ERROR]: 40
};

export interface LogRecord {
  at: string;
  level: LogLevel;
  scope: string;
  message: string;
}

export interface LogSink {
  write(record: LogRecord): void;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
  setLevel(level: LogLevel): void;
}

export function parseLogLevel(value: unknown): LogLevel | undefined {
  if (typeof value !== 'string') return undefined;
  const upper = value.trim().toUpperCase();
  if (upper === 'WARN') return LogLevel.WARNING;
  return Object.values(LogLevel).find((level) => level === upper);
}

export function formatLogRecord(record: LogRecord): string {
  const prefix = `${record.at} - ${record.level} - `;
  return record.scope ? `${prefix}${record.scope}: ${record.message}` : `${prefix}${record.message}`;
}

export class StreamLogSink implements LogSink {
  constructor(private readonly stream: Writable) {}

  write(record: LogRecord): void {
    this.stream.write(`${formatLogRecord(record)}\n`);
  }
}

export class MemoryLogSink implements LogSink {
  readonly records: LogRecord[] = [];

  write(record: LogRecord): void {
    this.records.push(record);
  }

  messages(level?: LogLevel): string[] {
    return this.records.filter((r) => level === undefined || r.level === level).map((r) => r.message);
  }
}

interface LevelState {
  level: LogLevel;
}

export interface SinkLoggerOptions {
  level?: LogLevel;
  scope?: string;
  now?: Clock;
}

export class SinkLogger implements Logger {
  private readonly state: LevelState;
  private readonly scope: string;
  private readonly clock: Clock;

  constructor(private readonly sinks: readonly LogSink[], options: SinkLoggerOptions = {}, state?: LevelState) {
    this.state = state ?? { level: options.level ?? LogLevel.INFO };
    this.scope = options.scope ?? '';
    this.clock = options.now ?? systemClock;
  }

  get level(): LogLevel {
    return this.state.level;
  }

  // Children share the level, so changing it anywhere applies everywhere.
  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}.${scope}` : scope;
    return new SinkLogger(this.sinks, { scope: nested, now: this.clock }, this.state);
  }

  debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  warn(message: string): void {
    this.log(LogLevel.WARNING, message);
  }

  error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  private log(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.state.level]) return;
    const record: LogRecord = { at: nowInstant(this.clock), level, scope: this.scope, message };
    for (const sink of this.sinks) sink.write(record);
  }
}

export interface CreateLoggerOptions {
  level?: LogLevel;
  stream?: Writable;
  file?: string;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const sinks: LogSink[] = [new StreamLogSink(options.stream ?? process.stderr)];
  if (options.file) {
    sinks.push(new StreamLogSink(fs.createWriteStream(options.file, { flags: 'a' })));
  }
  return new SinkLogger(sinks, { level: options.level });
}

export const silentLogger: Logger = new SinkLogger([]);
