import type { Instant } from './ids.js';
import type { DriveError } from './error.js';
import { BatchKind, ErrorStage } from './enums.js';

export interface OperationStatus {
  title: string;
  label: string;
  percent?: number;
  /** Set once at least one item has completed. */
  etaSeconds?: number;
  totalItems: number;
  completedItems: number;
  errors: readonly string[];
  cancelled: boolean;
}

export interface StatusListener {
  onStatus(status: OperationStatus): void;
}

export interface BatchJob<T> {
  kind: BatchKind;
  items: readonly T[];
  label(item: T, index: number, total: number): string;
  perform(item: T): Promise<void>;
  /** Name of the item used in error records. Defaults to the label. */
  subject?(item: T): string;
  stage?: ErrorStage;
  refreshOnSuccess: boolean;
}

export interface BatchReport {
  kind: BatchKind;
  total: number;
  attempted: number;
  succeeded: number;
  failures: DriveError[];
  skipped: number;
  cancelled: boolean;
  fatal?: DriveError;
  startedAt: Instant;
  finishedAt: Instant;
}

export interface BatchSink {
  onItemFailed(error: DriveError): void;
  onFatal(error: DriveError, report: BatchReport): void;
  onCompleted(report: BatchReport): void;
  onRefresh(): void;
  onFinished(report: BatchReport): void;
}
