import type { BatchJob, BatchReport, BatchSink } from '../types/operations.js';
import type { DriveError } from '../types/error.js';
import { BatchKind, ErrorStage } from '../types/enums.js';
import type { InteractiveContext } from '../ui/InteractiveContext.js';
import type { Logger } from '../log/Logger.js';
import { silentLogger } from '../log/Logger.js';
import { nowInstant, systemClock, type Clock } from '../utils/time.js';
import type { CancellableOperation } from './CancellableOperation.js';
import { describeError, mapRemoteError } from './errorMapper.js';

const STAGE_BY_KIND: Record<BatchKind, ErrorStage> = {
  [BatchKind.UPLOAD]: ErrorStage.UPLOAD,
  [BatchKind.DOWNLOAD]: ErrorStage.DOWNLOAD,
  [BatchKind.DELETE]: ErrorStage.DELETE,
  [BatchKind.FOLDER_UPLOAD]: ErrorStage.UPLOAD
};

export function itemLabel(verb: string, name: string, index: number, total: number): string {
  return `${verb}: ${name} (${index + 1}/${total})`;
}

export interface OperationRunnerOptions {
  context: InteractiveContext;
  logger?: Logger;
  autoRefresh?: () => boolean;
  now?: Clock;
}

/**
 * Executes a batch strictly in order, one remote call at a time.
 *
 * Per-item failures are recorded and iteration continues; a fatal error
 * (lost authentication) stops the batch. Every sink callback is posted to
 * the interactive context, `onFinished` always last. `run` never rejects.
 */
export class OperationRunner {
  private readonly context: InteractiveContext;
  private readonly logger: Logger;
  private readonly autoRefresh: () => boolean;
  private readonly clock: Clock;

  constructor(options: OperationRunnerOptions) {
    this.context = options.context;
    this.logger = options.logger ?? silentLogger;
    this.autoRefresh = options.autoRefresh ?? (() => false);
    this.clock = options.now ?? systemClock;
  }

  async run<T>(operation: CancellableOperation, job: BatchJob<T>, sink: BatchSink): Promise<BatchReport> {
    const total = job.items.length;
    const stage = job.stage ?? STAGE_BY_KIND[job.kind];
    const startedAt = nowInstant(this.clock);
    const failures: DriveError[] = [];
    let attempted = 0;
    let succeeded = 0;
    let fatal: DriveError | undefined;

    this.logger.info(`${job.kind} started: ${total} item(s)`);

    for (let index = 0; index < total; index += 1) {
      if (operation.isCancelled()) break;
      const item = job.items[index];
      const label = job.label(item, index, total);
      // Percentage reflects items processed before this one.
      operation.reportStatus(label, (index / total) * 100);
      attempted += 1;
      try {
        await job.perform(item);
        succeeded += 1;
      } catch (err) {
        const error = mapRemoteError(err, stage, job.subject ? job.subject(item) : label);
        if (error.fatal) {
          fatal = error;
          this.logger.error(`${job.kind} aborted: ${describeError(error)}`);
          break;
        }
        failures.push(error);
        operation.tracker.addError(describeError(error));
        if (error.retryable) this.logger.warn(`${job.kind} item failed (temporary): ${describeError(error)}`);
        else this.logger.error(`${job.kind} item failed: ${describeError(error)}`);
        this.context.post(() => sink.onItemFailed(error));
      }
      operation.tracker.advance();
    }

    const cancelled = operation.isCancelled();
    const report: BatchReport = {
      kind: job.kind,
      total,
      attempted,
      succeeded,
      failures,
      skipped: total - attempted,
      cancelled,
      startedAt,
      finishedAt: nowInstant(this.clock)
    };
    if (fatal) report.fatal = fatal;

    operation.reportStatus(finalLabel(report), operation.tracker.percentage);
    this.logger.info(
      `${job.kind} finished: ${succeeded} succeeded, ${failures.length} failed, ${report.skipped} skipped${
        cancelled ? ' (cancelled)' : ''
      }`
    );

    const fatalError = report.fatal;
    if (fatalError) {
      this.context.post(() => sink.onFatal(fatalError, report));
    } else if (succeeded > 0 && !cancelled) {
      this.context.post(() => sink.onCompleted(report));
      if (job.refreshOnSuccess && this.autoRefresh()) {
        this.context.post(() => sink.onRefresh());
      }
    }
    this.context.post(() => sink.onFinished(report));
    return report;
  }
}

function finalLabel(report: BatchReport): string {
  if (report.fatal) return `Aborted: ${report.fatal.message}`;
  if (report.cancelled) return `Cancelled after ${report.attempted} of ${report.total}`;
  return `Done: ${report.succeeded} of ${report.total} succeeded`;
}
