import { describe, expect, it, vi } from 'vitest';
import { OperationRunner, itemLabel } from './OperationRunner.js';
import { CancellableOperation } from './CancellableOperation.js';
import { AuthError, RemoteError } from './errors.js';
import { QueuedContext } from '../ui/InteractiveContext.js';
import { BatchKind, ErrorCode, ErrorStage } from '../types/enums.js';
import type { BatchJob, BatchSink, OperationStatus } from '../types/operations.js';
import { MemoryLogSink, SinkLogger } from '../log/Logger.js';
import { LogLevel } from '../types/config.js';

function harness(total: number, options: { autoRefresh?: boolean } = {}) {
  const context = new QueuedContext((err) => {
    throw err;
  });
  const statuses: OperationStatus[] = [];
  const calls: string[] = [];
  const logs = new MemoryLogSink();
  const operation = new CancellableOperation('Uploading Files', total, { onStatus: (s) => statuses.push(s) }, context);
  const sink: BatchSink = {
    onItemFailed: vi.fn(() => calls.push('failed')),
    onFatal: vi.fn(() => calls.push('fatal')),
    onCompleted: vi.fn(() => calls.push('completed')),
    onRefresh: vi.fn(() => calls.push('refresh')),
    onFinished: vi.fn(() => calls.push('finished'))
  };
  const runner = new OperationRunner({
    context,
    logger: new SinkLogger([logs]),
    autoRefresh: () => options.autoRefresh ?? true
  });
  return { context, statuses, calls, logs, operation, sink, runner };
}

function uploadJob(items: string[], perform: (item: string) => Promise<void>): BatchJob<string> {
  return {
    kind: BatchKind.UPLOAD,
    items,
    label: (item, index, total) => itemLabel('Uploading', item, index, total),
    subject: (item) => item,
    perform,
    refreshOnSuccess: true
  };
}

describe('OperationRunner', () => {
  it('processes every item and signals completion once when nothing fails', async () => {
    const h = harness(3);
    const performed: string[] = [];
    const report = await h.runner.run(
      h.operation,
      uploadJob(['a.txt', 'b.txt', 'c.txt'], async (item) => {
        performed.push(item);
      }),
      h.sink
    );
    h.context.drain();

    expect(performed).toEqual(['a.txt', 'b.txt', 'c.txt']);
    expect(report.succeeded).toBe(3);
    expect(report.failures).toEqual([]);
    expect(report.skipped).toBe(0);
    expect(h.sink.onCompleted).toHaveBeenCalledTimes(1);
    expect(h.calls).toEqual(['completed', 'refresh', 'finished']);
    expect(h.statuses.map((s) => s.label)).toEqual([
      'Uploading: a.txt (1/3)',
      'Uploading: b.txt (2/3)',
      'Uploading: c.txt (3/3)',
      'Done: 3 of 3 succeeded'
    ]);
  });

  it('reports percentages from items started, monotonic and capped at 100', async () => {
    const h = harness(4);
    await h.runner.run(h.operation, uploadJob(['a', 'b', 'c', 'd'], async () => {}), h.sink);
    h.context.drain();

    const percents = h.statuses.map((s) => s.percent ?? 0);
    expect(percents).toEqual([0, 25, 50, 75, 100]);
    for (let i = 1; i < percents.length; i += 1) {
      expect(percents[i]).toBeGreaterThanOrEqual(percents[i - 1]);
    }
  });

  it('stops at the next item boundary after a cancel request', async () => {
    const h = harness(5);
    const performed: string[] = [];
    const report = await h.runner.run(
      h.operation,
      uploadJob(['a', 'b', 'c', 'd', 'e'], async (item) => {
        performed.push(item);
        if (item === 'b') h.operation.requestCancel();
      }),
      h.sink
    );
    h.context.drain();

    expect(performed).toEqual(['a', 'b']);
    expect(report.attempted).toBe(2);
    expect(report.succeeded).toBe(2);
    expect(report.skipped).toBe(3);
    expect(report.cancelled).toBe(true);
    expect(report.failures).toEqual([]);
    expect(h.sink.onCompleted).not.toHaveBeenCalled();
    expect(h.sink.onRefresh).not.toHaveBeenCalled();
    expect(h.calls).toEqual(['finished']);
    expect(h.statuses.map((s) => s.percent)).toEqual([0, 20, 20, 40]);
    expect(h.statuses[3].label).toBe('Cancelled after 2 of 5');
  });

  it('keeps going after per-item failures and records each one', async () => {
    const h = harness(5);
    const performed: string[] = [];
    const report = await h.runner.run(
      h.operation,
      uploadJob(['a', 'b', 'c', 'd', 'e'], async (item) => {
        performed.push(item);
        if (item === 'b' || item === 'd') {
          throw new RemoteError({ code: ErrorCode.NOT_FOUND, status: 404, message: `missing ${item}` });
        }
      }),
      h.sink
    );
    h.context.drain();

    expect(performed).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(report.succeeded).toBe(3);
    expect(report.failures).toHaveLength(2);
    expect(report.failures[0]).toMatchObject({
      code: ErrorCode.NOT_FOUND,
      stage: ErrorStage.UPLOAD,
      subject: 'b',
      message: 'missing b',
      status: 404,
      fatal: false
    });
    expect(h.operation.tracker.errors).toEqual(['b: missing b', 'd: missing d']);
    expect(h.operation.tracker.completedItems).toBe(5);
    expect(h.calls).toEqual(['failed', 'failed', 'completed', 'refresh', 'finished']);
    expect(h.logs.messages()).toContain('UPLOAD item failed: b: missing b');
  });

  it('logs temporary item failures as warnings', async () => {
    const h = harness(2);
    await h.runner.run(
      h.operation,
      uploadJob(['a', 'b'], async (item) => {
        if (item === 'a') throw new RemoteError({ code: ErrorCode.RATE_LIMITED, status: 429, message: 'slow down' });
        throw new RemoteError({ code: ErrorCode.REMOTE, status: 400, message: 'bad request' });
      }),
      h.sink
    );
    h.context.drain();

    expect(h.logs.messages(LogLevel.WARNING)).toEqual(['UPLOAD item failed (temporary): a: slow down']);
    expect(h.logs.messages(LogLevel.ERROR)).toEqual(['UPLOAD item failed: b: bad request']);
  });

  it('aborts on a fatal error and reports it apart from item failures', async () => {
    const h = harness(3);
    const performed: string[] = [];
    const report = await h.runner.run(
      h.operation,
      uploadJob(['a', 'b', 'c'], async (item) => {
        performed.push(item);
        if (item === 'b') throw new AuthError('Token has been revoked', { status: 401 });
      }),
      h.sink
    );
    h.context.drain();

    expect(performed).toEqual(['a', 'b']);
    expect(report.succeeded).toBe(1);
    expect(report.failures).toEqual([]);
    expect(report.fatal).toMatchObject({ code: ErrorCode.AUTH, fatal: true, subject: 'b' });
    expect(report.skipped).toBe(1);
    expect(h.calls).toEqual(['fatal', 'finished']);
    expect(h.statuses[h.statuses.length - 1].label).toBe('Aborted: Token has been revoked');
  });

  it('does not signal completion when nothing succeeded', async () => {
    const h = harness(1);
    await h.runner.run(
      h.operation,
      uploadJob(['a'], async () => {
        throw new Error('disk full');
      }),
      h.sink
    );
    h.context.drain();
    expect(h.calls).toEqual(['failed', 'finished']);
  });

  it('skips the refresh when auto refresh is off', async () => {
    const h = harness(1, { autoRefresh: false });
    await h.runner.run(h.operation, uploadJob(['a'], async () => {}), h.sink);
    h.context.drain();
    expect(h.calls).toEqual(['completed', 'finished']);
  });

  it('finishes an empty batch without completion', async () => {
    const h = harness(0);
    const report = await h.runner.run(h.operation, uploadJob([], async () => {}), h.sink);
    h.context.drain();
    expect(report.attempted).toBe(0);
    expect(h.calls).toEqual(['finished']);
    expect(h.statuses.map((s) => s.percent)).toEqual([0]);
  });
});
