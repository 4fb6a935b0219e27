import type { OperationStatus, StatusListener } from '../types/operations.js';
import type { InteractiveContext } from '../ui/InteractiveContext.js';
import { ProgressTracker, type ProgressTrackerOptions } from '../progress/ProgressTracker.js';

export const CANCELLING_LABEL = 'Cancelling operation...';

/**
 * Status holder and cooperative cancellation flag for one batch.
 *
 * Cancellation never interrupts an in-flight remote call; the runner polls
 * `isCancelled()` before starting each item. Status updates reach the listener
 * through the interactive context, never on the caller's stack.
 */
export class CancellableOperation {
  readonly tracker: ProgressTracker;
  private cancelled = false;
  private lastPercent: number | undefined;

  constructor(
    readonly title: string,
    totalItems: number,
    private readonly listener: StatusListener,
    private readonly context: InteractiveContext,
    options: ProgressTrackerOptions = {}
  ) {
    this.tracker = new ProgressTracker(totalItems, options);
  }

  requestCancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.publish(CANCELLING_LABEL, this.lastPercent);
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  // Explicit percentages are clamped to [last reported, 100].
  reportStatus(label: string, percent?: number): void {
    this.tracker.setCurrentItem(label);
    let effective: number | undefined;
    if (percent !== undefined && Number.isFinite(percent)) {
      effective = Math.min(100, Math.max(this.lastPercent ?? 0, percent));
      this.lastPercent = effective;
    }
    this.publish(label, effective);
  }

  get status(): OperationStatus {
    return this.snapshot(this.tracker.currentItemLabel, this.lastPercent);
  }

  private publish(label: string, percent: number | undefined): void {
    const status = this.snapshot(label, percent);
    this.context.post(() => this.listener.onStatus(status));
  }

  private snapshot(label: string, percent: number | undefined): OperationStatus {
    const status: OperationStatus = {
      title: this.title,
      label,
      totalItems: this.tracker.totalItems,
      completedItems: this.tracker.completedItems,
      errors: [...this.tracker.errors],
      cancelled: this.cancelled
    };
    if (percent !== undefined) status.percent = percent;
    const eta = this.tracker.estimatedSecondsRemaining;
    if (eta !== undefined && status.completedItems < status.totalItems) status.etaSeconds = eta;
    return status;
  }
}
