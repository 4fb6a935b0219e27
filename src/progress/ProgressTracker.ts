import type { Clock } from '../utils/time.js';
import { secondsBetween, systemClock } from '../utils/time.js';

export interface ProgressTrackerOptions {
  now?: Clock;
}

/** Counter-based progress for one batch. No I/O. */
export class ProgressTracker {
  readonly totalItems: number;
  private completed = 0;
  private label = '';
  private readonly errorList: string[] = [];
  private readonly clock: Clock;
  private readonly startedAtMs: number;

  constructor(totalItems: number, options: ProgressTrackerOptions = {}) {
    if (!Number.isInteger(totalItems) || totalItems < 0) {
      throw new RangeError(`totalItems must be a non-negative integer, got ${totalItems}`);
    }
    this.totalItems = totalItems;
    this.clock = options.now ?? systemClock;
    this.startedAtMs = this.clock();
  }

  get completedItems(): number {
    return this.completed;
  }

  get currentItemLabel(): string {
    return this.label;
  }

  get errors(): readonly string[] {
    return this.errorList;
  }

  // Decreases are ignored; completedItems never goes backwards.
  update(completed: number, currentItem?: string): void {
    const next = Math.min(this.totalItems, Math.max(0, Math.floor(completed)));
    if (next > this.completed) this.completed = next;
    if (currentItem !== undefined) this.label = currentItem;
  }

  advance(): void {
    this.update(this.completed + 1);
  }

  setCurrentItem(label: string): void {
    this.label = label;
  }

  addError(message: string): void {
    this.errorList.push(message);
  }

  get percentage(): number {
    if (this.totalItems === 0) return 0;
    return (this.completed / this.totalItems) * 100;
  }

  get elapsedSeconds(): number {
    return secondsBetween(this.startedAtMs, this.clock());
  }

  get estimatedSecondsRemaining(): number | undefined {
    if (this.completed === 0) return undefined;
    const elapsed = this.elapsedSeconds;
    if (elapsed <= 0) return undefined;
    const rate = this.completed / elapsed;
    return (this.totalItems - this.completed) / rate;
  }

  statusMessage(): string {
    if (this.label) {
      return `Processing: ${this.label} (${this.completed}/${this.totalItems})`;
    }
    return `Progress: ${this.completed}/${this.totalItems} (${this.percentage.toFixed(1)}%)`;
  }
}
