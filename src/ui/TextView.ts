import type { Writable } from 'node:stream';
import type { OperationStatus } from '../types/operations.js';
import type { DriveView, NavigationView, ProgressSurface } from './DriveView.js';
import type { ListingRow } from './ListingModel.js';
import { formatDuration } from './format.js';

export type Prompt = (question: string) => Promise<string>;

export interface TextViewOptions {
  out: Writable;
  /** Asks the user a question; without it confirmations use `assumeYes`. */
  prompt?: Prompt;
  assumeYes?: boolean;
}

const YES = new Set(['y', 'yes']);

function indent(message: string): string {
  return message
    .split('\n')
    .map((line) => (line ? `  ${line}` : ''))
    .join('\n');
}

export function formatProgressLine(status: OperationStatus): string {
  const percent = status.percent === undefined ? '' : ` [${Math.round(status.percent)}%]`;
  const eta = status.etaSeconds === undefined ? '' : ` ${formatDuration(status.etaSeconds)} left`;
  return `${status.title}: ${status.label}${percent}${eta}`;
}

export function formatListing(rows: readonly ListingRow[]): string[] {
  const nameWidth = Math.max(4, ...rows.map((row) => row.name.length));
  const sizeWidth = Math.max(4, ...rows.map((row) => row.size.length));
  const header = `  #  ${'Name'.padEnd(nameWidth + 3)}  ${'Size'.padStart(sizeWidth)}  ${'Modified'.padEnd(16)}  Type`;
  const lines = rows.map(
    (row) =>
      `${String(row.position).padStart(3)}  ${row.icon} ${row.name.padEnd(nameWidth)}  ${row.size.padStart(sizeWidth)}  ${row.modified.padEnd(16)}  ${row.type}`
  );
  return [header, ...lines];
}

/** Line-oriented view for terminals. */
export class TextView implements DriveView {
  private readonly out: Writable;
  private readonly prompt: Prompt | undefined;
  private readonly assumeYes: boolean;
  private readonly cancels = new Set<() => void>();

  constructor(options: TextViewOptions) {
    this.out = options.out;
    this.prompt = options.prompt;
    this.assumeYes = options.assumeYes ?? false;
  }

  showStatus(message: string): void {
    this.print(`-- ${message}`);
  }

  showListing(rows: readonly ListingRow[], summary: string): void {
    if (rows.length > 0) {
      for (const line of formatListing(rows)) this.print(line);
    }
    this.print(`(${summary})`);
  }

  showNavigation(navigation: NavigationView): void {
    this.print(`Location: ${navigation.path}${navigation.canGoBack ? '' : ' (top)'}`);
  }

  showInfo(title: string, message: string): void {
    this.print(`${title}\n${indent(message)}`);
  }

  showWarning(title: string, message: string): void {
    this.print(`Warning: ${title}\n${indent(message)}`);
  }

  showError(title: string, message: string): void {
    this.print(`Error: ${title}\n${indent(message)}`);
  }

  async confirm(title: string, message: string): Promise<boolean> {
    if (!this.prompt) return this.assumeYes;
    const answer = await this.prompt(`${title}\n${indent(message)}\n[y/N] `);
    return YES.has(answer.trim().toLowerCase());
  }

  openProgress(title: string, cancel: () => void): ProgressSurface {
    let last = '';
    this.cancels.add(cancel);
    this.print(`${title}...`);
    return {
      update: (status) => {
        const line = formatProgressLine(status);
        if (line === last) return;
        last = line;
        this.print(`  ${line}`);
      },
      close: () => {
        last = '';
        this.cancels.delete(cancel);
      }
    };
  }

  /** Cancels every batch whose progress is still open; returns how many were asked. */
  cancelProgress(): number {
    const open = [...this.cancels];
    for (const cancel of open) cancel();
    return open.length;
  }

  private print(text: string): void {
    this.out.write(`${text}\n`);
  }
}
