import type { OperationStatus } from '../types/operations.js';
import type { ListingRow } from './ListingModel.js';

export interface NavigationView {
  path: string;
  folderName: string;
  canGoBack: boolean;
}

/** Progress display for one running batch. */
export interface ProgressSurface {
  update(status: OperationStatus): void;
  close(): void;
}

/**
 * Everything the browser shows. Implementations are only called from the
 * interactive context or from synchronous user-action entry points.
 */
export interface DriveView {
  showStatus(message: string): void;
  showListing(rows: readonly ListingRow[], summary: string): void;
  showNavigation(navigation: NavigationView): void;
  showInfo(title: string, message: string): void;
  showWarning(title: string, message: string): void;
  showError(title: string, message: string): void;
  confirm(title: string, message: string): Promise<boolean>;
  /** `cancel` requests cancellation of the batch behind the surface. */
  openProgress(title: string, cancel: () => void): ProgressSurface;
}
