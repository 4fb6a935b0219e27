import type { Instant } from './ids.js';
import { ErrorCode, ErrorStage } from './enums.js';

export interface DriveError {
  code: ErrorCode;
  stage: ErrorStage;
  message: string;
  /** Display name of the item the failure belongs to, when there is one. */
  subject?: string;
  retryable: boolean;
  fatal: boolean;
  status?: number;
  at: Instant;
}
