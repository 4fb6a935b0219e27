import { ErrorCode, ErrorStage } from '../types/enums.js';
import type { DriveError } from '../types/error.js';
import { nowInstant } from '../utils/time.js';
import { RemoteError, ValidationError } from './errors.js';

const PERMISSION_CODES = new Set(['EACCES', 'EPERM']);
const RETRYABLE_CODES = new Set([ErrorCode.RATE_LIMITED, ErrorCode.NETWORK, ErrorCode.IO_ERROR]);

export function mapRemoteError(err: unknown, stage: ErrorStage, subject?: string): DriveError {
  let code: ErrorCode = ErrorCode.UNKNOWN;
  let status: number | undefined;
  if (err instanceof RemoteError) {
    code = err.code;
    status = err.status;
  } else if (err instanceof ValidationError) {
    code = ErrorCode.VALIDATION;
  } else if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    code = mapOsCode(err.code);
  }
  const retryable = RETRYABLE_CODES.has(code) || (code === ErrorCode.REMOTE && status !== undefined && status >= 500);
  const mapped: DriveError = {
    code,
    stage,
    message: err instanceof Error ? err.message : String(err),
    retryable,
    fatal: code === ErrorCode.AUTH,
    at: nowInstant()
  };
  if (subject !== undefined) mapped.subject = subject;
  if (status !== undefined) mapped.status = status;
  return mapped;
}

export function describeError(error: DriveError): string {
  return error.subject ? `${error.subject}: ${error.message}` : error.message;
}

function mapOsCode(code: string): ErrorCode {
  if (PERMISSION_CODES.has(code)) return ErrorCode.PERMISSION_DENIED;
  if (code === 'ENOENT') return ErrorCode.NOT_FOUND;
  return ErrorCode.IO_ERROR;
}
