import { ErrorCode } from '../types/enums.js';

export class RemoteError extends Error {
  readonly code: ErrorCode;
  readonly status?: number;
  readonly reason?: string;
  readonly retryAfterSeconds?: number;

  constructor(args: {
    code: ErrorCode;
    message: string;
    status?: number;
    reason?: string;
    retryAfterSeconds?: number;
    cause?: unknown;
  }) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = 'RemoteError';
    this.code = args.code;
    this.status = args.status;
    this.reason = args.reason;
    this.retryAfterSeconds = args.retryAfterSeconds;
  }
}

export class AuthError extends RemoteError {
  constructor(message: string, args: { status?: number; cause?: unknown } = {}) {
    super({ code: ErrorCode.AUTH, message, status: args.status, cause: args.cause });
    this.name = 'AuthError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
