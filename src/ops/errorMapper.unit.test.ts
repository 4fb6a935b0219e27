import { describe, expect, it } from 'vitest';
import { describeError, mapRemoteError } from './errorMapper.js';
import { AuthError, RemoteError, ValidationError } from './errors.js';
import { ErrorCode, ErrorStage } from '../types/enums.js';

function osError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('mapRemoteError', () => {
  it('keeps the code and status of remote errors', () => {
    const e = mapRemoteError(
      new RemoteError({ code: ErrorCode.NOT_FOUND, status: 404, message: 'File not found: x1' }),
      ErrorStage.DELETE,
      'report.pdf'
    );
    expect(e).toMatchObject({
      code: ErrorCode.NOT_FOUND,
      stage: ErrorStage.DELETE,
      status: 404,
      subject: 'report.pdf',
      retryable: false,
      fatal: false
    });
  });

  it('treats lost authentication as fatal', () => {
    const e = mapRemoteError(new AuthError('Token expired', { status: 401 }), ErrorStage.UPLOAD);
    expect(e.code).toBe(ErrorCode.AUTH);
    expect(e.fatal).toBe(true);
    expect(e.subject).toBeUndefined();
  });

  it('marks throttling, network and server errors retryable', () => {
    expect(mapRemoteError(new RemoteError({ code: ErrorCode.RATE_LIMITED, status: 429, message: 'slow down' }), ErrorStage.LIST).retryable).toBe(true);
    expect(mapRemoteError(new RemoteError({ code: ErrorCode.NETWORK, message: 'offline' }), ErrorStage.LIST).retryable).toBe(true);
    expect(mapRemoteError(new RemoteError({ code: ErrorCode.REMOTE, status: 503, message: 'busy' }), ErrorStage.LIST).retryable).toBe(true);
    expect(mapRemoteError(new RemoteError({ code: ErrorCode.REMOTE, status: 400, message: 'bad' }), ErrorStage.LIST).retryable).toBe(false);
  });

  it('maps validation and local file system errors', () => {
    expect(mapRemoteError(new ValidationError('File not found: a.txt'), ErrorStage.UPLOAD).code).toBe(ErrorCode.VALIDATION);
    expect(mapRemoteError(osError('EACCES', 'denied'), ErrorStage.DOWNLOAD).code).toBe(ErrorCode.PERMISSION_DENIED);
    expect(mapRemoteError(osError('ENOENT', 'missing'), ErrorStage.DOWNLOAD).code).toBe(ErrorCode.NOT_FOUND);
    expect(mapRemoteError(osError('ENOSPC', 'full'), ErrorStage.DOWNLOAD)).toMatchObject({ code: ErrorCode.IO_ERROR, retryable: true });
  });

  it('falls back to UNKNOWN for anything else', () => {
    const e = mapRemoteError('boom', ErrorStage.INFO);
    expect(e.code).toBe(ErrorCode.UNKNOWN);
    expect(e.message).toBe('boom');
  });
});

describe('describeError', () => {
  it('prefixes the subject when there is one', () => {
    const base = mapRemoteError(new Error('quota exceeded'), ErrorStage.UPLOAD);
    expect(describeError(base)).toBe('quota exceeded');
    expect(describeError({ ...base, subject: 'big.iso' })).toBe('big.iso: quota exceeded');
  });
});
