import { setTimeout as delay } from 'node:timers/promises';
import { ErrorCode } from '../../types/enums.js';
import { AuthError, RemoteError } from '../../ops/errors.js';
import type { Logger } from '../../log/Logger.js';
import { silentLogger } from '../../log/Logger.js';
import type { TokenProvider } from './DriveAuth.js';
import { isRecord, parseJson, stringField } from './json.js';

export const DRIVE_API_BASE = 'https://www.googleapis.com';

const RATE_LIMIT_REASONS = new Set(['rateLimitExceeded', 'userRateLimitExceeded']);

/** Opens a fresh body stream for each attempt, so retried requests can resend it. */
export type BodySource = () => AsyncIterable<Uint8Array>;

export interface DriveRequest {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  path: string;
  /** Absolute URL used instead of path, such as a resumable upload session. */
  location?: string;
  query?: Record<string, string>;
  headers?: Record<string, string>;
  body?: string | Uint8Array | BodySource;
}

export interface DriveClientOptions {
  tokens: TokenProvider;
  baseUrl?: string;
  /** Extra attempts for throttled and server-side failures. */
  retries?: number;
  /** Base delay for exponential backoff when no Retry-After is sent. */
  retryDelayMs?: number;
  logger?: Logger;
}

export function parseRetryAfterSeconds(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number.parseInt(value, 10);
  if (Number.isFinite(seconds)) return Math.max(0, seconds);
  const parsedDate = Date.parse(value);
  if (!Number.isNaN(parsedDate)) {
    const diffMs = parsedDate - now;
    return diffMs <= 0 ? 0 : Math.ceil(diffMs / 1000);
  }
  return undefined;
}

/** Builds a RemoteError from a failed Drive response body. */
export function parseDriveError(status: number, bodyText: string, retryAfterSeconds?: number): RemoteError {
  const parsed = parseJson(bodyText);
  const body = isRecord(parsed) && isRecord(parsed.error) ? parsed.error : undefined;
  let reason: string | undefined;
  if (body && Array.isArray(body.errors)) {
    const first: unknown = body.errors[0];
    if (isRecord(first)) reason = stringField(first, 'reason');
  }
  const message = (body && stringField(body, 'message')) || bodyText.trim() || `HTTP ${status}`;
  return new RemoteError({ code: codeForStatus(status, reason), status, reason, message, retryAfterSeconds });
}

function codeForStatus(status: number, reason: string | undefined): ErrorCode {
  if (status === 401) return ErrorCode.AUTH;
  if (status === 403) {
    return reason && RATE_LIMIT_REASONS.has(reason) ? ErrorCode.RATE_LIMITED : ErrorCode.PERMISSION_DENIED;
  }
  if (status === 404) return ErrorCode.NOT_FOUND;
  if (status === 429) return ErrorCode.RATE_LIMITED;
  return ErrorCode.REMOTE;
}

function isRetryable(error: RemoteError): boolean {
  return error.code === ErrorCode.RATE_LIMITED || (error.status !== undefined && error.status >= 500);
}

/**
 * Authenticated requests against the Drive REST API. Throws RemoteError for
 * every failed response; AuthError once a refreshed token is also refused.
 */
export class DriveClient {
  private readonly tokens: TokenProvider;
  private readonly baseUrl: string;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(options: DriveClientOptions) {
    this.tokens = options.tokens;
    this.baseUrl = options.baseUrl ?? DRIVE_API_BASE;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.logger = options.logger ?? silentLogger;
  }

  url(path: string, query?: Record<string, string>): string {
    const qs = query ? new URLSearchParams(query).toString() : '';
    return `${this.baseUrl}${path}${qs ? `?${qs}` : ''}`;
  }

  async send(request: DriveRequest): Promise<Response> {
    const method = request.method ?? 'GET';
    const url = request.location ?? this.url(request.path, request.query);
    let attempt = 0;
    let reauthorized = false;

    for (;;) {
      const token = await this.tokens.getAccessToken();
      let res: Response;
      try {
        const headers = { ...request.headers, Authorization: `Bearer ${token}` };
        res =
          typeof request.body === 'function'
            ? await fetch(url, { method, headers, body: request.body(), duplex: 'half' })
            : await fetch(url, { method, headers, body: request.body });
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new RemoteError({ code: ErrorCode.NETWORK, message: `Network error: ${reason}`, cause: err });
      }
      if (res.ok) {
        this.logger.debug(`${method} ${request.path} -> ${res.status}`);
        return res;
      }

      const bodyText = await res.text().catch(() => '');
      const error = parseDriveError(res.status, bodyText, parseRetryAfterSeconds(res.headers.get('Retry-After')));

      if (res.status === 401) {
        this.tokens.invalidate();
        if (!reauthorized) {
          reauthorized = true;
          this.logger.debug(`${method} ${request.path} unauthorized, refreshing token`);
          continue;
        }
        throw new AuthError(`Authentication failed: ${error.message}`, { status: 401, cause: error });
      }

      if (isRetryable(error) && attempt < this.retries) {
        attempt += 1;
        const waitMs =
          error.retryAfterSeconds !== undefined ? error.retryAfterSeconds * 1000 : this.retryDelayMs * 2 ** (attempt - 1);
        this.logger.warn(`${method} ${request.path} failed with ${res.status}, retry ${attempt}/${this.retries} in ${waitMs} ms`);
        await delay(waitMs);
        continue;
      }
      throw error;
    }
  }

  async json(request: DriveRequest): Promise<unknown> {
    const res = await this.send(request);
    const text = await res.text();
    return text ? parseJson(text) : undefined;
  }
}
