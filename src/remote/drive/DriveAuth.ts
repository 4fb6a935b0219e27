import fs from 'node:fs';
import { ErrorCode } from '../../types/enums.js';
import { AuthError, RemoteError } from '../../ops/errors.js';
import type { Logger } from '../../log/Logger.js';
import { silentLogger } from '../../log/Logger.js';
import { systemClock, type Clock } from '../../utils/time.js';
import { isRecord, numberField, parseJson, stringField } from './json.js';

export const DEFAULT_TOKEN_URI = 'https://oauth2.googleapis.com/token';
export const EXPIRY_MARGIN_MS = 60_000;

export interface TokenProvider {
  getAccessToken(): Promise<string>;
  /** Forgets the cached access token so the next call refreshes it. */
  invalidate(): void;
}

export interface StoredCredentials {
  client_id: string;
  client_secret: string;
  refresh_token: string;
  access_token?: string;
  token_expiry?: string;
  token_uri?: string;
}

export interface CredentialsFileOptions {
  now?: Clock;
  logger?: Logger;
}

export function parseCredentials(raw: unknown, source: string): StoredCredentials {
  if (!isRecord(raw)) throw new AuthError(`Invalid credentials file: ${source}`);
  const clientId = stringField(raw, 'client_id');
  const clientSecret = stringField(raw, 'client_secret');
  const refreshToken = stringField(raw, 'refresh_token');
  if (!clientId || !clientSecret || !refreshToken) {
    throw new AuthError(`Credentials file is missing client_id, client_secret or refresh_token: ${source}`);
  }
  const creds: StoredCredentials = { client_id: clientId, client_secret: clientSecret, refresh_token: refreshToken };
  const accessToken = stringField(raw, 'access_token');
  const expiry = stringField(raw, 'token_expiry');
  const tokenUri = stringField(raw, 'token_uri');
  if (accessToken) creds.access_token = accessToken;
  if (expiry) creds.token_expiry = expiry;
  if (tokenUri) creds.token_uri = tokenUri;
  return creds;
}

/**
 * Access tokens from a stored OAuth credentials file. Tokens are refreshed
 * shortly before they expire and the new token is written back to the file.
 */
export class CredentialsFileTokenProvider implements TokenProvider {
  private credentials: StoredCredentials | undefined;
  private pending: Promise<string> | undefined;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(readonly file: string, options: CredentialsFileOptions = {}) {
    this.clock = options.now ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  async getAccessToken(): Promise<string> {
    const creds = await this.load();
    if (creds.access_token && this.isFresh(creds.token_expiry)) return creds.access_token;
    if (!this.pending) {
      this.pending = this.refresh(creds).finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  invalidate(): void {
    if (this.credentials) delete this.credentials.access_token;
  }

  private isFresh(expiry: string | undefined): boolean {
    if (!expiry) return false;
    const at = Date.parse(expiry);
    return Number.isFinite(at) && at - EXPIRY_MARGIN_MS > this.clock();
  }

  private async load(): Promise<StoredCredentials> {
    if (this.credentials) return this.credentials;
    let text: string;
    try {
      text = await fs.promises.readFile(this.file, 'utf8');
    } catch (err) {
      throw new AuthError(`Credentials file not found: ${this.file}`, { cause: err });
    }
    this.credentials = parseCredentials(parseJson(text), this.file);
    return this.credentials;
  }

  private async refresh(creds: StoredCredentials): Promise<string> {
    const body = new URLSearchParams({
      client_id: creds.client_id,
      client_secret: creds.client_secret,
      refresh_token: creds.refresh_token,
      grant_type: 'refresh_token'
    });
    let res: Response;
    try {
      res = await fetch(creds.token_uri ?? DEFAULT_TOKEN_URI, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString()
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RemoteError({ code: ErrorCode.NETWORK, message: `Token refresh failed: ${reason}`, cause: err });
    }

    const payload = parseJson(await res.text());
    const token = isRecord(payload) ? stringField(payload, 'access_token') : undefined;
    if (!res.ok || !token) {
      const reason = isRecord(payload)
        ? stringField(payload, 'error_description') ?? stringField(payload, 'error')
        : undefined;
      const message = `Token refresh failed: ${reason ?? `HTTP ${res.status}`}`;
      // Only a refused grant or client means the credentials are bad.
      if (res.status === 400 || res.status === 401) throw new AuthError(message, { status: res.status });
      const code = res.status === 429 ? ErrorCode.RATE_LIMITED : ErrorCode.REMOTE;
      throw new RemoteError({ code, status: res.status, message });
    }

    const expiresIn = isRecord(payload) ? numberField(payload, 'expires_in') ?? 3600 : 3600;
    creds.access_token = token;
    creds.token_expiry = new Date(this.clock() + expiresIn * 1000).toISOString();
    await this.persist(creds);
    this.logger.debug('Access token refreshed');
    return token;
  }

  private async persist(creds: StoredCredentials): Promise<void> {
    try {
      await fs.promises.writeFile(this.file, `${JSON.stringify(creds, null, 2)}\n`, 'utf8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Could not save refreshed credentials to ${this.file}: ${reason}`);
    }
  }
}
