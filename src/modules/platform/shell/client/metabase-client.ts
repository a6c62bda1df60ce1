/**
 * Metabase REST Client
 *
 * PlatformClient over Node's fetch. Authenticates with an API key when one
 * is configured, otherwise with a username/password session that is
 * refreshed once when the platform answers 401. Concurrent requests share
 * one login.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createPlatformError,
  extractPlatformMessage,
  type PlatformError,
} from '../../core/errors.js';

import type { HttpMethod, PlatformClient, PlatformResponse } from '../../core/ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface MetabaseClientConfig {
  /** Instance root, e.g. `https://metabase.example.com` */
  baseUrl: string;
  apiKey?: string | undefined;
  username?: string | undefined;
  password?: string | undefined;
  /** Per-request timeout */
  timeoutMs: number;
  logger: Logger;
  /** Defaults to the global fetch */
  fetchFn?: FetchFn;
}

const SESSION_HEADER = 'X-Metabase-Session';
const API_KEY_HEADER = 'X-API-KEY';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const parseBody = async (response: Response): Promise<unknown> => {
  const text = await response.text();
  if (text === '') return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
};

const mapCaughtError = (error: unknown): PlatformError => {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return createPlatformError('TIMEOUT', 'Request to the platform timed out');
    }
    return createPlatformError('NETWORK', error.message);
  }
  return createPlatformError('UNKNOWN', String(error));
};

const normalizePath = (path: string): string => path.replace(/^\/+/, '').replace(/^api\//, '');

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeMetabaseClient = (config: MetabaseClientConfig): PlatformClient => {
  const { apiKey, username, password, timeoutMs, logger } = config;
  const fetchFn: FetchFn = config.fetchFn ?? ((url, init) => fetch(url, init));
  const apiBase = `${config.baseUrl.replace(/\/+$/, '')}/api`;
  const log = logger.child({ component: 'MetabaseClient' });

  let sessionToken: string | undefined;
  let pendingLogin: Promise<Result<string, PlatformError>> | undefined;

  const send = async (
    method: HttpMethod,
    path: string,
    body: unknown,
    headers: Record<string, string>
  ): Promise<Result<PlatformResponse, PlatformError>> => {
    try {
      const response = await fetchFn(`${apiBase}/${normalizePath(path)}`, {
        method,
        headers: { 'Content-Type': 'application/json', ...headers },
        ...(body !== undefined && { body: JSON.stringify(body) }),
        signal: AbortSignal.timeout(timeoutMs),
      });
      return ok({ data: await parseBody(response), status: response.status });
    } catch (error) {
      log.warn({ err: error, method, path }, 'Platform request failed');
      return err(mapCaughtError(error));
    }
  };

  const authenticate = async (): Promise<Result<string, PlatformError>> => {
    if (username === undefined || password === undefined) {
      return err(createPlatformError('AUTH', 'No platform credentials configured'));
    }

    log.debug({ username }, 'Opening platform session');
    const result = await send('POST', 'session', { username, password }, {});
    if (result.isErr()) return err(result.error);

    const { data, status } = result.value;
    const token =
      typeof data === 'object' && data !== null && 'id' in data && typeof data.id === 'string'
        ? data.id
        : undefined;
    if (status >= 400 || token === undefined) {
      const reason = extractPlatformMessage(data, status);
      return err(createPlatformError('AUTH', `Authentication failed: ${reason}`, { status }));
    }

    sessionToken = token;
    return ok(token);
  };

  const login = (): Promise<Result<string, PlatformError>> => {
    pendingLogin ??= authenticate().finally(() => {
      pendingLogin = undefined;
    });
    return pendingLogin;
  };

  /** New session unless another request already replaced the stale one */
  const refreshSession = (stale: string | undefined): Promise<Result<string, PlatformError>> => {
    if (sessionToken !== undefined && sessionToken !== stale) {
      return Promise.resolve(ok(sessionToken));
    }
    sessionToken = undefined;
    return login();
  };

  const authHeaders = async (): Promise<Result<Record<string, string>, PlatformError>> => {
    if (apiKey !== undefined) return ok({ [API_KEY_HEADER]: apiKey });
    if (sessionToken !== undefined) return ok({ [SESSION_HEADER]: sessionToken });

    const token = await login();
    return token.map((value) => ({ [SESSION_HEADER]: value }));
  };

  return {
    async request(method, path, body) {
      log.debug({ method, path }, 'Platform request');

      const headers = await authHeaders();
      if (headers.isErr()) return err(headers.error);

      let result = await send(method, path, body, headers.value);

      // Expired session: log in again and retry once
      if (result.isOk() && result.value.status === 401 && apiKey === undefined) {
        const fresh = await refreshSession(headers.value[SESSION_HEADER]);
        if (fresh.isErr()) return err(fresh.error);
        result = await send(method, path, body, { [SESSION_HEADER]: fresh.value });
      }

      if (result.isErr()) return err(result.error);

      const { data, status } = result.value;
      if (status >= 400) {
        const message = extractPlatformMessage(data, status);
        log.warn({ method, path, status, message }, 'Platform returned an error');
        return err(
          createPlatformError(status === 401 || status === 403 ? 'AUTH' : 'HTTP', message, {
            status,
            body: data,
          })
        );
      }

      return ok(result.value);
    },
  };
};
