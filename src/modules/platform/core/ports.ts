/**
 * Platform Module - Ports
 *
 * The single I/O capability the tool layer depends on.
 */

import type { PlatformError } from './errors.js';
import type { Result } from 'neverthrow';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface PlatformResponse {
  readonly data: unknown;
  readonly status: number;
}

export interface PlatformClient {
  /**
   * Sends one request to the platform REST API.
   * `path` is relative to `/api`, e.g. `card/12`.
   */
  request(
    method: HttpMethod,
    path: string,
    body?: unknown
  ): Promise<Result<PlatformResponse, PlatformError>>;
}
