/**
 * Test fakes and mocks
 */

import { err, ok, type Result } from 'neverthrow';
import pino from 'pino';

import { makeIdentifierGenerator, type RandomSource } from '@/modules/parameters/index.js';
import {
  createPlatformError,
  type HttpMethod,
  type PlatformClient,
  type PlatformError,
  type PlatformResponse,
} from '@/modules/platform/index.js';

import type { Logger } from 'pino';

/**
 * Logger that discards everything.
 */
export const makeSilentLogger = (): Logger => pino({ level: 'silent' });

/**
 * Deterministic random source.
 *
 * UUIDs count up from `...000000000001`. `randomInt` walks 0, 1, 2, ... modulo
 * `max`, so successive short ids read `ABCDEFGH`, `IJKLMNOP`, `QRSTUVWX`.
 */
export const makeSequentialRandomSource = (): RandomSource => {
  let uuidCounter = 0;
  let intCounter = 0;
  return {
    randomUUID: () => {
      uuidCounter += 1;
      return `00000000-0000-4000-8000-${String(uuidCounter).padStart(12, '0')}`;
    },
    randomInt: (max) => {
      const value = intCounter % max;
      intCounter += 1;
      return value;
    },
  };
};

/**
 * Random source that always answers the same values, to force collisions.
 */
export const makeConstantRandomSource = (uuid: string, int = 0): RandomSource => ({
  randomUUID: () => uuid,
  randomInt: () => int,
});

export const makeSequentialIds = () => makeIdentifierGenerator(makeSequentialRandomSource());

// ─────────────────────────────────────────────────────────────────────────────
// Platform
// ─────────────────────────────────────────────────────────────────────────────

export interface RecordedRequest {
  method: HttpMethod;
  path: string;
  body: unknown;
}

type RouteHandler = (body: unknown) => Result<PlatformResponse, PlatformError>;

export interface FakePlatformClient extends PlatformClient {
  /** Every request, in order */
  readonly requests: RecordedRequest[];
  /** Requests for one route */
  requestsTo(method: HttpMethod, path: string): RecordedRequest[];
}

/** A 200 answer carrying `data` */
export const respondWith = (data: unknown): RouteHandler => () => ok({ data, status: 200 });

/** A platform error answer */
export const failWith =
  (status: number, message: string): RouteHandler =>
  () =>
    err(createPlatformError(status === 401 ? 'AUTH' : 'HTTP', message, { status }));

/**
 * In-memory platform keyed by `"METHOD path"`, e.g. `"GET card/7"`.
 * Unknown routes answer 404.
 */
export const makeFakePlatformClient = (
  routes: Record<string, RouteHandler | undefined> = {}
): FakePlatformClient => {
  const requests: RecordedRequest[] = [];

  return {
    requests,
    requestsTo: (method, path) =>
      requests.filter((request) => request.method === method && request.path === path),
    request(method, path, body) {
      requests.push({ method, path, body });
      const handler = routes[`${method} ${path}`];
      if (handler === undefined) {
        return Promise.resolve(
          err(createPlatformError('HTTP', `No route for ${method} ${path}`, { status: 404 }))
        );
      }
      return Promise.resolve(handler(body));
    },
  };
};
