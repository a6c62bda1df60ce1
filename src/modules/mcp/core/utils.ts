/**
 * MCP Module - Shared Utilities
 */

import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import {
  invalidInputError,
  queryValidationError,
  responseTooLargeError,
  toMcpError,
  unexpectedResponseError,
  type McpError,
} from './errors.js';
import { QueryRunSchema, type PlatformParameter } from './schemas/platform-payloads.js';
import { slugify } from '../../parameters/index.js';

import type { HttpMethod, PlatformClient } from '../../platform/index.js';
import type { Static, TSchema } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Input Parsing
// ─────────────────────────────────────────────────────────────────────────────

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parameters arrive as an array or as a JSON string holding one.
 */
export const parseParametersArg = (value: unknown): Result<unknown[], McpError> => {
  let parsed: unknown = value;
  if (typeof value === 'string') {
    try {
      parsed = JSON.parse(value);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(invalidInputError(`parameters is not valid JSON: ${reason}`));
    }
  }
  if (!Array.isArray(parsed)) {
    return err(invalidInputError('parameters must be an array of parameter objects'));
  }
  return ok(parsed);
};

// ─────────────────────────────────────────────────────────────────────────────
// Id Preservation
// ─────────────────────────────────────────────────────────────────────────────

const withIds = (
  items: readonly unknown[],
  lookup: (name: string) => string | undefined
): unknown[] =>
  items.map((item) => {
    if (!isRecord(item) || item['id'] !== undefined) return item;
    const name = item['name'];
    if (typeof name !== 'string') return item;
    const id = lookup(name);
    return id !== undefined ? { ...item, id } : item;
  });

/**
 * Descriptors without an id reuse the id of the existing card parameter
 * with the same slug, so dashboard mappings keep pointing at them.
 */
export const preserveCardParameterIds = (
  items: readonly unknown[],
  existing: readonly PlatformParameter[]
): unknown[] => {
  const bySlug = new Map(existing.map((parameter) => [parameter.slug, parameter.id]));
  return withIds(items, (name) => bySlug.get(slugify(name)));
};

/** Same as for cards, matched on the dashboard parameter's name, then slug */
export const preserveDashboardParameterIds = (
  items: readonly unknown[],
  existing: readonly PlatformParameter[]
): unknown[] => {
  const byName = new Map(existing.map((parameter) => [parameter.name, parameter.id]));
  const bySlug = new Map(existing.map((parameter) => [parameter.slug, parameter.id]));
  return withIds(items, (name) => byName.get(name) ?? bySlug.get(slugify(name)));
};

// ─────────────────────────────────────────────────────────────────────────────
// Platform Access
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sends a request and checks the payload against `schema`.
 */
export const requestValidated = async <T extends TSchema>(
  platform: PlatformClient,
  method: HttpMethod,
  path: string,
  schema: T,
  what: string,
  body?: unknown
): Promise<Result<Static<T>, McpError>> => {
  const response = await platform.request(method, path, body);
  if (response.isErr()) {
    return err(toMcpError(response.error));
  }
  const { data } = response.value;
  if (!Value.Check(schema, data)) {
    return err(unexpectedResponseError(what));
  }
  return ok(data);
};

/**
 * Runs a native query once so that broken SQL is reported before saving.
 */
export const runNativeQuery = async (
  platform: PlatformClient,
  databaseId: number,
  query: string,
  templateTags: Readonly<Record<string, unknown>>
): Promise<Result<void, McpError>> => {
  const response = await platform.request('POST', 'dataset', {
    database: databaseId,
    type: 'native',
    native: { query, 'template-tags': templateTags },
  });

  if (response.isErr()) {
    const { error } = response;
    // The platform answers a rejected query with a 4xx carrying its reason
    const status = error.status ?? 0;
    if (error.kind === 'HTTP' && status >= 400 && status < 500 && status !== 404) {
      return err(queryValidationError(error.message));
    }
    return err(toMcpError(error));
  }

  const { data } = response.value;
  if (Value.Check(QueryRunSchema, data) && data.status === 'failed') {
    const reason = typeof data.error === 'string' ? data.error : 'unknown error';
    return err(queryValidationError(reason));
  }

  return ok(undefined);
};

// ─────────────────────────────────────────────────────────────────────────────
// Response Size
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Serializes a tool response, refusing anything longer than `limit`.
 */
export const serializeWithLimit = (value: unknown, limit: number): Result<string, McpError> => {
  const text = JSON.stringify(value);
  if (text.length > limit) {
    return err(responseTooLargeError(text.length, limit));
  }
  return ok(text);
};
