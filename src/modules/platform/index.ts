/**
 * Platform Module - Public API
 *
 * Access to the analytics platform's REST API.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core
// ─────────────────────────────────────────────────────────────────────────────

export type { HttpMethod, PlatformResponse, PlatformClient } from './core/ports.js';

export type { PlatformErrorKind, PlatformError } from './core/errors.js';

export { createPlatformError, extractPlatformMessage } from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export type { FetchFn, MetabaseClientConfig } from './shell/client/metabase-client.js';

export { makeMetabaseClient } from './shell/client/metabase-client.js';
