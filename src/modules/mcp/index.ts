/**
 * MCP Module - Public API
 *
 * Model Context Protocol tools for creating cards and dashboard filters
 * from simplified parameter descriptors.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  McpConfig,
  PlatformDeps,
  ValidationReport,
  CreateCardOutput,
  UpdateCardOutput,
  DashboardParameterSummary,
  UpdateDashboardParametersOutput,
} from './core/types.js';

export { DEFAULT_MCP_CONFIG } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { McpError, McpErrorCode } from './core/errors.js';

export {
  MCP_ERROR_CODES,
  CARD_PARAMETERS_HINT,
  DASHBOARD_PARAMETERS_HINT,
  createMcpError,
  invalidInputError,
  queryValidationError,
  unexpectedResponseError,
  responseTooLargeError,
  internalError,
  toMcpError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export * from './core/schemas/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export type { ParametersDocumentation } from './core/usecases/get-parameters-documentation.js';

export {
  getCardParametersDocumentation,
  getDashboardParametersDocumentation,
} from './core/usecases/get-parameters-documentation.js';

export type { ValidateParametersDeps } from './core/usecases/validate-parameters.js';

export {
  validateCardParameters,
  validateDashboardParameters,
} from './core/usecases/validate-parameters.js';

export { createCard, type CreateCardDeps } from './core/usecases/create-card.js';

export { updateCard, type UpdateCardDeps } from './core/usecases/update-card.js';

export {
  updateDashboardParameters,
  type UpdateDashboardParametersDeps,
} from './core/usecases/update-dashboard-parameters.js';

// ─────────────────────────────────────────────────────────────────────────────
// Utilities
// ─────────────────────────────────────────────────────────────────────────────

export {
  parseParametersArg,
  preserveCardParameterIds,
  preserveDashboardParameterIds,
  requestValidated,
  runNativeQuery,
  serializeWithLimit,
} from './core/utils.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export {
  createMcpServer,
  runMcpServerStdio,
  type CreateMcpServerDeps,
} from './shell/server/mcp-server.js';
