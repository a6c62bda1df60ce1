/**
 * MCP Module - Error Definitions
 *
 * Errors returned to the assistant: a code, a short message, and for
 * batch validation failures the full list of violations.
 */

import type { ParametersError } from '../../parameters/index.js';
import type { PlatformError } from '../../platform/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface McpError {
  readonly code: McpErrorCode;
  readonly message: string;
  /** One line per violation */
  readonly details?: readonly string[];
  /** What to do next */
  readonly hint?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Codes
// ─────────────────────────────────────────────────────────────────────────────

export const MCP_ERROR_CODES = {
  // Input validation errors
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_PARAMETERS: 'INVALID_PARAMETERS',
  MAPPING_RESOLUTION_FAILED: 'MAPPING_RESOLUTION_FAILED',
  QUERY_VALIDATION_FAILED: 'QUERY_VALIDATION_FAILED',

  // Platform errors
  NOT_FOUND: 'NOT_FOUND',
  PLATFORM_ERROR: 'PLATFORM_ERROR',
  UNEXPECTED_RESPONSE: 'UNEXPECTED_RESPONSE',

  // Response errors
  RESPONSE_TOO_LARGE: 'RESPONSE_TOO_LARGE',

  // Generic errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type McpErrorCode = (typeof MCP_ERROR_CODES)[keyof typeof MCP_ERROR_CODES];

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createMcpError = (
  code: McpErrorCode,
  message: string,
  extra: { details?: readonly string[]; hint?: string } = {}
): McpError => ({
  code,
  message,
  ...(extra.details !== undefined && { details: extra.details }),
  ...(extra.hint !== undefined && { hint: extra.hint }),
});

export const invalidInputError = (reason: string, details?: readonly string[]): McpError =>
  createMcpError(MCP_ERROR_CODES.INVALID_INPUT, reason, details !== undefined ? { details } : {});

export const queryValidationError = (reason: string): McpError =>
  createMcpError(MCP_ERROR_CODES.QUERY_VALIDATION_FAILED, `Query failed to run: ${reason}`, {
    hint: 'Fix the SQL and try again; the card was not saved',
  });

export const unexpectedResponseError = (what: string): McpError =>
  createMcpError(MCP_ERROR_CODES.UNEXPECTED_RESPONSE, `Unexpected ${what} payload from the platform`);

export const responseTooLargeError = (size: number, limit: number): McpError =>
  createMcpError(
    MCP_ERROR_CODES.RESPONSE_TOO_LARGE,
    `Response is ${String(size)} characters, above the limit of ${String(limit)}`,
    { hint: 'Request less data' }
  );

export const internalError = (): McpError =>
  createMcpError(MCP_ERROR_CODES.INTERNAL_ERROR, 'Internal error');

// ─────────────────────────────────────────────────────────────────────────────
// Domain Error Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const CARD_PARAMETERS_HINT =
  'Call get_card_parameters_documentation for the expected parameter format';

export const DASHBOARD_PARAMETERS_HINT =
  'Call get_dashboard_parameters_documentation for the expected parameter format';

/**
 * Maps a domain error from another module to an MCP error.
 * `hint` is attached to parameter validation failures.
 */
export const toMcpError = (error: ParametersError | PlatformError, hint?: string): McpError => {
  switch (error.type) {
    case 'ParameterValidationError':
      return createMcpError(MCP_ERROR_CODES.INVALID_PARAMETERS, error.message, {
        details: error.errors,
        ...(hint !== undefined && { hint }),
      });
    case 'MappingResolutionError':
      return createMcpError(MCP_ERROR_CODES.MAPPING_RESOLUTION_FAILED, error.message, {
        details: error.errors,
      });
    case 'IdentifierExhaustedError':
      return createMcpError(MCP_ERROR_CODES.INTERNAL_ERROR, error.message);
    case 'PlatformError':
      if (error.status === 404) {
        return createMcpError(MCP_ERROR_CODES.NOT_FOUND, error.message);
      }
      return createMcpError(
        MCP_ERROR_CODES.PLATFORM_ERROR,
        error.status !== undefined
          ? `Platform request failed (${String(error.status)}): ${error.message}`
          : `Platform request failed: ${error.message}`
      );
  }
};
