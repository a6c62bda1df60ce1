/**
 * MCP Use Cases: validate_card_parameters, validate_dashboard_parameters
 *
 * Dry runs of the parameter processors. Nothing is sent to the platform;
 * an invalid batch is a normal outcome and comes back as a report.
 */

import { err, ok, type Result } from 'neverthrow';

import { toMcpError, type McpError } from '../errors.js';
import { parseParametersArg } from '../utils.js';
import {
  checkQueryParameters,
  processCardParameters,
  processDashboardParameters,
  toQueryDescriptors,
  type IdentifierGenerator,
  type ProcessParametersError,
} from '../../../parameters/index.js';

import type {
  ValidateCardParametersInput,
  ValidateDashboardParametersInput,
} from '../schemas/zod-schemas.js';
import type { ValidationReport } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Dependencies
// ─────────────────────────────────────────────────────────────────────────────

export interface ValidateParametersDeps {
  readonly ids: IdentifierGenerator;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Validation failures become a report; anything else is a real error */
const toReport = <T extends { parameters: readonly unknown[] }>(
  processed: Result<T, ProcessParametersError>,
  warnings: ValidationReport['warnings']
): Result<ValidationReport, McpError> => {
  if (processed.isOk()) {
    return ok({
      valid: true,
      parameters_count: processed.value.parameters.length,
      errors: [],
      warnings,
    });
  }
  const { error } = processed;
  if (error.type === 'ParameterValidationError') {
    return ok({ valid: false, parameters_count: 0, errors: error.errors, warnings });
  }
  return err(toMcpError(error));
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validates card descriptors and, when `query` is given, checks them
 * against its placeholders.
 */
export const validateCardParameters = (
  deps: ValidateParametersDeps,
  input: ValidateCardParametersInput
): Result<ValidationReport, McpError> => {
  const parsed = parseParametersArg(input.parameters);
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  const warnings =
    input.query !== undefined
      ? checkQueryParameters(input.query, toQueryDescriptors(parsed.value))
      : [];

  return toReport(processCardParameters(parsed.value, { ids: deps.ids }), warnings);
};

export const validateDashboardParameters = (
  deps: ValidateParametersDeps,
  input: ValidateDashboardParametersInput
): Result<ValidationReport, McpError> => {
  const parsed = parseParametersArg(input.parameters);
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  return toReport(processDashboardParameters(parsed.value, { ids: deps.ids }), []);
};
