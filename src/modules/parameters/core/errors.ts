/**
 * Parameters Module - Error Definitions
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export type ParameterValidationKind = 'structural' | 'business-rule';

/**
 * A descriptor batch was rejected.
 * `errors` holds every violation found, one line each.
 */
export interface ParameterValidationError {
  readonly type: 'ParameterValidationError';
  readonly kind: ParameterValidationKind;
  readonly message: string;
  readonly errors: readonly string[];
}

/** Identifier generation kept colliding with already taken identifiers */
export interface IdentifierExhaustedError {
  readonly type: 'IdentifierExhaustedError';
  readonly message: string;
  readonly attempts: number;
}

/** One or more mapping requests could not be resolved */
export interface MappingResolutionError {
  readonly type: 'MappingResolutionError';
  readonly message: string;
  readonly errors: readonly string[];
}

export type ProcessParametersError = ParameterValidationError | IdentifierExhaustedError;

export type ParametersError = ProcessParametersError | MappingResolutionError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createParameterValidationError = (
  kind: ParameterValidationKind,
  errors: readonly string[]
): ParameterValidationError => ({
  type: 'ParameterValidationError',
  kind,
  message:
    kind === 'structural'
      ? `Parameter structure is invalid (${String(errors.length)} error(s))`
      : `Parameter configuration is invalid (${String(errors.length)} error(s))`,
  errors,
});

export const createIdentifierExhaustedError = (attempts: number): IdentifierExhaustedError => ({
  type: 'IdentifierExhaustedError',
  message: `Could not generate a unique parameter id after ${String(attempts)} attempts`,
  attempts,
});

export const createMappingResolutionError = (errors: readonly string[]): MappingResolutionError => ({
  type: 'MappingResolutionError',
  message: `${String(errors.length)} parameter mapping(s) could not be resolved`,
  errors,
});
