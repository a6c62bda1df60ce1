/**
 * Parameters Use Case: process dashboard parameters
 *
 * Dashboard parameters are standalone; cards are linked to them later
 * through mappings.
 */

import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import {
  createParameterValidationError,
  type ProcessParametersError,
} from '../errors.js';
import {
  STRING_TYPE_BY_LOCATION_TYPE,
  isLocationType,
  isTemporalUnit,
  sectionIdOf,
  supportsMultiSelect,
  valuesQueryTypeOf,
} from '../filter-types.js';
import { slugify } from '../identifiers.js';
import {
  buildValuesSource,
  checkDefaultShape,
  checkDuplicates,
  checkRequired,
  checkStaticValues,
  checkWidget,
  formatDefault,
  isEmptyDefault,
  prefixFor,
} from '../rules.js';
import { formatStructuralError, validateAgainstSchema } from '../schema-validator.js';
import {
  DashboardParametersSchema,
  dashboardDescriptorSchema,
  type DashboardParameterDescriptor,
} from '../schemas/dashboard-parameters.js';

import type { DashboardParameter, ProcessContext, ProcessedDashboardParameters } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Multi-select is on by default wherever the type supports it */
export const resolveMultiSelect = (descriptor: DashboardParameterDescriptor): boolean =>
  supportsMultiSelect(descriptor.type) && (descriptor.isMultiSelect ?? true);

const outputType = (type: string): string =>
  isLocationType(type) ? STRING_TYPE_BY_LOCATION_TYPE[type] : type;

// ─────────────────────────────────────────────────────────────────────────────
// Business Rules
// ─────────────────────────────────────────────────────────────────────────────

const checkTemporalUnits = (descriptor: DashboardParameterDescriptor): string[] => {
  const units = descriptor.temporal_units;

  if (descriptor.type !== 'temporal-unit') {
    return units !== undefined
      ? [`temporal_units is only allowed on 'temporal-unit' parameters`]
      : [];
  }

  if (units === undefined || units.length === 0) {
    return [`'temporal-unit' parameters require a non-empty temporal_units list`];
  }

  const value = descriptor.default;
  if (isEmptyDefault(value) || typeof value !== 'string') return [];

  if (!isTemporalUnit(value) || !units.includes(value)) {
    return [`default '${value}' is not one of temporal_units: ${units.join(', ')}`];
  }
  return [];
};

const checkDescriptor = (descriptor: DashboardParameterDescriptor): string[] => {
  const { type } = descriptor;
  const errors: string[] = [];

  if (descriptor.isMultiSelect === true && !supportsMultiSelect(type)) {
    errors.push(`Multi-select not supported for parameter type '${type}'`);
  }

  errors.push(...checkDefaultShape(type, descriptor.default, resolveMultiSelect(descriptor)));
  errors.push(...checkTemporalUnits(descriptor));
  errors.push(...checkRequired(descriptor));
  errors.push(...checkWidget(descriptor));
  errors.push(...checkStaticValues(descriptor));

  return errors;
};

const validateBusinessRules = (descriptors: readonly DashboardParameterDescriptor[]): string[] => [
  ...checkDuplicates(descriptors, slugify),
  ...descriptors.flatMap((descriptor, index) =>
    checkDescriptor(descriptor).map(
      (message) => `${prefixFor(index, descriptor.name)}: ${message}`
    )
  ),
];

// ─────────────────────────────────────────────────────────────────────────────
// Emission
// ─────────────────────────────────────────────────────────────────────────────

const buildDashboardParameter = (
  descriptor: DashboardParameterDescriptor,
  id: string
): DashboardParameter => {
  const { name, type } = descriptor;
  const valuesQueryType = valuesQueryTypeOf(descriptor.ui_widget, descriptor.values_source?.type);

  return {
    id,
    name,
    slug: slugify(name),
    type: outputType(type),
    sectionId: sectionIdOf(type),
    required: descriptor.required ?? false,
    ...(!isEmptyDefault(descriptor.default) && { default: formatDefault(descriptor) }),
    ...(supportsMultiSelect(type) && { isMultiSelect: resolveMultiSelect(descriptor) }),
    ...(type === 'temporal-unit' && { temporal_units: descriptor.temporal_units ?? [] }),
    values_query_type: valuesQueryType,
    ...(valuesQueryType !== 'none' &&
      buildValuesSource(descriptor.values_source, (value) => [String(value)])),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validates and expands dashboard filter descriptors.
 * Generated ids avoid both the batch's own ids and `ctx.existingIds`.
 */
export const processDashboardParameters = (
  input: unknown,
  ctx: ProcessContext
): Result<ProcessedDashboardParameters, ProcessParametersError> => {
  const structural = validateAgainstSchema(dashboardDescriptorSchema, input);
  if (structural.length > 0 || !Value.Check(DashboardParametersSchema, input)) {
    return err(createParameterValidationError('structural', structural.map(formatStructuralError)));
  }

  const violations = validateBusinessRules(input);
  if (violations.length > 0) {
    return err(createParameterValidationError('business-rule', violations));
  }

  const taken = new Set<string>(ctx.existingIds ?? []);
  for (const descriptor of input) {
    if (descriptor.id !== undefined) taken.add(descriptor.id);
  }

  const parameters: DashboardParameter[] = [];
  for (const descriptor of input) {
    let id = descriptor.id;
    if (id === undefined) {
      const generated = ctx.ids.newDashboardParameterId(taken);
      if (generated.isErr()) {
        return err(generated.error);
      }
      id = generated.value;
      taken.add(id);
    }
    parameters.push(buildDashboardParameter(descriptor, id));
  }

  return ok({ parameters });
};
