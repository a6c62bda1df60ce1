/**
 * Parameters Use Case: process card parameters
 *
 * Expands simplified card filter descriptors into paired template tags
 * (native query placeholders) and UI parameters sharing one id each.
 */

import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import {
  createParameterValidationError,
  type ProcessParametersError,
} from '../errors.js';
import {
  TEMPLATE_TAG_TYPE_BY_SIMPLE_TYPE,
  isFieldFilterType,
  isSimpleVariableType,
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
  CardParametersSchema,
  cardDescriptorSchema,
  type CardParameterDescriptor,
} from '../schemas/card-parameters.js';

import type {
  CardParameter,
  ParameterTarget,
  ProcessContext,
  ProcessedCardParameters,
  TemplateTag,
} from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Business Rules
// ─────────────────────────────────────────────────────────────────────────────

const checkDescriptor = (descriptor: CardParameterDescriptor): string[] => {
  const { type } = descriptor;
  const errors: string[] = [];

  if (isFieldFilterType(type) && descriptor.field === undefined) {
    errors.push(`field filter type '${type}' requires a field reference`);
  }
  if (isSimpleVariableType(type) && descriptor.field !== undefined) {
    errors.push(`simple variable type '${type}' cannot bind a field; use a field filter type`);
  }

  const slug = slugify(descriptor.name);
  if (slug !== descriptor.name) {
    errors.push(`name must be a valid placeholder slug (expected '${slug}')`);
  }

  // Card filters never declare multi-select; an array default opts in where the type allows
  const isMultiSelect = Array.isArray(descriptor.default) && supportsMultiSelect(type);
  errors.push(...checkDefaultShape(type, descriptor.default, isMultiSelect));
  errors.push(...checkRequired(descriptor));
  errors.push(...checkWidget(descriptor));
  errors.push(...checkStaticValues(descriptor));

  if (descriptor.values_source?.type === 'connected' && !isFieldFilterType(type)) {
    errors.push(`connected values_source is only available for field filter types, not '${type}'`);
  }

  return errors;
};

const validateBusinessRules = (descriptors: readonly CardParameterDescriptor[]): string[] => [
  ...checkDuplicates(descriptors),
  ...descriptors.flatMap((descriptor, index) =>
    checkDescriptor(descriptor).map(
      (message) => `${prefixFor(index, descriptor.name)}: ${message}`
    )
  ),
];

// ─────────────────────────────────────────────────────────────────────────────
// Emission
// ─────────────────────────────────────────────────────────────────────────────

const buildTemplateTag = (descriptor: CardParameterDescriptor, id: string): TemplateTag => {
  const { name, type } = descriptor;
  const base = {
    id,
    name,
    'display-name': descriptor.display_name ?? name,
    required: descriptor.required ?? false,
    ...(!isEmptyDefault(descriptor.default) && { default: formatDefault(descriptor) }),
  };

  if (isSimpleVariableType(type)) {
    return { ...base, type: TEMPLATE_TAG_TYPE_BY_SIMPLE_TYPE[type] };
  }

  return {
    ...base,
    type: 'dimension',
    ...(descriptor.field !== undefined && {
      dimension: ['field', descriptor.field.field_id, null] as const,
    }),
    'widget-type': type,
  };
};

const buildCardParameter = (descriptor: CardParameterDescriptor, id: string): CardParameter => {
  const { name, type } = descriptor;
  const target: ParameterTarget = [
    isFieldFilterType(type) ? 'dimension' : 'variable',
    ['template-tag', name],
  ];
  const valuesQueryType = valuesQueryTypeOf(descriptor.ui_widget, descriptor.values_source?.type);

  return {
    id,
    type,
    target,
    name: descriptor.display_name ?? name,
    slug: slugify(name),
    required: descriptor.required ?? false,
    ...(!isEmptyDefault(descriptor.default) && { default: formatDefault(descriptor) }),
    values_query_type: valuesQueryType,
    ...(valuesQueryType !== 'none' &&
      buildValuesSource(descriptor.values_source, (value) =>
        typeof value === 'number' ? [String(value)] : value
      )),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validates and expands card filter descriptors.
 * The batch is atomic: any violation means no output.
 */
export const processCardParameters = (
  input: unknown,
  ctx: ProcessContext
): Result<ProcessedCardParameters, ProcessParametersError> => {
  // 1. Structural validation
  const structural = validateAgainstSchema(cardDescriptorSchema, input);
  if (structural.length > 0 || !Value.Check(CardParametersSchema, input)) {
    return err(createParameterValidationError('structural', structural.map(formatStructuralError)));
  }

  // 2. Business rules
  const violations = validateBusinessRules(input);
  if (violations.length > 0) {
    return err(createParameterValidationError('business-rule', violations));
  }

  // 3. Identifiers (supplied ids are kept verbatim) and paired output
  const taken = new Set<string>(
    input.flatMap((descriptor) => (descriptor.id !== undefined ? [descriptor.id] : []))
  );
  const templateTags: Record<string, TemplateTag> = {};
  const parameters: CardParameter[] = [];

  for (const descriptor of input) {
    let id = descriptor.id;
    if (id === undefined) {
      const generated = ctx.ids.newCardParameterId(taken);
      if (generated.isErr()) {
        return err(generated.error);
      }
      id = generated.value;
      taken.add(id);
    }

    templateTags[descriptor.name] = buildTemplateTag(descriptor, id);
    parameters.push(buildCardParameter(descriptor, id));
  }

  return ok({ templateTags, parameters });
};
