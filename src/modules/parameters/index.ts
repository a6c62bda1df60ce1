/**
 * Parameters Module - Public API
 *
 * Filter parameter processing for cards and dashboards: structural and
 * business-rule validation, id and slug generation, query consistency
 * warnings and dashboard-to-card mapping resolution.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  TemplateTagReference,
  ParameterTarget,
  FieldClause,
  TypedFieldClause,
  ValuesSourceType,
  ValuesSourceConfig,
  TemplateTag,
  CardParameter,
  ProcessedCardParameters,
  DashboardParameter,
  ProcessedDashboardParameters,
  ProcessContext,
  QueryWarningCode,
  QueryWarning,
  MappingRequest,
  CardParameterRef,
  DashboardParameterRef,
  PlatformMapping,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ParameterValidationKind,
  ParameterValidationError,
  IdentifierExhaustedError,
  MappingResolutionError,
  ProcessParametersError,
  ParametersError,
} from './core/errors.js';

export {
  createParameterValidationError,
  createIdentifierExhaustedError,
  createMappingResolutionError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Filter Type Registry
// ─────────────────────────────────────────────────────────────────────────────

export type {
  FilterType,
  FilterCategory,
  CardParameterType,
  DashboardParameterType,
  DefaultShape,
  TemporalUnit,
  UiWidget,
  ValuesQueryType,
  ValuesSourceKind,
} from './core/filter-types.js';

export {
  TEXT_FILTER_TYPES,
  LOCATION_FILTER_TYPES,
  NUMBER_FILTER_TYPES,
  DATE_FILTER_TYPES,
  SIMPLE_VARIABLE_TYPES,
  FIELD_FILTER_TYPES,
  CARD_PARAMETER_TYPES,
  DASHBOARD_PARAMETER_TYPES,
  VALID_TEMPORAL_UNITS,
  VALUES_QUERY_TYPE_BY_WIDGET,
  categoryOf,
  supportsMultiSelect,
  defaultShape,
  isFieldFilterType,
  isSimpleVariableType,
  sectionIdOf,
  valuesQueryTypeOf,
} from './core/filter-types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Identifiers
// ─────────────────────────────────────────────────────────────────────────────

export type { RandomSource, IdentifierGenerator } from './core/identifiers.js';

export {
  MAX_ID_ATTEMPTS,
  DASHBOARD_ID_LENGTH,
  makeIdentifierGenerator,
  slugify,
} from './core/identifiers.js';

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export type { StructuralError, ConditionalRule, DescriptorSchema } from './core/schema-validator.js';

export {
  validateAgainstSchema,
  formatStructuralError,
  formatPointer,
} from './core/schema-validator.js';

export type {
  FieldReference,
  CardValuesSource,
  CardParameterDescriptor,
  DashboardValuesSource,
  DashboardParameterDescriptor,
} from './core/schemas/index.js';

export {
  CardParametersSchema,
  CardParameterDescriptorSchema,
  cardDescriptorSchema,
  DashboardParametersSchema,
  DashboardParameterDescriptorSchema,
  dashboardDescriptorSchema,
} from './core/schemas/index.js';

export { prefixFor } from './core/rules.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { processCardParameters } from './core/usecases/process-card-parameters.js';

export {
  processDashboardParameters,
  resolveMultiSelect,
} from './core/usecases/process-dashboard-parameters.js';

export type {
  QueryParameterDescriptor,
  PlaceholderUsage,
  QueryPlaceholder,
} from './core/usecases/check-query-parameters.js';

export {
  checkQueryParameters,
  extractPlaceholders,
  toQueryDescriptors,
} from './core/usecases/check-query-parameters.js';

export { resolveParameterMappings } from './core/usecases/resolve-parameter-mappings.js';
