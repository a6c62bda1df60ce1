/**
 * Parameters Module - Core Types
 *
 * Shapes emitted in the platform's native card and dashboard format.
 */

import type { ValuesQueryType } from './filter-types.js';
import type { IdentifierGenerator } from './identifiers.js';

// ─────────────────────────────────────────────────────────────────────────────
// Platform References
// ─────────────────────────────────────────────────────────────────────────────

export type TemplateTagReference = readonly ['template-tag', string];

/** `variable` substitutes a value, `dimension` binds a whole column condition */
export type ParameterTarget = readonly ['variable' | 'dimension', TemplateTagReference];

export type FieldClause = readonly ['field', number, null];

/** Source card result column, referenced by name */
export type TypedFieldClause = readonly ['field', string, { readonly 'base-type': string }];

export type ValuesSourceType = 'static-list' | 'card' | null;

export interface ValuesSourceConfig {
  readonly values?: readonly (string | number | readonly string[])[];
  readonly card_id?: number;
  readonly value_field?: TypedFieldClause;
  readonly label_field?: TypedFieldClause;
}

// ─────────────────────────────────────────────────────────────────────────────
// Card Output
// ─────────────────────────────────────────────────────────────────────────────

/** Placeholder definition embedded in the native query (`template-tags`) */
export interface TemplateTag {
  readonly id: string;
  readonly name: string;
  readonly 'display-name': string;
  readonly type: string;
  readonly dimension?: FieldClause;
  readonly 'widget-type'?: string;
  readonly default?: unknown;
  readonly required: boolean;
}

interface UiParameterBase {
  readonly id: string;
  readonly type: string;
  readonly name: string;
  readonly slug: string;
  readonly default?: unknown;
  readonly required: boolean;
  readonly values_query_type: ValuesQueryType;
  readonly values_source_type?: ValuesSourceType;
  readonly values_source_config?: ValuesSourceConfig;
}

export interface CardParameter extends UiParameterBase {
  readonly target: ParameterTarget;
}

export interface ProcessedCardParameters {
  readonly templateTags: Readonly<Record<string, TemplateTag>>;
  readonly parameters: readonly CardParameter[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Dashboard Output
// ─────────────────────────────────────────────────────────────────────────────

export interface DashboardParameter extends UiParameterBase {
  readonly sectionId: string;
  readonly isMultiSelect?: boolean;
  readonly temporal_units?: readonly string[];
}

export interface ProcessedDashboardParameters {
  readonly parameters: readonly DashboardParameter[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Processing Context
// ─────────────────────────────────────────────────────────────────────────────

export interface ProcessContext {
  readonly ids: IdentifierGenerator;
  /** Identifiers already used elsewhere on the dashboard */
  readonly existingIds?: ReadonlySet<string>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Consistency Warnings
// ─────────────────────────────────────────────────────────────────────────────

export type QueryWarningCode =
  | 'MISSING_PARAMETER_CONFIG'
  | 'UNUSED_PARAMETER'
  | 'REQUIRED_WITHOUT_DEFAULT'
  | 'QUOTED_PLACEHOLDER'
  | 'FIELD_FILTER_AS_VALUE';

export interface QueryWarning {
  readonly code: QueryWarningCode;
  readonly parameter: string;
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Mappings
// ─────────────────────────────────────────────────────────────────────────────

export interface MappingRequest {
  readonly dashcard_id: number;
  readonly card_id: number;
  readonly dashboard_parameter_name: string;
  readonly card_parameter_name: string;
}

/** Card parameter as fetched back from the platform */
export interface CardParameterRef {
  readonly id: string;
  readonly name: string;
  readonly slug: string;
  readonly target?: unknown;
}

export interface DashboardParameterRef {
  readonly id: string;
  readonly name: string;
}

export interface PlatformMapping {
  readonly dashcard_id: number;
  readonly card_id: number;
  readonly parameter_id: string;
  readonly target: unknown;
}
