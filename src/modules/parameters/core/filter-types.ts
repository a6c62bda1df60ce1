/**
 * Parameters Module - Filter Type Registry
 *
 * Static classification tables for the filter type taxonomy.
 * Built once at module load; nothing here is mutated afterwards.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Type Taxonomy
// ─────────────────────────────────────────────────────────────────────────────

export const TEXT_FILTER_TYPES = [
  'string/=',
  'string/!=',
  'string/contains',
  'string/does-not-contain',
  'string/starts-with',
  'string/ends-with',
] as const;

export const LOCATION_FILTER_TYPES = [
  'location/=',
  'location/!=',
  'location/contains',
  'location/does-not-contain',
  'location/starts-with',
  'location/ends-with',
] as const;

export const NUMBER_FILTER_TYPES = [
  'number/=',
  'number/!=',
  'number/between',
  'number/>=',
  'number/<=',
] as const;

export const DATE_FILTER_TYPES = [
  'date/single',
  'date/range',
  'date/month-year',
  'date/quarter-year',
  'date/relative',
  'date/all-options',
] as const;

/** Query-level kinds substituted as plain values */
export const SIMPLE_VARIABLE_TYPES = ['category', 'number/=', 'date/single'] as const;

/** Query-level kinds bound to a database column */
export const FIELD_FILTER_TYPES = [
  ...TEXT_FILTER_TYPES,
  'number/!=',
  'number/between',
  'number/>=',
  'number/<=',
  'date/range',
  'date/relative',
  'date/all-options',
  'date/month-year',
  'date/quarter-year',
] as const;

export const CARD_PARAMETER_TYPES = [...SIMPLE_VARIABLE_TYPES, ...FIELD_FILTER_TYPES] as const;

export const DASHBOARD_PARAMETER_TYPES = [
  ...TEXT_FILTER_TYPES,
  ...LOCATION_FILTER_TYPES,
  ...NUMBER_FILTER_TYPES,
  ...DATE_FILTER_TYPES,
  'temporal-unit',
  'id',
] as const;

export type TextFilterType = (typeof TEXT_FILTER_TYPES)[number];
export type LocationFilterType = (typeof LOCATION_FILTER_TYPES)[number];
export type SimpleVariableType = (typeof SIMPLE_VARIABLE_TYPES)[number];
export type FieldFilterType = (typeof FIELD_FILTER_TYPES)[number];
export type CardParameterType = (typeof CARD_PARAMETER_TYPES)[number];
export type DashboardParameterType = (typeof DASHBOARD_PARAMETER_TYPES)[number];
export type FilterType = CardParameterType | DashboardParameterType;

export type FilterCategory = 'text' | 'number' | 'date' | 'location' | 'id' | 'temporal-unit';

export type DefaultShape = 'scalar' | 'array' | 'range_pair';

export const VALID_TEMPORAL_UNITS = [
  'minute',
  'hour',
  'day',
  'week',
  'month',
  'quarter',
  'year',
  'minute-of-hour',
  'hour-of-day',
  'day-of-week',
  'day-of-month',
  'day-of-year',
  'week-of-year',
  'month-of-year',
  'quarter-of-year',
] as const;

export type TemporalUnit = (typeof VALID_TEMPORAL_UNITS)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Lookup Tables
// ─────────────────────────────────────────────────────────────────────────────

const CATEGORY_BY_TYPE: ReadonlyMap<string, FilterCategory> = new Map<string, FilterCategory>([
  ['category', 'text'],
  ...TEXT_FILTER_TYPES.map((type): [string, FilterCategory] => [type, 'text']),
  ...LOCATION_FILTER_TYPES.map((type): [string, FilterCategory] => [type, 'location']),
  ...NUMBER_FILTER_TYPES.map((type): [string, FilterCategory] => [type, 'number']),
  ...DATE_FILTER_TYPES.map((type): [string, FilterCategory] => [type, 'date']),
  ['temporal-unit', 'temporal-unit'],
  ['id', 'id'],
]);

const MULTI_SELECT_TYPES: ReadonlySet<string> = new Set<string>([
  ...TEXT_FILTER_TYPES,
  ...LOCATION_FILTER_TYPES,
  'number/=',
  'number/!=',
  'id',
]);

const SIMPLE_VARIABLE_SET: ReadonlySet<string> = new Set<string>(SIMPLE_VARIABLE_TYPES);
const FIELD_FILTER_SET: ReadonlySet<string> = new Set<string>(FIELD_FILTER_TYPES);
const TEMPORAL_UNIT_SET: ReadonlySet<string> = new Set<string>(VALID_TEMPORAL_UNITS);

/** Template tag type emitted for each simple variable kind */
export const TEMPLATE_TAG_TYPE_BY_SIMPLE_TYPE: Readonly<Record<SimpleVariableType, string>> =
  Object.freeze({
    category: 'text',
    'number/=': 'number',
    'date/single': 'date',
  });

/** `location/*` kinds are emitted as the matching `string/*` kind */
export const STRING_TYPE_BY_LOCATION_TYPE: Readonly<Record<LocationFilterType, TextFilterType>> =
  Object.freeze({
    'location/=': 'string/=',
    'location/!=': 'string/!=',
    'location/contains': 'string/contains',
    'location/does-not-contain': 'string/does-not-contain',
    'location/starts-with': 'string/starts-with',
    'location/ends-with': 'string/ends-with',
  });

const SECTION_ID_BY_CATEGORY: Readonly<Record<FilterCategory, string>> = Object.freeze({
  text: 'string',
  location: 'location',
  number: 'number',
  date: 'date',
  'temporal-unit': 'temporal-unit',
  id: 'id',
});

export type UiWidget = 'input' | 'dropdown' | 'search';
export type ValuesQueryType = 'none' | 'list' | 'search';
export type ValuesSourceKind = 'static' | 'card' | 'connected';

export const UI_WIDGETS: readonly UiWidget[] = ['input', 'dropdown', 'search'];

export const VALUES_QUERY_TYPE_BY_WIDGET: Readonly<Record<UiWidget, ValuesQueryType>> =
  Object.freeze({
    input: 'none',
    dropdown: 'list',
    search: 'search',
  });

/** Widget implied by a values source when the author gives none */
const VALUES_QUERY_TYPE_BY_SOURCE: Readonly<Record<ValuesSourceKind, ValuesQueryType>> =
  Object.freeze({
    static: 'list',
    card: 'search',
    connected: 'list',
  });

/** Text kinds that can drive a search widget */
const SEARCHABLE_TYPES: ReadonlySet<string> = new Set<string>([
  'category',
  ...TEXT_FILTER_TYPES,
  ...LOCATION_FILTER_TYPES,
]);

// ─────────────────────────────────────────────────────────────────────────────
// Lookups
// ─────────────────────────────────────────────────────────────────────────────

export const isKnownType = (type: string): type is FilterType => CATEGORY_BY_TYPE.has(type);

/**
 * Returns the semantic category of a filter type.
 * Unknown types fall back to `text`; schemas reject them before this is reached.
 */
export const categoryOf = (type: string): FilterCategory => CATEGORY_BY_TYPE.get(type) ?? 'text';

export const supportsMultiSelect = (type: string): boolean => MULTI_SELECT_TYPES.has(type);

export const isSimpleVariableType = (type: string): type is SimpleVariableType =>
  SIMPLE_VARIABLE_SET.has(type);

export const isFieldFilterType = (type: string): type is FieldFilterType =>
  FIELD_FILTER_SET.has(type);

export const isLocationType = (type: string): type is LocationFilterType =>
  categoryOf(type) === 'location';

export const isTemporalUnit = (unit: unknown): unit is TemporalUnit =>
  typeof unit === 'string' && TEMPORAL_UNIT_SET.has(unit);

export const isSearchableType = (type: string): boolean => SEARCHABLE_TYPES.has(type);

/**
 * Shape a `default` must take for the given type.
 * `number/between` always takes a two-element range.
 */
export const defaultShape = (type: string, isMultiSelect: boolean): DefaultShape => {
  if (type === 'number/between') return 'range_pair';
  if (isMultiSelect && supportsMultiSelect(type)) return 'array';
  return 'scalar';
};

export const sectionIdOf = (type: string): string => SECTION_ID_BY_CATEGORY[categoryOf(type)];

export const valuesQueryTypeOf = (
  widget: UiWidget | undefined,
  source: ValuesSourceKind | undefined
): ValuesQueryType => {
  if (widget !== undefined) return VALUES_QUERY_TYPE_BY_WIDGET[widget];
  if (source !== undefined) return VALUES_QUERY_TYPE_BY_SOURCE[source];
  return 'none';
};
