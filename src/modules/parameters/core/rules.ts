/**
 * Parameters Module - Business Rules
 *
 * Checks shared by the card and dashboard processors. Each check returns
 * messages without the `Parameter i (name):` prefix; the processors add it.
 */

import {
  categoryOf,
  defaultShape,
  isSearchableType,
  type FilterCategory,
  type UiWidget,
} from './filter-types.js';

import type { TypedFieldClause, ValuesSourceConfig, ValuesSourceType } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Fields both descriptor kinds share */
export interface RuleSubject {
  readonly name: string;
  readonly type: string;
  readonly id?: string | undefined;
  readonly default?: unknown;
  readonly required?: boolean | undefined;
  readonly ui_widget?: UiWidget | undefined;
  readonly values_source?: ValuesSourceLike | undefined;
}

export interface ValuesSourceLike {
  readonly type: string;
  readonly values?: readonly (string | number)[] | undefined;
  readonly card_id?: number | undefined;
  readonly value_field?: string | undefined;
  readonly label_field?: string | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export const prefixFor = (index: number, name: string): string =>
  `Parameter ${String(index)} (${name})`;

/** `undefined`, `null`, `""` and `[]` all count as "no default" */
export const isEmptyDefault = (value: unknown): boolean =>
  value === undefined ||
  value === null ||
  value === '' ||
  (Array.isArray(value) && value.length === 0);

export const describeValue = (value: unknown): string => {
  if (Array.isArray(value)) return `array ${JSON.stringify(value)}`;
  if (value === null) return 'null';
  return `${typeof value} ${JSON.stringify(value)}`;
};

const ELEMENT_CHECKS: Readonly<
  Record<FilterCategory, { readonly test: (value: unknown) => boolean; readonly label: string }>
> = {
  text: { test: (v) => typeof v === 'string', label: 'a string' },
  location: { test: (v) => typeof v === 'string', label: 'a string' },
  date: { test: (v) => typeof v === 'string', label: 'a date string' },
  'temporal-unit': { test: (v) => typeof v === 'string', label: 'a temporal unit string' },
  number: { test: (v) => typeof v === 'number' && Number.isFinite(v), label: 'a number' },
  id: {
    test: (v) => typeof v === 'string' || (typeof v === 'number' && Number.isFinite(v)),
    label: 'a string or number',
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Batch Rules
// ─────────────────────────────────────────────────────────────────────────────

/** Duplicate names, slugs and supplied ids across the batch */
export const checkDuplicates = (
  descriptors: readonly RuleSubject[],
  slugOf?: (name: string) => string
): string[] => {
  const errors: string[] = [];
  const names = new Set<string>();
  const slugs = new Map<string, string>();
  const ids = new Set<string>();

  descriptors.forEach((descriptor, index) => {
    const prefix = prefixFor(index, descriptor.name);

    if (names.has(descriptor.name)) {
      errors.push(`${prefix}: duplicate name '${descriptor.name}'`);
    } else {
      names.add(descriptor.name);
      if (slugOf !== undefined) {
        const slug = slugOf(descriptor.name);
        const owner = slugs.get(slug);
        if (owner !== undefined) {
          errors.push(`${prefix}: slug '${slug}' is already used by '${owner}'`);
        } else {
          slugs.set(slug, descriptor.name);
        }
      }
    }

    if (descriptor.id !== undefined) {
      if (ids.has(descriptor.id)) {
        errors.push(`${prefix}: duplicate id '${descriptor.id}'`);
      }
      ids.add(descriptor.id);
    }
  });

  return errors;
};

// ─────────────────────────────────────────────────────────────────────────────
// Per-descriptor Rules
// ─────────────────────────────────────────────────────────────────────────────

/** Default value must have the shape and element type its filter type takes */
export const checkDefaultShape = (
  type: string,
  value: unknown,
  isMultiSelect: boolean
): string[] => {
  if (isEmptyDefault(value)) return [];

  const element = ELEMENT_CHECKS[categoryOf(type)];

  switch (defaultShape(type, isMultiSelect)) {
    case 'range_pair': {
      const isPair =
        Array.isArray(value) &&
        value.length === 2 &&
        value.every((v) => ELEMENT_CHECKS.number.test(v));
      return isPair
        ? []
        : [`'${type}' default must be a two-element array of numbers, got ${describeValue(value)}`];
    }
    case 'array': {
      if (!Array.isArray(value)) {
        return [
          `multi-select default for '${type}' must be an array, got ${describeValue(value)}`,
        ];
      }
      return value.every((v) => element.test(v))
        ? []
        : [
            `every default value for '${type}' must be ${element.label}, got ${describeValue(value)}`,
          ];
    }
    case 'scalar': {
      if (Array.isArray(value)) {
        return [`default for '${type}' must be a single value, got ${describeValue(value)}`];
      }
      return element.test(value)
        ? []
        : [`default for '${type}' must be ${element.label}, got ${describeValue(value)}`];
    }
  }
};

export const checkRequired = (descriptor: RuleSubject): string[] =>
  descriptor.required === true && isEmptyDefault(descriptor.default)
    ? ['required parameters must have a non-empty default value']
    : [];

export const checkWidget = (descriptor: RuleSubject): string[] => {
  const { type, ui_widget: widget, values_source: source } = descriptor;
  const errors: string[] = [];

  if (widget === 'search' && !isSearchableType(type)) {
    errors.push(`search widget is only available for text types, not '${type}'`);
  }
  if ((widget === 'dropdown' || widget === 'search') && categoryOf(type) === 'date') {
    errors.push(`${widget} widget is not available for date type '${type}'`);
  }
  if (widget === 'input' && source !== undefined) {
    errors.push(`input widget cannot be combined with a '${source.type}' values_source`);
  }

  return errors;
};

export const checkStaticValues = (descriptor: RuleSubject): string[] => {
  const source = descriptor.values_source;
  if (source?.type !== 'static' || categoryOf(descriptor.type) !== 'number') return [];

  const values = source.values ?? [];
  return values.every((v) => typeof v === 'number')
    ? []
    : [`static values for number type '${descriptor.type}' must be numbers`];
};

// ─────────────────────────────────────────────────────────────────────────────
// Output Formatting
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Number filters picking from a static list take their default as strings,
 * matching the encoding of the list entries. Range pairs stay numeric.
 */
export const formatDefault = (descriptor: RuleSubject): unknown => {
  const value = descriptor.default;
  if (
    categoryOf(descriptor.type) !== 'number' ||
    descriptor.values_source?.type !== 'static' ||
    defaultShape(descriptor.type, true) === 'range_pair'
  ) {
    return value;
  }
  if (typeof value === 'number') return [String(value)];
  if (Array.isArray(value)) return value.map((v) => String(v));
  return value;
};

const textFieldClause = (column: string): TypedFieldClause => [
  'field',
  column,
  { 'base-type': 'type/Text' },
];

export interface ValuesSourceOutput {
  readonly values_source_type?: ValuesSourceType;
  readonly values_source_config?: ValuesSourceConfig;
}

/**
 * Builds `values_source_type` / `values_source_config`.
 * `formatStaticValue` decides how each static list entry is emitted.
 */
export const buildValuesSource = (
  source: ValuesSourceLike | undefined,
  formatStaticValue: (value: string | number) => string | number | readonly string[]
): ValuesSourceOutput => {
  if (source === undefined) return {};

  switch (source.type) {
    case 'static':
      return {
        values_source_type: 'static-list',
        values_source_config: { values: (source.values ?? []).map(formatStaticValue) },
      };
    case 'card': {
      if (source.card_id === undefined || source.value_field === undefined) return {};
      return {
        values_source_type: 'card',
        values_source_config: {
          card_id: source.card_id,
          value_field: textFieldClause(source.value_field),
          ...(source.label_field !== undefined && {
            label_field: textFieldClause(source.label_field),
          }),
        },
      };
    }
    case 'connected':
      return { values_source_type: null, values_source_config: {} };
    default:
      return {};
  }
};
