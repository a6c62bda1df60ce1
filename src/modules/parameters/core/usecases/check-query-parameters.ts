/**
 * Parameters Use Case: check query parameters
 *
 * Advisory scan of native query text against configured parameters.
 * Text heuristics only; nothing here parses the query language.
 */

import { isFieldFilterType } from '../filter-types.js';
import { isEmptyDefault } from '../rules.js';

import type { QueryWarning } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface QueryParameterDescriptor {
  readonly name: string;
  readonly type?: unknown;
  readonly default?: unknown;
  readonly field?: unknown;
}

export type PlaceholderUsage = 'required' | 'optional';

export interface QueryPlaceholder {
  readonly name: string;
  readonly usage: PlaceholderUsage;
}

// ─────────────────────────────────────────────────────────────────────────────
// Patterns
// ─────────────────────────────────────────────────────────────────────────────

const OPTIONAL_BLOCK = /\[\[[\s\S]*?\]\]/g;
const PLACEHOLDER = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const placeholderPattern = (name: string): string =>
  `\\{\\{\\s*${escapeRegExp(name)}\\s*\\}\\}`;

/** `'{{name}}'`, `"{{name}}"` and the LIKE form `'%{{name}}%'` */
const quotedPattern = (name: string): RegExp =>
  new RegExp(`['"]%?${placeholderPattern(name)}%?['"]`);

/** `col = {{name}}`, `col <> {{name}}`, `col LIKE {{name}}`, `col IN ({{name}})`, ... */
const comparedPattern = (name: string): RegExp =>
  new RegExp(`(?:[=<>]|\\bLIKE|\\bIN)\\s*\\(?\\s*${placeholderPattern(name)}`, 'i');

// ─────────────────────────────────────────────────────────────────────────────
// Extraction
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Placeholders in order of first appearance.
 * A name used both inside and outside `[[ ]]` counts as required.
 */
export const extractPlaceholders = (queryText: string): QueryPlaceholder[] => {
  const optionalRanges = [...queryText.matchAll(OPTIONAL_BLOCK)].map((match) => {
    const start = match.index ?? 0;
    return { start, end: start + match[0].length };
  });
  const isOptionalAt = (position: number): boolean =>
    optionalRanges.some((range) => position >= range.start && position < range.end);

  const usages = new Map<string, PlaceholderUsage>();
  for (const match of queryText.matchAll(PLACEHOLDER)) {
    const name = match[1];
    if (name === undefined) continue;

    const usage: PlaceholderUsage = isOptionalAt(match.index ?? 0) ? 'optional' : 'required';
    if (usages.get(name) !== 'required') {
      usages.set(name, usage);
    }
  }

  return [...usages].map(([name, usage]) => ({ name, usage }));
};

const isFieldFilter = (descriptor: QueryParameterDescriptor): boolean =>
  descriptor.field !== undefined ||
  (typeof descriptor.type === 'string' && isFieldFilterType(descriptor.type));

/** Picks the entries that carry a string name, for checking unvalidated input */
export const toQueryDescriptors = (input: unknown): QueryParameterDescriptor[] => {
  if (!Array.isArray(input)) return [];
  return input.flatMap((item: unknown) => {
    if (typeof item !== 'object' || item === null || !('name' in item)) return [];
    const { name } = item;
    if (typeof name !== 'string') return [];
    return [
      {
        name,
        type: 'type' in item ? item.type : undefined,
        default: 'default' in item ? item.default : undefined,
        field: 'field' in item ? item.field : undefined,
      },
    ];
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Cross-references placeholders in `queryText` with configured descriptors.
 * Returns warnings only; an empty list means nothing looked suspicious.
 */
export const checkQueryParameters = (
  queryText: string,
  descriptors: readonly QueryParameterDescriptor[]
): QueryWarning[] => {
  const warnings: QueryWarning[] = [];
  const placeholders = extractPlaceholders(queryText);
  const referenced = new Set(placeholders.map((placeholder) => placeholder.name));
  const byName = new Map(descriptors.map((descriptor) => [descriptor.name, descriptor]));

  for (const { name, usage } of placeholders) {
    const descriptor = byName.get(name);
    if (descriptor === undefined) {
      warnings.push({
        code: 'MISSING_PARAMETER_CONFIG',
        parameter: name,
        message: `Query references {{${name}}} but no parameter named '${name}' is configured`,
      });
      continue;
    }
    if (usage === 'required' && !isFieldFilter(descriptor) && isEmptyDefault(descriptor.default)) {
      warnings.push({
        code: 'REQUIRED_WITHOUT_DEFAULT',
        parameter: name,
        message: `{{${name}}} is used outside [[ ]] but has no default value; the query will not run until a value is supplied`,
      });
    }
  }

  for (const descriptor of descriptors) {
    if (!referenced.has(descriptor.name)) {
      warnings.push({
        code: 'UNUSED_PARAMETER',
        parameter: descriptor.name,
        message: `Parameter '${descriptor.name}' is configured but {{${descriptor.name}}} never appears in the query`,
      });
    }
  }

  for (const descriptor of descriptors) {
    const { name } = descriptor;
    if (!referenced.has(name)) continue;

    if (quotedPattern(name).test(queryText)) {
      warnings.push({
        code: 'QUOTED_PLACEHOLDER',
        parameter: name,
        message: `{{${name}}} is wrapped in quotes; remove them, values are quoted on substitution`,
      });
    }
    if (isFieldFilter(descriptor) && comparedPattern(name).test(queryText)) {
      warnings.push({
        code: 'FIELD_FILTER_AS_VALUE',
        parameter: name,
        message: `Field filter {{${name}}} is used as a comparison value; it expands to a whole condition, write WHERE {{${name}}} instead`,
      });
    }
  }

  return warnings;
};
