/**
 * Parameters Module - Shared Schema Fragments
 */

import { Type } from '@sinclair/typebox';

import type { ConditionalRule } from '../schema-validator.js';

/** Union of string literals, reported by the validator as an enum */
export const StringEnum = <T extends string>(
  values: readonly T[],
  options: { description?: string } = {}
) =>
  Type.Union(
    values.map((value) => Type.Literal(value)),
    options
  );

export const ParameterNameSchema = Type.String({
  pattern: '^[A-Za-z0-9_]+$',
  description: 'Unique within the card or dashboard; letters, digits and underscores only',
});

export const UiWidgetSchema = Type.Union(
  [Type.Literal('input'), Type.Literal('dropdown'), Type.Literal('search')],
  { description: 'input = free text, dropdown = pick from list, search = type-ahead' }
);

export const StaticValueSchema = Type.Union([Type.String(), Type.Number()]);

export const FieldIdSchema = Type.Integer({ minimum: 1 });

export const ColumnNameSchema = Type.String({
  minLength: 1,
  description: 'Result column of the source card',
});

/** Requirements each values source kind adds on top of the base shape */
export const valuesSourceConditionals: readonly ConditionalRule[] = [
  {
    description: 'static values source needs a non-empty values list',
    when: { path: 'values_source.type', pattern: /^static$/ },
    then: Type.Object({
      values_source: Type.Object({
        values: Type.Array(StaticValueSchema, { minItems: 1 }),
      }),
    }),
  },
  {
    description: 'card values source needs the source card and its value column',
    when: { path: 'values_source.type', pattern: /^card$/ },
    then: Type.Object({
      values_source: Type.Object({
        card_id: FieldIdSchema,
        value_field: ColumnNameSchema,
      }),
    }),
  },
];
