/**
 * Parameters Module - Card (query-level) Descriptor Schema
 */

import { Type, type Static } from '@sinclair/typebox';

import {
  ColumnNameSchema,
  FieldIdSchema,
  ParameterNameSchema,
  StaticValueSchema,
  StringEnum,
  UiWidgetSchema,
  valuesSourceConditionals,
} from './common.js';
import { CARD_PARAMETER_TYPES } from '../filter-types.js';

import type { DescriptorSchema } from '../schema-validator.js';

export const FieldReferenceSchema = Type.Object(
  {
    database_id: FieldIdSchema,
    table_id: FieldIdSchema,
    field_id: FieldIdSchema,
  },
  { additionalProperties: false, description: 'Database column a field filter binds to' }
);

export const CardValuesSourceSchema = Type.Object(
  {
    type: StringEnum(['static', 'card', 'connected'] as const),
    values: Type.Optional(Type.Array(StaticValueSchema)),
    card_id: Type.Optional(FieldIdSchema),
    value_field: Type.Optional(ColumnNameSchema),
    label_field: Type.Optional(ColumnNameSchema),
  },
  { additionalProperties: false }
);

export const CardParameterDescriptorSchema = Type.Object(
  {
    name: ParameterNameSchema,
    type: StringEnum(CARD_PARAMETER_TYPES),
    default: Type.Unknown({ description: 'Default value; null when there is none' }),
    id: Type.Optional(Type.String({ minLength: 1 })),
    display_name: Type.Optional(Type.String({ minLength: 1 })),
    required: Type.Optional(Type.Boolean()),
    field: Type.Optional(FieldReferenceSchema),
    ui_widget: Type.Optional(UiWidgetSchema),
    values_source: Type.Optional(CardValuesSourceSchema),
  },
  { additionalProperties: false }
);

export const CardParametersSchema = Type.Array(CardParameterDescriptorSchema, {
  description: 'Card filter parameters',
});

export type FieldReference = Static<typeof FieldReferenceSchema>;
export type CardValuesSource = Static<typeof CardValuesSourceSchema>;
export type CardParameterDescriptor = Static<typeof CardParameterDescriptorSchema>;

export const cardDescriptorSchema: DescriptorSchema = {
  root: CardParametersSchema,
  conditionals: valuesSourceConditionals,
};
