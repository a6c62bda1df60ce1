/**
 * Parameters Module - Dashboard Descriptor Schema
 */

import { Type, type Static } from '@sinclair/typebox';

import {
  ColumnNameSchema,
  FieldIdSchema,
  StaticValueSchema,
  StringEnum,
  UiWidgetSchema,
  valuesSourceConditionals,
} from './common.js';
import { DASHBOARD_PARAMETER_TYPES, VALID_TEMPORAL_UNITS } from '../filter-types.js';

import type { DescriptorSchema } from '../schema-validator.js';

export const DashboardValuesSourceSchema = Type.Object(
  {
    type: StringEnum(['static', 'card'] as const),
    values: Type.Optional(Type.Array(StaticValueSchema)),
    card_id: Type.Optional(FieldIdSchema),
    value_field: Type.Optional(ColumnNameSchema),
    label_field: Type.Optional(ColumnNameSchema),
  },
  { additionalProperties: false }
);

export const DashboardParameterDescriptorSchema = Type.Object(
  {
    name: Type.String({
      minLength: 1,
      description: 'Label shown on the dashboard; the slug is derived from it',
    }),
    type: StringEnum(DASHBOARD_PARAMETER_TYPES),
    id: Type.Optional(Type.String({ minLength: 1 })),
    default: Type.Optional(Type.Unknown()),
    required: Type.Optional(Type.Boolean()),
    isMultiSelect: Type.Optional(
      Type.Boolean({ description: 'Defaults to true for types that support it' })
    ),
    temporal_units: Type.Optional(Type.Array(StringEnum(VALID_TEMPORAL_UNITS))),
    ui_widget: Type.Optional(UiWidgetSchema),
    values_source: Type.Optional(DashboardValuesSourceSchema),
  },
  { additionalProperties: false }
);

export const DashboardParametersSchema = Type.Array(DashboardParameterDescriptorSchema, {
  description: 'Dashboard filter parameters',
});

export type DashboardValuesSource = Static<typeof DashboardValuesSourceSchema>;
export type DashboardParameterDescriptor = Static<typeof DashboardParameterDescriptorSchema>;

export const dashboardDescriptorSchema: DescriptorSchema = {
  root: DashboardParametersSchema,
  conditionals: valuesSourceConditionals,
};
