/**
 * MCP Use Cases: get_card_parameters_documentation, get_dashboard_parameters_documentation
 *
 * Reference material for writing parameter descriptors. Built from the same
 * schemas and type tables the validators use, so it cannot drift from them.
 */

import {
  CARD_PARAMETER_TYPES,
  CardParameterDescriptorSchema,
  DASHBOARD_PARAMETER_TYPES,
  DATE_FILTER_TYPES,
  DashboardParameterDescriptorSchema,
  FIELD_FILTER_TYPES,
  LOCATION_FILTER_TYPES,
  NUMBER_FILTER_TYPES,
  SIMPLE_VARIABLE_TYPES,
  TEXT_FILTER_TYPES,
  VALID_TEMPORAL_UNITS,
  cardDescriptorSchema,
  dashboardDescriptorSchema,
} from '../../../parameters/index.js';

import type { TSchema } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

export interface ParametersDocumentation {
  readonly schema: TSchema;
  readonly conditional_rules: readonly string[];
  readonly types: Readonly<Record<string, readonly string[]>>;
  readonly widgets: Readonly<Record<string, string>>;
  readonly values_sources: Readonly<Record<string, string>>;
  readonly rules: readonly string[];
  readonly common_mistakes: readonly string[];
  readonly example: readonly Record<string, unknown>[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Shared Sections
// ─────────────────────────────────────────────────────────────────────────────

const WIDGETS = {
  input: 'Free text entry. Cannot be combined with a values_source.',
  dropdown: 'Pick from a list. Not available for date types.',
  search: 'Type-ahead search. Text and location types only.',
} as const;

const DEFAULT_RULES = [
  'Omit ui_widget to let the values_source decide: static and connected give a list, card gives search.',
  "'number/between' defaults are a two-element array of numbers.",
  'Multi-select defaults are arrays; single-select defaults are scalars.',
  'A required parameter needs a non-empty default.',
  'Static values for number types must be numbers.',
];

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export const getCardParametersDocumentation = (): ParametersDocumentation => ({
  schema: CardParameterDescriptorSchema,
  conditional_rules: cardDescriptorSchema.conditionals.map((rule) => rule.description),
  types: {
    simple_variables: SIMPLE_VARIABLE_TYPES,
    field_filters: FIELD_FILTER_TYPES,
    all: CARD_PARAMETER_TYPES,
  },
  widgets: WIDGETS,
  values_sources: {
    static: 'A fixed list given in values_source.values.',
    card: 'Values read from another card: card_id and the value_field column name, optional label_field column name.',
    connected: 'Values read from the bound column. Field filter types only.',
  },
  rules: [
    'name is the placeholder in the query: {{name}}. Lowercase letters, digits and underscores; "tab" is reserved.',
    'Simple variable types (category, number/=, date/single) substitute a value and cannot bind a field.',
    'Field filter types need field: { database_id, table_id, field_id } and expand to a whole condition.',
    'The default key is required; use null for no default.',
    'An array default on a type that allows it makes the filter multi-select.',
    ...DEFAULT_RULES,
  ],
  common_mistakes: [
    "Quoting a placeholder: write WHERE name = {{name}}, not WHERE name = '{{name}}'.",
    'Comparing with a field filter: write WHERE {{status}}, not WHERE status = {{status}}.',
    'Using {{name}} outside [[ ]] without a default: the query will not run until a value is supplied.',
    'Configuring a parameter the query never references, or referencing one that is not configured.',
  ],
  example: [
    {
      name: 'region',
      type: 'category',
      default: 'North',
      ui_widget: 'dropdown',
      values_source: { type: 'static', values: ['North', 'South'] },
    },
    {
      name: 'order_date',
      type: 'date/all-options',
      default: null,
      field: { database_id: 1, table_id: 2, field_id: 3 },
    },
  ],
});

export const getDashboardParametersDocumentation = (): ParametersDocumentation => ({
  schema: DashboardParameterDescriptorSchema,
  conditional_rules: dashboardDescriptorSchema.conditionals.map((rule) => rule.description),
  types: {
    text: TEXT_FILTER_TYPES,
    location: LOCATION_FILTER_TYPES,
    number: NUMBER_FILTER_TYPES,
    date: DATE_FILTER_TYPES,
    temporal_units: VALID_TEMPORAL_UNITS,
    all: DASHBOARD_PARAMETER_TYPES,
  },
  widgets: WIDGETS,
  values_sources: {
    static: 'A fixed list given in values_source.values.',
    card: 'Values read from another card: card_id and the value_field column name, optional label_field column name.',
  },
  rules: [
    'name is the label shown on the dashboard and must be unique; the slug is derived from it.',
    'isMultiSelect defaults to true on types that support it; setting it to true on other types is an error.',
    "'temporal-unit' filters need a non-empty temporal_units list, and their default must be one of them.",
    'Location types are stored as the matching string type.',
    'Connect filters to cards with mappings: dashcard_id, dashboard_parameter_name, card_parameter_name.',
    ...DEFAULT_RULES,
  ],
  common_mistakes: [
    'Mapping to a card parameter name that does not exist on the card; the error lists the available names.',
    'Using a dashcard_id that is not on the dashboard; the error lists the available dashcards.',
    'Giving a scalar default to a multi-select filter.',
  ],
  example: [
    {
      name: 'Status Filter',
      type: 'string/=',
      default: ['active'],
      values_source: { type: 'static', values: ['active', 'inactive'] },
    },
    {
      name: 'Customer',
      type: 'string/=',
      ui_widget: 'search',
      values_source: {
        type: 'card',
        card_id: 12,
        value_field: 'customer_name',
        label_field: 'customer_label',
      },
    },
    {
      name: 'Group By',
      type: 'temporal-unit',
      temporal_units: ['month', 'quarter', 'year'],
      default: 'month',
    },
  ],
});
