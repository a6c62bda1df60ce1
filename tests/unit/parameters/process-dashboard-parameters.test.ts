/**
 * Unit tests for dashboard parameter processing
 */

import { describe, it, expect } from 'vitest';

import { DATE_FILTER_TYPES, processDashboardParameters } from '@/modules/parameters/index.js';

import { makeSequentialIds } from '../../fixtures/fakes.js';

const process = (input: unknown, existingIds?: ReadonlySet<string>) =>
  processDashboardParameters(input, {
    ids: makeSequentialIds(),
    ...(existingIds !== undefined && { existingIds }),
  });

const errorsOf = (input: unknown): readonly string[] => {
  const error = process(input)._unsafeUnwrapErr();
  return error.type === 'ParameterValidationError' ? error.errors : [];
};

describe('processDashboardParameters', () => {
  it('turns multi-select on by default for text filters', () => {
    const result = process([{ name: 'Status', type: 'string/=', default: ['active'] }]);

    expect(result._unsafeUnwrap().parameters).toEqual([
      {
        id: 'ABCDEFGH',
        name: 'Status',
        slug: 'status',
        type: 'string/=',
        sectionId: 'string',
        required: false,
        default: ['active'],
        isMultiSelect: true,
        values_query_type: 'none',
      },
    ]);
  });

  it('rejects multi-select on a type without support', () => {
    const result = process([{ name: 'Start', type: 'date/single', isMultiSelect: true }]);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'ParameterValidationError',
      kind: 'business-rule',
      message: 'Parameter configuration is invalid (1 error(s))',
      errors: ["Parameter 0 (Start): Multi-select not supported for parameter type 'date/single'"],
    });
  });

  it.each(DATE_FILTER_TYPES)('rejects multi-select on %s', (type) => {
    expect(errorsOf([{ name: 'When', type, isMultiSelect: true }])).toEqual([
      `Parameter 0 (When): Multi-select not supported for parameter type '${type}'`,
    ]);
  });

  it('rejects multi-select on temporal-unit', () => {
    expect(
      errorsOf([
        { name: 'Unit', type: 'temporal-unit', temporal_units: ['month'], isMultiSelect: true },
      ])
    ).toEqual(["Parameter 0 (Unit): Multi-select not supported for parameter type 'temporal-unit'"]);
  });

  it.each(['string/=', 'location/=', 'number/=', 'number/!=', 'id'])(
    'accepts both multi-select settings on %s',
    (type) => {
      expect(process([{ name: 'A', type, isMultiSelect: true }]).isOk()).toBe(true);
      expect(process([{ name: 'A', type, isMultiSelect: false }]).isOk()).toBe(true);
    }
  );

  it('omits isMultiSelect for types without support', () => {
    const parameter = process([{ name: 'Start', type: 'date/single' }])._unsafeUnwrap()
      .parameters[0];

    expect(parameter).not.toHaveProperty('isMultiSelect');
    expect(parameter?.sectionId).toBe('date');
  });

  it('requires an array default while multi-select is on', () => {
    expect(errorsOf([{ name: 'Region', type: 'string/=', default: 'North' }])).toEqual([
      'Parameter 0 (Region): multi-select default for \'string/=\' must be an array, got string "North"',
    ]);
  });

  it('emits location filters as string filters in the location section', () => {
    const parameter = process([{ name: 'City', type: 'location/=' }])._unsafeUnwrap()
      .parameters[0];

    expect(parameter).toMatchObject({
      type: 'string/=',
      sectionId: 'location',
      isMultiSelect: true,
    });
  });

  it('stringifies static number lists and their default', () => {
    const parameter = process([
      {
        name: 'Year',
        type: 'number/=',
        default: 2024,
        isMultiSelect: false,
        values_source: { type: 'static', values: [2023, 2024] },
      },
    ])._unsafeUnwrap().parameters[0];

    expect(parameter).toMatchObject({
      slug: 'year',
      sectionId: 'number',
      default: ['2024'],
      isMultiSelect: false,
      values_query_type: 'list',
      values_source_type: 'static-list',
      values_source_config: { values: [['2023'], ['2024']] },
    });
  });

  it('stringifies a multi-select number default picked from a static list', () => {
    const parameter = process([
      {
        name: 'Years',
        type: 'number/=',
        default: [2024],
        values_source: { type: 'static', values: [2023, 2024] },
      },
    ])._unsafeUnwrap().parameters[0];

    expect(parameter).toMatchObject({
      default: ['2024'],
      isMultiSelect: true,
      values_source_config: { values: [['2023'], ['2024']] },
    });
  });

  it('leaves number defaults alone without a static list', () => {
    const parameter = process([{ name: 'Years', type: 'number/=', default: [2023, 2024] }])
      ._unsafeUnwrap().parameters[0];

    expect(parameter?.default).toEqual([2023, 2024]);
  });

  it('accepts card sources that name their columns', () => {
    const parameter = process([
      {
        name: 'Customer',
        type: 'string/=',
        ui_widget: 'search',
        values_source: { type: 'card', card_id: 12, value_field: 'customer_name' },
      },
    ])._unsafeUnwrap().parameters[0];

    expect(parameter).toMatchObject({
      values_query_type: 'search',
      values_source_type: 'card',
      values_source_config: {
        card_id: 12,
        value_field: ['field', 'customer_name', { 'base-type': 'type/Text' }],
      },
    });
  });

  describe('temporal units', () => {
    it('emits the allowed units', () => {
      const parameter = process([
        {
          name: 'Group By',
          type: 'temporal-unit',
          temporal_units: ['month', 'year'],
          default: 'month',
        },
      ])._unsafeUnwrap().parameters[0];

      expect(parameter).toEqual({
        id: 'ABCDEFGH',
        name: 'Group By',
        slug: 'group_by',
        type: 'temporal-unit',
        sectionId: 'temporal-unit',
        required: false,
        default: 'month',
        temporal_units: ['month', 'year'],
        values_query_type: 'none',
      });
    });

    it('checks the units list and the default against it', () => {
      expect(
        errorsOf([
          { name: 'A', type: 'temporal-unit', temporal_units: ['month', 'year'], default: 'day' },
          { name: 'B', type: 'temporal-unit' },
          { name: 'C', type: 'string/=', temporal_units: ['month'] },
        ])
      ).toEqual([
        "Parameter 0 (A): default 'day' is not one of temporal_units: month, year",
        "Parameter 1 (B): 'temporal-unit' parameters require a non-empty temporal_units list",
        "Parameter 2 (C): temporal_units is only allowed on 'temporal-unit' parameters",
      ]);
    });
  });

  describe('identifiers', () => {
    it('skips ids already used on the dashboard', () => {
      const result = process([{ name: 'Status', type: 'string/=' }], new Set(['ABCDEFGH']));

      expect(result._unsafeUnwrap().parameters[0]?.id).toBe('IJKLMNOP');
    });

    it('keeps supplied ids', () => {
      const result = process([
        { id: 'kept0001', name: 'Status', type: 'string/=' },
        { name: 'Region', type: 'string/=' },
      ]);

      expect(result._unsafeUnwrap().parameters.map((parameter) => parameter.id)).toEqual([
        'kept0001',
        'ABCDEFGH',
      ]);
    });
  });

  it('rejects labels that collide on their slug', () => {
    expect(
      errorsOf([
        { name: 'Order Status', type: 'string/=' },
        { name: 'order status', type: 'string/=' },
      ])
    ).toEqual(["Parameter 1 (order status): slug 'order_status' is already used by 'Order Status'"]);
  });

  it('reports unknown types structurally', () => {
    const error = process([{ name: 'Status', type: 'category' }])._unsafeUnwrapErr();

    expect(error.type).toBe('ParameterValidationError');
    expect(error.type === 'ParameterValidationError' && error.kind).toBe('structural');
  });
});
