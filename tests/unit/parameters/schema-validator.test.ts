/**
 * Unit tests for the descriptor schema validator
 */

import { describe, it, expect } from 'vitest';

import {
  cardDescriptorSchema,
  dashboardDescriptorSchema,
  formatPointer,
  formatStructuralError,
  validateAgainstSchema,
} from '@/modules/parameters/index.js';

describe('formatPointer', () => {
  it('turns JSON pointers into readable paths', () => {
    expect(formatPointer('/0/values_source/type')).toBe('[0].values_source.type');
    expect(formatPointer('/2/default/1')).toBe('[2].default[1]');
    expect(formatPointer('/0/a~1b')).toBe('[0].a/b');
  });

  it('names the root', () => {
    expect(formatPointer('')).toBe('root');
  });
});

describe('validateAgainstSchema', () => {
  it('accepts a valid descriptor list', () => {
    const errors = validateAgainstSchema(cardDescriptorSchema, [
      { name: 'status', type: 'category', default: 'active' },
      {
        name: 'created_at',
        type: 'date/range',
        default: null,
        field: { database_id: 1, table_id: 2, field_id: 3 },
      },
    ]);

    expect(errors).toEqual([]);
  });

  it('rejects a non-array instance', () => {
    expect(validateAgainstSchema(cardDescriptorSchema, { name: 'status' })).toEqual([
      { path: 'root', message: 'must be an array (got {"name":"status"})' },
    ]);
  });

  it('reports a missing default key', () => {
    const errors = validateAgainstSchema(cardDescriptorSchema, [
      { name: 'status', type: 'category' },
    ]);

    expect(errors).toEqual([{ path: '[0].default', message: 'is required' }]);
  });

  it('reports unknown properties', () => {
    const errors = validateAgainstSchema(cardDescriptorSchema, [
      { name: 'status', type: 'category', default: null, colour: 'red' },
    ]);

    expect(errors).toEqual([{ path: '[0].colour', message: 'is not an allowed property' }]);
  });

  it('lists the allowed values for an unknown type', () => {
    const errors = validateAgainstSchema(cardDescriptorSchema, [
      { name: 'status', type: 'string/like', default: null },
    ]);

    expect(errors).toHaveLength(1);
    expect(errors[0]?.path).toBe('[0].type');
    expect(errors[0]?.message).toMatch(/^must be one of: category, number\/=, date\/single, /);
    expect(errors[0]?.message).toMatch(/\(got "string\/like"\)$/);
  });

  it('checks the placeholder name pattern', () => {
    const errors = validateAgainstSchema(cardDescriptorSchema, [
      { name: 'order status', type: 'category', default: null },
    ]);

    expect(errors).toEqual([
      { path: '[0].name', message: 'must match ^[A-Za-z0-9_]+$ (got "order status")' },
    ]);
  });

  it('reports every error across the batch', () => {
    const errors = validateAgainstSchema(cardDescriptorSchema, [
      { name: 'a', type: 'category', default: null, required: 'yes' },
      { name: 'b', type: 'category', default: null },
      { name: 'c', type: 'category', default: null, ui_widget: 'slider' },
    ]);

    expect(errors.map(formatStructuralError)).toEqual([
      '[0].required: must be a boolean (got "yes")',
      '[2].ui_widget: must be one of: input, dropdown, search (got "slider")',
    ]);
  });

  describe('values source conditionals', () => {
    it('requires a non-empty list for static sources', () => {
      const errors = validateAgainstSchema(cardDescriptorSchema, [
        {
          name: 'region',
          type: 'category',
          default: null,
          values_source: { type: 'static', values: [] },
        },
      ]);

      expect(errors).toEqual([
        { path: '[0].values_source.values', message: 'must contain at least 1 item(s)' },
      ]);
    });

    it('requires the values list to be present for static sources', () => {
      const errors = validateAgainstSchema(cardDescriptorSchema, [
        { name: 'region', type: 'category', default: null, values_source: { type: 'static' } },
      ]);

      expect(errors).toContainEqual({ path: '[0].values_source.values', message: 'is required' });
    });

    it('requires card_id and value_field for card sources', () => {
      const errors = validateAgainstSchema(dashboardDescriptorSchema, [
        { name: 'Region', type: 'string/=', values_source: { type: 'card', card_id: 12 } },
      ]);

      expect(errors).toContainEqual({
        path: '[0].values_source.value_field',
        message: 'is required',
      });
      expect(errors.some((error) => error.path === '[0].values_source.card_id')).toBe(false);
    });

    it('takes card source columns by name', () => {
      const errors = validateAgainstSchema(cardDescriptorSchema, [
        {
          name: 'customer',
          type: 'category',
          default: null,
          values_source: { type: 'card', card_id: 12, value_field: 34 },
        },
      ]);

      expect(errors).toContainEqual({
        path: '[0].values_source.value_field',
        message: 'must be a string (got number 34)',
      });
    });

    it('leaves connected sources alone', () => {
      const errors = validateAgainstSchema(cardDescriptorSchema, [
        {
          name: 'status',
          type: 'string/=',
          default: null,
          field: { database_id: 1, table_id: 2, field_id: 3 },
          values_source: { type: 'connected' },
        },
      ]);

      expect(errors).toEqual([]);
    });
  });

  it('accepts free-form dashboard labels', () => {
    const errors = validateAgainstSchema(dashboardDescriptorSchema, [
      { name: 'Status Filter', type: 'string/=' },
    ]);

    expect(errors).toEqual([]);
  });
});
