/**
 * Unit tests for the filter type registry
 */

import { describe, it, expect } from 'vitest';

import {
  CARD_PARAMETER_TYPES,
  DASHBOARD_PARAMETER_TYPES,
  DATE_FILTER_TYPES,
  FIELD_FILTER_TYPES,
  SIMPLE_VARIABLE_TYPES,
  categoryOf,
  defaultShape,
  isFieldFilterType,
  isSimpleVariableType,
  sectionIdOf,
  supportsMultiSelect,
  valuesQueryTypeOf,
} from '@/modules/parameters/index.js';

describe('categoryOf', () => {
  it('maps each type family to its category', () => {
    expect(categoryOf('category')).toBe('text');
    expect(categoryOf('string/contains')).toBe('text');
    expect(categoryOf('location/=')).toBe('location');
    expect(categoryOf('number/between')).toBe('number');
    expect(categoryOf('date/relative')).toBe('date');
    expect(categoryOf('temporal-unit')).toBe('temporal-unit');
    expect(categoryOf('id')).toBe('id');
  });

  it('falls back to text for unknown types', () => {
    expect(categoryOf('geo/radius')).toBe('text');
  });
});

describe('supportsMultiSelect', () => {
  it('accepts text, location, number equality and id types', () => {
    expect(supportsMultiSelect('string/=')).toBe(true);
    expect(supportsMultiSelect('location/contains')).toBe(true);
    expect(supportsMultiSelect('number/=')).toBe(true);
    expect(supportsMultiSelect('number/!=')).toBe(true);
    expect(supportsMultiSelect('id')).toBe(true);
  });

  it('rejects ranges, dates and temporal units', () => {
    expect(supportsMultiSelect('number/between')).toBe(false);
    expect(supportsMultiSelect('number/>=')).toBe(false);
    expect(supportsMultiSelect('temporal-unit')).toBe(false);
    for (const type of DATE_FILTER_TYPES) {
      expect(supportsMultiSelect(type)).toBe(false);
    }
  });
});

describe('simple variables and field filters', () => {
  it('keeps the two card kinds disjoint', () => {
    for (const type of SIMPLE_VARIABLE_TYPES) {
      expect(isFieldFilterType(type)).toBe(false);
    }
    for (const type of FIELD_FILTER_TYPES) {
      expect(isSimpleVariableType(type)).toBe(false);
    }
    expect(CARD_PARAMETER_TYPES).toHaveLength(
      SIMPLE_VARIABLE_TYPES.length + FIELD_FILTER_TYPES.length
    );
  });

  it('offers no location types on cards', () => {
    expect(CARD_PARAMETER_TYPES.some((type) => type.startsWith('location/'))).toBe(false);
    expect(DASHBOARD_PARAMETER_TYPES).toContain('location/=');
  });
});

describe('defaultShape', () => {
  it('always takes a pair for number/between', () => {
    expect(defaultShape('number/between', false)).toBe('range_pair');
    expect(defaultShape('number/between', true)).toBe('range_pair');
  });

  it('takes an array only when multi-select is on and supported', () => {
    expect(defaultShape('string/=', true)).toBe('array');
    expect(defaultShape('string/=', false)).toBe('scalar');
    expect(defaultShape('date/single', true)).toBe('scalar');
  });
});

describe('sectionIdOf', () => {
  it('groups text types under string', () => {
    expect(sectionIdOf('string/=')).toBe('string');
    expect(sectionIdOf('category')).toBe('string');
    expect(sectionIdOf('location/=')).toBe('location');
    expect(sectionIdOf('date/range')).toBe('date');
  });
});

describe('valuesQueryTypeOf', () => {
  it('follows the widget when one is given', () => {
    expect(valuesQueryTypeOf('input', undefined)).toBe('none');
    expect(valuesQueryTypeOf('dropdown', 'card')).toBe('list');
    expect(valuesQueryTypeOf('search', 'static')).toBe('search');
  });

  it('infers from the values source otherwise', () => {
    expect(valuesQueryTypeOf(undefined, 'static')).toBe('list');
    expect(valuesQueryTypeOf(undefined, 'card')).toBe('search');
    expect(valuesQueryTypeOf(undefined, 'connected')).toBe('list');
    expect(valuesQueryTypeOf(undefined, undefined)).toBe('none');
  });
});
