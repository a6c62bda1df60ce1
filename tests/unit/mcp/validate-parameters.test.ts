/**
 * Unit tests for the parameter validation tools
 */

import { describe, it, expect } from 'vitest';

import { validateCardParameters, validateDashboardParameters } from '@/modules/mcp/index.js';
import { makeIdentifierGenerator } from '@/modules/parameters/index.js';

import { makeConstantRandomSource, makeSequentialIds } from '../../fixtures/fakes.js';

describe('validateCardParameters', () => {
  it('reports a valid batch', () => {
    const result = validateCardParameters(
      { ids: makeSequentialIds() },
      {
        parameters: [{ name: 'status', type: 'category', default: 'active' }],
        query: 'SELECT * FROM orders WHERE status = {{status}}',
      }
    );

    expect(result._unsafeUnwrap()).toEqual({
      valid: true,
      parameters_count: 1,
      errors: [],
      warnings: [],
    });
  });

  it('reports violations and query warnings together', () => {
    const report = validateCardParameters(
      { ids: makeSequentialIds() },
      {
        parameters: '[{"name":"Status","type":"category","default":null}]',
        query: 'SELECT * FROM orders WHERE status = {{status}}',
      }
    )._unsafeUnwrap();

    expect(report.valid).toBe(false);
    expect(report.parameters_count).toBe(0);
    expect(report.errors).toEqual([
      "Parameter 0 (Status): name must be a valid placeholder slug (expected 'status')",
    ]);
    expect(report.warnings.map((warning) => warning.code)).toEqual([
      'MISSING_PARAMETER_CONFIG',
      'UNUSED_PARAMETER',
    ]);
  });

  it('skips the query check without a query', () => {
    const report = validateCardParameters(
      { ids: makeSequentialIds() },
      { parameters: [{ name: 'unused', type: 'category', default: null }] }
    )._unsafeUnwrap();

    expect(report.warnings).toEqual([]);
  });

  it('returns input errors as errors', () => {
    const result = validateCardParameters({ ids: makeSequentialIds() }, { parameters: '42' });

    expect(result._unsafeUnwrapErr().message).toBe(
      'parameters must be an array of parameter objects'
    );
  });

  it('returns id exhaustion as an internal error', () => {
    const result = validateCardParameters(
      { ids: makeIdentifierGenerator(makeConstantRandomSource('same-uuid')) },
      {
        parameters: [
          { id: 'same-uuid', name: 'a', type: 'category', default: null },
          { name: 'b', type: 'category', default: null },
        ],
      }
    );

    expect(result._unsafeUnwrapErr()).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'Could not generate a unique parameter id after 10 attempts',
    });
  });
});

describe('validateDashboardParameters', () => {
  it('reports violations', () => {
    const result = validateDashboardParameters(
      { ids: makeSequentialIds() },
      { parameters: [{ name: 'Start', type: 'date/single', isMultiSelect: true }] }
    );

    expect(result._unsafeUnwrap()).toEqual({
      valid: false,
      parameters_count: 0,
      errors: ["Parameter 0 (Start): Multi-select not supported for parameter type 'date/single'"],
      warnings: [],
    });
  });

  it('counts valid parameters', () => {
    const result = validateDashboardParameters(
      { ids: makeSequentialIds() },
      {
        parameters: [
          { name: 'Status', type: 'string/=' },
          { name: 'Year', type: 'number/=', isMultiSelect: false, default: 2024 },
        ],
      }
    );

    expect(result._unsafeUnwrap().parameters_count).toBe(2);
  });
});
