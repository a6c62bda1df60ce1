/**
 * Unit tests for the parameter documentation tools
 */

import { describe, it, expect } from 'vitest';

import {
  getCardParametersDocumentation,
  getDashboardParametersDocumentation,
} from '@/modules/mcp/index.js';
import {
  CARD_PARAMETER_TYPES,
  DASHBOARD_PARAMETER_TYPES,
  processCardParameters,
  processDashboardParameters,
} from '@/modules/parameters/index.js';

import { makeSequentialIds } from '../../fixtures/fakes.js';

describe('getCardParametersDocumentation', () => {
  it('lists every card type', () => {
    expect(getCardParametersDocumentation().types['all']).toEqual(CARD_PARAMETER_TYPES);
  });

  it('gives an example that passes validation', () => {
    const { example } = getCardParametersDocumentation();

    expect(processCardParameters(example, { ids: makeSequentialIds() }).isOk()).toBe(true);
  });

  it('describes the conditional values source rules', () => {
    expect(getCardParametersDocumentation().conditional_rules).toEqual([
      'static values source needs a non-empty values list',
      'card values source needs the source card and its value column',
    ]);
  });
});

describe('getDashboardParametersDocumentation', () => {
  it('lists every dashboard type', () => {
    expect(getDashboardParametersDocumentation().types['all']).toEqual(DASHBOARD_PARAMETER_TYPES);
  });

  it('gives an example that passes validation', () => {
    const { example } = getDashboardParametersDocumentation();

    expect(processDashboardParameters(example, { ids: makeSequentialIds() }).isOk()).toBe(true);
  });

  it('does not offer connected values sources', () => {
    expect(Object.keys(getDashboardParametersDocumentation().values_sources)).toEqual([
      'static',
      'card',
    ]);
  });
});
