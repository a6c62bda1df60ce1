/**
 * Unit tests for identifier and slug generation
 */

import { describe, it, expect } from 'vitest';

import {
  DASHBOARD_ID_LENGTH,
  MAX_ID_ATTEMPTS,
  makeIdentifierGenerator,
  slugify,
} from '@/modules/parameters/index.js';

import { makeConstantRandomSource, makeSequentialRandomSource } from '../../fixtures/fakes.js';

describe('slugify', () => {
  it('lowercases and joins words with underscores', () => {
    expect(slugify('Order Status')).toBe('order_status');
    expect(slugify('  Created  At ')).toBe('created_at');
  });

  it('collapses punctuation runs and trims underscores', () => {
    expect(slugify('Revenue (EUR) / Month')).toBe('revenue_eur_month');
    expect(slugify('__region__')).toBe('region');
  });

  it('falls back when nothing is left', () => {
    expect(slugify('!!!')).toBe('parameter');
    expect(slugify('')).toBe('parameter');
  });

  it('never yields the reserved token tab', () => {
    expect(slugify('tab')).toBe('tab_parameter');
    expect(slugify('Tab')).toBe('tab_parameter');
    expect(slugify('tabs')).toBe('tabs');
  });

  it('is deterministic', () => {
    expect(slugify('Status Filter')).toBe(slugify('Status Filter'));
  });
});

describe('makeIdentifierGenerator', () => {
  it('generates UUIDs for card parameters', () => {
    const ids = makeIdentifierGenerator(makeSequentialRandomSource());

    const first = ids.newCardParameterId(new Set());
    const second = ids.newCardParameterId(new Set());

    expect(first._unsafeUnwrap()).toBe('00000000-0000-4000-8000-000000000001');
    expect(second._unsafeUnwrap()).toBe('00000000-0000-4000-8000-000000000002');
  });

  it('generates short alphanumeric ids for dashboard parameters', () => {
    const ids = makeIdentifierGenerator(makeSequentialRandomSource());

    expect(ids.newDashboardParameterId(new Set())._unsafeUnwrap()).toBe('ABCDEFGH');
    expect(ids.newDashboardParameterId(new Set())._unsafeUnwrap()).toBe('IJKLMNOP');
  });

  it('uses the default crypto source', () => {
    const ids = makeIdentifierGenerator();

    const cardId = ids.newCardParameterId(new Set())._unsafeUnwrap();
    const dashboardId = ids.newDashboardParameterId(new Set())._unsafeUnwrap();

    expect(cardId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(dashboardId).toMatch(/^[A-Za-z0-9]+$/);
    expect(dashboardId).toHaveLength(DASHBOARD_ID_LENGTH);
  });

  it('skips ids that are already taken', () => {
    const ids = makeIdentifierGenerator(makeSequentialRandomSource());

    const id = ids.newDashboardParameterId(new Set(['ABCDEFGH']));

    expect(id._unsafeUnwrap()).toBe('IJKLMNOP');
  });

  it('fails after the maximum number of collisions', () => {
    const ids = makeIdentifierGenerator(makeConstantRandomSource('taken-uuid', 0));

    const cardId = ids.newCardParameterId(new Set(['taken-uuid']));
    const dashboardId = ids.newDashboardParameterId(new Set(['AAAAAAAA']));

    expect(cardId.isErr()).toBe(true);
    expect(cardId._unsafeUnwrapErr()).toEqual({
      type: 'IdentifierExhaustedError',
      message: `Could not generate a unique parameter id after ${String(MAX_ID_ATTEMPTS)} attempts`,
      attempts: MAX_ID_ATTEMPTS,
    });
    expect(dashboardId._unsafeUnwrapErr().type).toBe('IdentifierExhaustedError');
  });
});
