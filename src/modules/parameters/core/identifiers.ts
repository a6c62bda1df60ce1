/**
 * Parameters Module - Identifier Generator
 *
 * Linking identifiers for parameters and URL-safe slugs for their names.
 */

import { randomInt, randomUUID } from 'node:crypto';

import { err, ok, type Result } from 'neverthrow';

import { createIdentifierExhaustedError, type IdentifierExhaustedError } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const MAX_ID_ATTEMPTS = 10;

export const DASHBOARD_ID_LENGTH = 8;

const DASHBOARD_ID_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

const RESERVED_SLUGS: ReadonlyMap<string, string> = new Map([['tab', 'tab_parameter']]);

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Random sources, injectable so tests can force collisions */
export interface RandomSource {
  randomUUID(): string;
  /** Integer in [0, max) */
  randomInt(max: number): number;
}

export interface IdentifierGenerator {
  /** UUID v4 string, not in `taken` */
  newCardParameterId(taken: ReadonlySet<string>): Result<string, IdentifierExhaustedError>;
  /** 8 characters of [A-Za-z0-9], not in `taken` */
  newDashboardParameterId(taken: ReadonlySet<string>): Result<string, IdentifierExhaustedError>;
}

const cryptoRandomSource: RandomSource = {
  randomUUID: () => randomUUID(),
  randomInt: (max) => randomInt(max),
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

const generateUnique = (
  next: () => string,
  taken: ReadonlySet<string>
): Result<string, IdentifierExhaustedError> => {
  for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
    const candidate = next();
    if (!taken.has(candidate)) {
      return ok(candidate);
    }
  }
  return err(createIdentifierExhaustedError(MAX_ID_ATTEMPTS));
};

export const makeIdentifierGenerator = (
  random: RandomSource = cryptoRandomSource
): IdentifierGenerator => {
  const shortId = (): string => {
    let id = '';
    for (let i = 0; i < DASHBOARD_ID_LENGTH; i++) {
      id += DASHBOARD_ID_ALPHABET.charAt(random.randomInt(DASHBOARD_ID_ALPHABET.length));
    }
    return id;
  };

  return {
    newCardParameterId: (taken) => generateUnique(() => random.randomUUID(), taken),
    newDashboardParameterId: (taken) => generateUnique(shortId, taken),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Slugs
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Derives a URL-safe slug from a parameter name.
 *
 * @example slugify('Order Status') // 'order_status'
 * @example slugify('tab') // 'tab_parameter'
 */
export const slugify = (name: string): string => {
  const slug = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');

  if (slug === '') return 'parameter';
  return RESERVED_SLUGS.get(slug) ?? slug;
};
