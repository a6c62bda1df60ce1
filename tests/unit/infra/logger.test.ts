/**
 * Unit tests for the logger factory
 */

import { describe, it, expect } from 'vitest';

import { createLogger } from '@/infra/logger/index.js';

describe('createLogger', () => {
  it('applies the configured level', () => {
    const logger = createLogger({ level: 'warn', pretty: false });

    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });

  it('defaults to info', () => {
    expect(createLogger({ pretty: false }).level).toBe('info');
  });
});
