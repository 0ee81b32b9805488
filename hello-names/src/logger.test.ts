import { describe, expect, it } from 'vitest';
import { createLogger } from './logger.js';

describe('createLogger', () => {
  it('uses the requested level', () => {
    expect(createLogger('debug').level).toBe('debug');
  });

  it('enables only levels at or above the threshold', () => {
    const log = createLogger('error');

    expect(log.isLevelEnabled('warn')).toBe(false);
    expect(log.isLevelEnabled('error')).toBe(true);
  });
});
