import { describe, it, expect } from 'vitest';
import { resolveLogLevel } from './logger.js';

describe('resolveLogLevel', () => {
  it('keeps a known level', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('starts at warn when the level is unset or unknown', () => {
    expect(resolveLogLevel(undefined)).toBe('warn');
    expect(resolveLogLevel('verbose')).toBe('warn');
  });
});
