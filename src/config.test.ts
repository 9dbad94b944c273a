import { describe, it, expect } from 'vitest';
import { parseConfig, parseFlag, parsePositiveInt, DEFAULT_CONFIG } from './config';

describe('parseFlag', () => {
  it('accepts booleans, numbers and their string forms', () => {
    expect(parseFlag(true, false)).toBe(true);
    expect(parseFlag(1, false)).toBe(true);
    expect(parseFlag(0, true)).toBe(false);
    expect(parseFlag('1', false)).toBe(true);
    expect(parseFlag(' TRUE ', false)).toBe(true);
    expect(parseFlag('false', true)).toBe(false);
    expect(parseFlag('', true)).toBe(false);
  });

  it('falls back on anything else', () => {
    expect(parseFlag('yes', true)).toBe(true);
    expect(parseFlag(null, false)).toBe(false);
    expect(parseFlag({}, true)).toBe(true);
  });
});

describe('parsePositiveInt', () => {
  it('parses numbers and numeric strings', () => {
    expect(parsePositiveInt(500, 2000)).toBe(500);
    expect(parsePositiveInt('750', 2000)).toBe(750);
    expect(parsePositiveInt('3.9', 10)).toBe(3);
  });

  it('rejects zero, negatives and garbage', () => {
    expect(parsePositiveInt(0, 2000)).toBe(2000);
    expect(parsePositiveInt(-5, 2000)).toBe(2000);
    expect(parsePositiveInt('abc', 2000)).toBe(2000);
    expect(parsePositiveInt(undefined, 2000)).toBe(2000);
  });
});

describe('parseConfig', () => {
  it('returns defaults when nothing was provided', () => {
    expect(parseConfig(undefined)).toEqual(DEFAULT_CONFIG);
    expect(parseConfig('debug')).toEqual(DEFAULT_CONFIG);
    expect(parseConfig([1])).toEqual(DEFAULT_CONFIG);
  });

  it('reads the server-rendered object', () => {
    expect(parseConfig({ debug: 1 })).toEqual({
      debug: true,
      warming: true,
      lazyCheckIntervalMs: 2000,
      lazyMaxChecks: 10,
    });
  });

  it('reads every field', () => {
    expect(parseConfig({
      debug: '0',
      warming: false,
      lazyCheckIntervalMs: '500',
      lazyMaxChecks: 3,
    })).toEqual({
      debug: false,
      warming: false,
      lazyCheckIntervalMs: 500,
      lazyMaxChecks: 3,
    });
  });

  it('does not share the default object', () => {
    const config = parseConfig(null);
    config.debug = true;
    expect(DEFAULT_CONFIG.debug).toBe(false);
  });
});
