/**
 * Client configuration
 *
 * The server prints a small inline script before the client loads:
 *   window.edgeMediaFallbackConfig = { debug: 1 };
 *
 * Values arrive loosely typed (the server renders booleans as 0/1), so every
 * field is parsed by hand and falls back to its default when invalid.
 */

import type { ClientConfig } from './types';

export const DEFAULT_CONFIG: ClientConfig = {
  debug: false,
  warming: true,
  // Browsers give no event for a cached lazy-image failure; poll instead.
  // 10 checks x 2s = stop after 20 seconds.
  lazyCheckIntervalMs: 2000,
  lazyMaxChecks: 10,
};

/**
 * Parse a flag rendered as true/false, 1/0 or their string forms
 */
export function parseFlag(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    return value !== 0;
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '1' || normalized === 'true') return true;
    if (normalized === '0' || normalized === 'false' || normalized === '') return false;
  }

  return fallback;
}

/**
 * Parse a positive integer given as number or string
 */
export function parsePositiveInt(value: unknown, fallback: number): number {
  if (typeof value !== 'number' && typeof value !== 'string') {
    return fallback;
  }

  const parsed = parseInt(String(value), 10);
  return isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build a ClientConfig from whatever the page provided
 */
export function parseConfig(raw: unknown): ClientConfig {
  if (!isRecord(raw)) {
    return { ...DEFAULT_CONFIG };
  }

  return {
    debug: parseFlag(raw.debug, DEFAULT_CONFIG.debug),
    warming: parseFlag(raw.warming, DEFAULT_CONFIG.warming),
    lazyCheckIntervalMs: parsePositiveInt(raw.lazyCheckIntervalMs, DEFAULT_CONFIG.lazyCheckIntervalMs),
    lazyMaxChecks: parsePositiveInt(raw.lazyMaxChecks, DEFAULT_CONFIG.lazyMaxChecks),
  };
}
