import { describe, it, expect, beforeEach } from 'vitest';
import { install, VERSION } from './index';
import { createCdnImage } from './test-helpers';

describe('install', () => {
  beforeEach(() => {
    document.body.innerHTML = '';
    delete window.EdgeMediaFallback;
    delete window.edgeMediaFallbackConfig;
  });

  it('publishes the API on the window', () => {
    const api = install(window);

    expect(window.EdgeMediaFallback).toBe(api);
    expect(api.version).toBe(VERSION);
  });

  it('returns the existing API when loaded twice', () => {
    const first = install(window);

    expect(install(window)).toBe(first);
  });

  it('reads the server-rendered config', () => {
    window.edgeMediaFallbackConfig = { debug: 0, lazyMaxChecks: '4' };
    const api = install(window);
    const img = createCdnImage('https://edge.tld/origin.tld/a.jpg');

    expect(api.handleError(img)).toBe(true);
    expect(img.src).toBe('https://origin.tld/a.jpg');
    expect(img.dataset.fallbackStart).toBeUndefined();
  });

  it('installs from the script entry', async () => {
    await import('./browser');

    expect(window.EdgeMediaFallback?.version).toBe(VERSION);
  });
});
