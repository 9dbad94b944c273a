import { vi } from 'vitest';
import type { ClientConfig, FallbackContext } from './types';
import { DEFAULT_CONFIG } from './config';
import { createLogger } from './logger';

export const EDGE_HOST = 'edge.example.net';

export function createContext(overrides: Partial<ClientConfig> = {}): FallbackContext {
  return {
    config: { ...DEFAULT_CONFIG, ...overrides },
    logger: createLogger(false),
  };
}

/**
 * Build a marked <img> the way the rewriter renders it
 */
export function createCdnImage(src: string, attributes: Record<string, string> = {}): HTMLImageElement {
  const img = document.createElement('img');
  img.setAttribute('data-edge-cdn', '1');
  for (const [name, value] of Object.entries(attributes)) {
    img.setAttribute(name, value);
  }
  img.setAttribute('src', src);
  return img;
}

/**
 * jsdom never decodes images; pin what the browser would report
 */
export function setLoadState(img: HTMLImageElement, complete: boolean, naturalWidth: number): void {
  Object.defineProperty(img, 'complete', { configurable: true, get: () => complete });
  Object.defineProperty(img, 'naturalWidth', { configurable: true, get: () => naturalWidth });
}

/**
 * Replace the global Image constructor and record every requested URL
 */
export function recordWarmRequests(): string[] {
  const requested: string[] = [];

  class RecordingImage {
    set src(value: string) {
      requested.push(value);
    }
  }

  vi.stubGlobal('Image', RecordingImage);
  return requested;
}

export function fire(target: EventTarget, type: string): void {
  target.dispatchEvent(new Event(type));
}

/**
 * Let pending MutationObserver callbacks run
 */
export function flushMutations(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 0));
}

/**
 * Count changes to one attribute from now until the returned function is called
 */
export function countAttributeChanges(element: Element, attribute: string): () => number {
  const changes: MutationRecord[] = [];
  const observer = new MutationObserver(records => changes.push(...records));
  observer.observe(element, { attributes: true, attributeFilter: [attribute] });

  return () => {
    changes.push(...observer.takeRecords());
    observer.disconnect();
    return changes.length;
  };
}
