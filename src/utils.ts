/**
 * Markup contract shared with the server-side rewriter, and helpers
 * for reading the per-element state it carries
 */

import type { SourceStage } from './types';

export const VERSION = '1.0.0';

// Class added once an image (edge or origin) has actually rendered.
// Rewriter CSS keeps unloaded images hidden to avoid a broken-image flash.
export const LOADED_CLASS = 'edge-loaded';

export const CDN_IMAGE_SELECTOR = 'img[data-edge-cdn]';
export const LAZY_IMAGE_SELECTOR = 'img[loading="lazy"][data-edge-cdn]';

/**
 * Read the fallback stage stored on an element
 */
export function getStage(element: HTMLElement): SourceStage {
  const value = element.dataset.fallback;

  if (!value) {
    return 'edge';
  }

  if (value === '1') {
    return 'origin';
  }

  // "2", or anything a stale stub may have written
  return 'failed';
}

/**
 * Write the fallback stage onto an element
 *
 * Only the state machine (fallback.ts, media.ts) calls this.
 */
export function setStage(element: HTMLElement, stage: SourceStage): void {
  switch (stage) {
    case 'edge':
      delete element.dataset.fallback;
      break;
    case 'origin':
      element.dataset.fallback = '1';
      break;
    case 'failed':
      element.dataset.fallback = '2';
      break;
  }
}

export function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

export function isCdnImage(element: Element): element is HTMLImageElement {
  return element.tagName === 'IMG' && element.hasAttribute('data-edge-cdn');
}

export function isLazyImage(img: HTMLImageElement): boolean {
  return img.getAttribute('loading') === 'lazy';
}

export function isMediaElement(element: Element): element is HTMLMediaElement {
  return element.tagName === 'VIDEO' || element.tagName === 'AUDIO';
}

/**
 * Media element that carries an edge URL on itself or on a source child
 */
export function isCdnMedia(element: Element): element is HTMLMediaElement {
  if (!isMediaElement(element)) {
    return false;
  }

  return element.hasAttribute('data-edge-cdn') ||
         getCdnSources(element).length > 0;
}

/**
 * Direct source children carrying an edge URL
 */
export function getCdnSources(media: HTMLMediaElement): HTMLSourceElement[] {
  const sources: HTMLSourceElement[] = [];

  for (const child of Array.from(media.children)) {
    if (child instanceof HTMLSourceElement && child.hasAttribute('data-edge-cdn')) {
      sources.push(child);
    }
  }

  return sources;
}

/**
 * Marked images among an element and its descendants
 */
export function collectCdnImages(root: Element): HTMLImageElement[] {
  const images: HTMLImageElement[] = [];

  if (isCdnImage(root)) {
    images.push(root);
  }

  root.querySelectorAll<HTMLImageElement>(CDN_IMAGE_SELECTOR).forEach(img => images.push(img));

  return images;
}

/**
 * Marked video/audio among an element and its descendants
 */
export function collectCdnMedia(root: Element): HTMLMediaElement[] {
  const media: HTMLMediaElement[] = [];

  if (isCdnMedia(root)) {
    media.push(root);
  }

  root.querySelectorAll<HTMLMediaElement>('video, audio').forEach(element => {
    if (isCdnMedia(element)) {
      media.push(element);
    }
  });

  return media;
}

/**
 * Milliseconds since the fallback started, if it was recorded
 */
export function formatElapsed(element: HTMLElement): string {
  const started = parseInt(element.dataset.fallbackStart || '', 10);
  return isNaN(started) ? 'unknown' : `${Date.now() - started}ms`;
}
