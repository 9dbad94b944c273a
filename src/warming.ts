/**
 * Edge cache warming
 *
 * After an image had to be served from origin, request it once through the
 * worker so the next visitor gets a cache hit.
 *
 * Fire-and-forget: the response is never inspected, never retried. A failed
 * warm only means the next visitor takes the same cache miss.
 */

import type { FallbackContext, Logger } from './types';
import { buildWorkerUrl } from './url';

/**
 * Issue a background GET for an origin URL through the worker
 *
 * @returns The warm URL, or null where no Image constructor exists
 */
export function warmWorker(
  originUrl: string,
  workerDomain: string,
  logger: Logger
): string | null {
  if (typeof Image === 'undefined') {
    logger.warn('Warming unavailable', 'No Image constructor');
    return null;
  }

  const warmUrl = buildWorkerUrl(originUrl, workerDomain);

  // Off-DOM image: the browser fetches it, nothing renders it
  const probe = new Image();
  probe.src = warmUrl;

  logger.log('Warming worker', `${originUrl} via ${warmUrl}`);
  return warmUrl;
}

/**
 * Warm the worker for an element that fell back to origin
 *
 * At most once per element; skipped when the element carries no worker
 * domain or warming is disabled.
 */
export function warmImage(
  element: HTMLElement,
  originUrl: string,
  context: FallbackContext
): boolean {
  const workerDomain = element.dataset.workerDomain;

  if (!context.config.warming || !workerDomain || element.dataset.warmed) {
    return false;
  }

  element.dataset.warmed = '1';
  return warmWorker(originUrl, workerDomain, context.logger) !== null;
}
