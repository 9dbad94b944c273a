/**
 * Per-image fallback state machine
 *
 *   edge --failure--> origin --load--> origin (loaded, worker warmed)
 *                            \--error-> failed (terminal)
 *
 * Failures are reported by several producers that can overlap for the same
 * image: the rewriter's inline onerror stub, the listeners bound here, and
 * the lazy-image reconciler. Every entry point checks the stage stored on
 * the element first; whoever arrives first transitions, the rest are no-ops.
 *
 * The element is the only state store (data-fallback and friends), so a
 * removed image takes its state with it.
 */

import type { FallbackContext } from './types';
import { LOADED_CLASS, getStage, setStage, isCdnImage, formatElapsed } from './utils';
import { extractOriginUrl } from './url';
import { warmImage } from './warming';

/**
 * Handle an image load failure
 *
 * Safe to call from any trigger, any number of times.
 *
 * @returns true if this call moved the image from edge to origin
 */
export function handleImageFailure(img: HTMLImageElement, context: FallbackContext): boolean {
  const { logger } = context;
  const stage = getStage(img);

  if (stage !== 'edge') {
    logger.log('Failure already handled', `${stage}: ${img.src}`);
    return false;
  }

  // Capture the URL that actually failed (may come from srcset) before touching src
  const failedUrl = img.currentSrc || img.src;
  const originUrl = extractOriginUrl(failedUrl);

  if (context.config.debug) {
    img.dataset.fallbackStart = String(Date.now());
  }

  logger.log('Edge failed', `${failedUrl} -> ${originUrl}`);

  setStage(img, 'origin');
  img.classList.remove(LOADED_CLASS);

  // A source set would keep resolving to edge URLs
  img.removeAttribute('srcset');
  img.removeAttribute('sizes');
  if (img.parentElement && img.parentElement.tagName === 'PICTURE') {
    img.parentElement.querySelectorAll('source').forEach(source => source.removeAttribute('srcset'));
  }

  // An undecodable URL is retried as-is; warming it would request a doubled path
  watchOriginLoad(img, originUrl, context, originUrl !== failedUrl);
  img.src = originUrl;

  return true;
}

/**
 * Bind one-shot listeners for the origin load
 *
 * Whichever of load/error fires first removes both. data-origin-watched
 * marks that the origin load has an observer.
 */
export function watchOriginLoad(
  img: HTMLImageElement,
  originUrl: string,
  context: FallbackContext,
  warm = true
): void {
  const detach = () => {
    img.removeEventListener('load', onLoad);
    img.removeEventListener('error', onError);
  };
  const onLoad = () => {
    detach();
    handleOriginSuccess(img, originUrl, context, warm);
  };
  const onError = () => {
    detach();
    handleOriginFailure(img, context);
  };

  img.dataset.originWatched = '1';
  img.addEventListener('load', onLoad);
  img.addEventListener('error', onError);
}

function handleOriginSuccess(
  img: HTMLImageElement,
  originUrl: string,
  context: FallbackContext,
  warm = true
): void {
  if (getStage(img) !== 'origin') {
    return;
  }

  img.classList.add(LOADED_CLASS);
  context.logger.log('Origin loaded', `${originUrl} after ${formatElapsed(img)}`);

  if (warm) {
    warmImage(img, originUrl, context);
  }
}

function handleOriginFailure(img: HTMLImageElement, context: FallbackContext): void {
  // The inline stub may already have marked it failed; still record the outcome
  if (getStage(img) === 'edge') {
    return;
  }

  setStage(img, 'failed');
  img.classList.remove(LOADED_CLASS);

  // Stop the rewriter's inline stub from reacting again
  img.onerror = null;

  context.logger.error('Origin also failed', `${img.src} after ${formatElapsed(img)}`);
}

/**
 * Take over an image whose inline stub already switched it to origin
 * before this script loaded
 */
function adoptOriginFallback(img: HTMLImageElement, context: FallbackContext): void {
  const originUrl = img.src;
  context.logger.log('Adopting stub fallback', originUrl);

  if (!img.complete) {
    watchOriginLoad(img, originUrl, context);
    return;
  }

  if (img.naturalWidth > 0) {
    handleOriginSuccess(img, originUrl, context);
  } else {
    handleOriginFailure(img, context);
  }
}

/**
 * Wire a marked image into the state machine
 *
 * Images served instantly from the HTTP cache are already complete and
 * will never fire load/error, so they are classified on the spot.
 *
 * @returns false if the element is not marked or was already attached
 */
export function attachImageHandlers(img: HTMLImageElement, context: FallbackContext): boolean {
  if (!isCdnImage(img) || img.dataset.handlersAttached) {
    return false;
  }

  img.dataset.handlersAttached = '1';

  const stage = getStage(img);

  if (stage === 'origin') {
    adoptOriginFallback(img, context);
    return true;
  }

  if (stage === 'failed') {
    return true;
  }

  if (img.complete) {
    if (img.naturalWidth > 0) {
      img.classList.add(LOADED_CLASS);
    } else {
      context.logger.log('Image already failed', img.src);
      handleImageFailure(img, context);
    }
    return true;
  }

  img.addEventListener('load', () => {
    if (getStage(img) !== 'failed') {
      img.classList.add(LOADED_CLASS);
    }
  });

  img.addEventListener('error', () => {
    if (handleImageFailure(img, context)) {
      return;
    }

    // The inline stub won the race and switched to origin; follow that load
    if (getStage(img) === 'origin' && !img.dataset.originWatched) {
      adoptOriginFallback(img, context);
    }
  });

  return true;
}
