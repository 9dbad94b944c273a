/**
 * Video/audio fallback
 *
 * Same stage guard as images, but a media element can carry edge URLs in
 * three places: its own src, its <source> children, and a video poster.
 * Only URLs the rewriter marked are touched, so third-party embeds in the
 * same element are left alone.
 */

import type { FallbackContext } from './types';
import { getStage, setStage, getCdnSources, isCdnMedia, formatElapsed } from './utils';
import { extractOriginUrl } from './url';

/**
 * Handle a media load failure
 *
 * @returns true if this call moved the element from edge to origin
 */
export function handleMediaFailure(media: HTMLMediaElement, context: FallbackContext): boolean {
  const { logger } = context;
  const stage = getStage(media);

  if (stage !== 'edge') {
    logger.log('Media failure already handled', stage);
    return false;
  }

  let changed = false;

  // A URL the codec hands back unchanged has no origin to try
  const rewrite = (url: string): string | null => {
    const originUrl = extractOriginUrl(url);
    return originUrl === url ? null : originUrl;
  };

  if (media.hasAttribute('data-edge-cdn') && media.src) {
    const originUrl = rewrite(media.src);
    if (originUrl) {
      media.src = originUrl;
      changed = true;
    }
  }

  for (const source of getCdnSources(media)) {
    const originUrl = rewrite(source.src);
    if (originUrl) {
      source.src = originUrl;
      changed = true;
    }
  }

  if (media instanceof HTMLVideoElement && media.dataset.edgePoster && media.poster) {
    const originUrl = rewrite(media.poster);
    if (originUrl) {
      media.poster = originUrl;
      changed = true;
    }
  }

  if (!changed) {
    // Nothing we rewrote is loading; there is no origin to try
    setStage(media, 'failed');
    logger.warn('Media failed with no edge source', media.tagName.toLowerCase());
    return false;
  }

  if (context.config.debug) {
    media.dataset.fallbackStart = String(Date.now());
  }

  setStage(media, 'origin');
  watchOriginMedia(media, context);

  logger.log('Media edge failed', `reloading ${media.tagName.toLowerCase()} from origin`);
  media.load();

  return true;
}

function watchOriginMedia(media: HTMLMediaElement, context: FallbackContext): void {
  const detach = () => {
    media.removeEventListener('loadeddata', onLoaded);
    media.removeEventListener('error', onError, true);
  };
  const onLoaded = () => {
    detach();
    context.logger.log('Media origin loaded', `after ${formatElapsed(media)}`);
  };
  const onError = (event: Event) => {
    if (!isFinalError(media, event.target)) {
      return;
    }
    detach();
    if (getStage(media) !== 'origin') {
      return;
    }
    setStage(media, 'failed');
    media.onerror = null;
    context.logger.error('Media origin also failed', `after ${formatElapsed(media)}`);
  };

  media.addEventListener('loadeddata', onLoaded);
  // Capture: errors of <source> children do not bubble
  media.addEventListener('error', onError, true);
}

/**
 * Whether an error event means the element has nothing left to try
 *
 * The browser moves on to the next <source> by itself; only the error of
 * the media element or of its last source is final.
 */
function isFinalError(media: HTMLMediaElement, target: EventTarget | null): boolean {
  if (target === media) {
    return true;
  }

  const sources = media.querySelectorAll('source');
  return sources.length > 0 && sources[sources.length - 1] === target;
}

/**
 * Wire a marked video/audio element into the state machine
 *
 * @returns false if the element is not marked or was already attached
 */
export function attachMediaHandlers(media: HTMLMediaElement, context: FallbackContext): boolean {
  if (!isCdnMedia(media) || media.dataset.handlersAttached) {
    return false;
  }

  media.dataset.handlersAttached = '1';

  media.addEventListener('error', event => {
    if (isFinalError(media, event.target)) {
      handleMediaFailure(media, context);
    }
  }, true);

  return true;
}
