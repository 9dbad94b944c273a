/**
 * Fallback client
 *
 * Wires the pieces together for one document:
 * - attach pass over the images/media present at DOM ready
 * - dynamic content watcher for everything inserted later
 * - lazy-image reconciler, started shortly after DOM ready
 */

import type { ClientConfig, FallbackContext, LogEntry, Logger } from './types';
import { createLogger } from './logger';
import { handleImageFailure, attachImageHandlers } from './fallback';
import { handleMediaFailure, attachMediaHandlers } from './media';
import { LazyImageReconciler } from './lazy';
import { DynamicContentWatcher } from './observer';
import { CDN_IMAGE_SELECTOR, collectCdnMedia } from './utils';

// Give the browser a moment to settle lazy images before the first sweep
export const LAZY_START_DELAY_MS = 100;

export interface FallbackClient {
  readonly config: ClientConfig;
  readonly logger: Logger;
  readonly reconciler: LazyImageReconciler;
  readonly watcher: DynamicContentWatcher;
  handleError(img: HTMLImageElement): boolean;
  handleMediaError(media: HTMLMediaElement): boolean;
  attachAll(): number;
  start(): void;
  stop(): void;
  logs(): LogEntry[];
}

export function createFallbackClient(config: ClientConfig, doc: Document = document): FallbackClient {
  const logger = createLogger(config.debug);
  const context: FallbackContext = { config, logger };

  const reconciler = new LazyImageReconciler({
    root: doc,
    onFailure: img => handleImageFailure(img, context),
    logger,
    intervalMs: config.lazyCheckIntervalMs,
    maxChecks: config.lazyMaxChecks,
  });

  const watcher = new DynamicContentWatcher({
    document: doc,
    attachImage: img => attachImageHandlers(img, context),
    attachMedia: media => attachMediaHandlers(media, context),
    reconciler,
    logger,
  });

  let startTimer: ReturnType<typeof setTimeout> | null = null;

  const attachAll = (): number => {
    let attached = 0;

    doc.querySelectorAll<HTMLImageElement>(CDN_IMAGE_SELECTOR).forEach(img => {
      if (attachImageHandlers(img, context)) attached++;
    });

    if (doc.body) {
      collectCdnMedia(doc.body).forEach(media => {
        if (attachMediaHandlers(media, context)) attached++;
      });
    }

    logger.log('Attached handlers', `${attached} elements`);
    return attached;
  };

  const setup = () => {
    attachAll();
    watcher.start();

    startTimer = setTimeout(() => {
      startTimer = null;
      reconciler.start();
    }, LAZY_START_DELAY_MS);
  };

  return {
    config,
    logger,
    reconciler,
    watcher,
    handleError: img => handleImageFailure(img, context),
    handleMediaError: media => handleMediaFailure(media, context),
    attachAll,
    start() {
      if (doc.readyState === 'loading') {
        doc.addEventListener('DOMContentLoaded', setup, { once: true });
      } else {
        setup();
      }
    },
    stop() {
      doc.removeEventListener('DOMContentLoaded', setup);
      if (startTimer !== null) {
        clearTimeout(startTimer);
        startTimer = null;
      }
      watcher.stop();
      reconciler.stop();
    },
    logs: () => logger.entries(),
  };
}
