/**
 * Dynamic content watcher
 *
 * Infinite scroll, "load more" buttons and AJAX widgets insert images after
 * the initial attach pass. One MutationObserver on document.body wires
 * every inserted marked image (or media element) into the state machine
 * and restarts the lazy-image reconciler when new lazy candidates appear.
 *
 * Without MutationObserver, or before document.body exists, the watcher
 * does nothing; the attach pass at DOM ready still covers the initial page.
 */

import type { Logger } from './types';
import type { LazyImageReconciler } from './lazy';
import { isElement, isLazyImage, collectCdnImages, collectCdnMedia } from './utils';

export interface WatcherOptions {
  document: Document;
  attachImage: (img: HTMLImageElement) => void;
  attachMedia: (media: HTMLMediaElement) => void;
  reconciler: LazyImageReconciler;
  logger: Logger;
}

export class DynamicContentWatcher {
  private options: WatcherOptions;
  private observer: MutationObserver | null = null;

  constructor(options: WatcherOptions) {
    this.options = options;
  }

  get observing(): boolean {
    return this.observer !== null;
  }

  /**
   * Start observing document.body
   *
   * @returns false if observing is not possible in this browser/state
   */
  start(): boolean {
    if (this.observer) {
      return true;
    }

    const { document, logger } = this.options;

    if (typeof MutationObserver === 'undefined') {
      logger.warn('Dynamic content not watched', 'MutationObserver unavailable');
      return false;
    }

    if (!document.body) {
      logger.warn('Dynamic content not watched', 'document.body missing');
      return false;
    }

    this.observer = new MutationObserver(mutations => this.handleMutations(mutations));
    this.observer.observe(document.body, {
      childList: true,
      subtree: true,
    });

    return true;
  }

  stop(): void {
    if (this.observer) {
      this.observer.disconnect();
      this.observer = null;
    }
  }

  private handleMutations(mutations: MutationRecord[]): void {
    const { attachImage, attachMedia, reconciler, logger } = this.options;
    let hasNewLazyImages = false;

    for (const mutation of mutations) {
      mutation.addedNodes.forEach(node => {
        if (!isElement(node)) {
          return;
        }

        for (const img of collectCdnImages(node)) {
          attachImage(img);
          if (isLazyImage(img)) {
            hasNewLazyImages = true;
          }
        }

        collectCdnMedia(node).forEach(attachMedia);
      });
    }

    if (hasNewLazyImages) {
      logger.log('New lazy images detected', 'restarting checks');
      reconciler.restart();
    }
  }
}
