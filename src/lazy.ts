/**
 * Lazy-image reconciler
 *
 * A lazy image whose edge request failed earlier can be answered from the
 * browser's HTTP cache: it reports complete === true with naturalWidth === 0
 * and never fires an error event. There is no event for this case, so a
 * bounded poll looks for such images and hands them to the state machine.
 *
 * Lifecycle:
 * - start(): check immediately, then every intervalMs
 * - stops by itself once no candidate is still loading, or after maxChecks
 * - restart(): new lazy images appeared, grant a fresh set of checks
 *
 * The reconciler only reads element state; transitions happen in onFailure.
 */

import type { Logger } from './types';
import { LAZY_IMAGE_SELECTOR, getStage } from './utils';

export interface LazyReconcilerOptions {
  root: ParentNode;
  onFailure: (img: HTMLImageElement) => void;
  logger: Logger;
  intervalMs: number;
  maxChecks: number;
}

export class LazyImageReconciler {
  private options: LazyReconcilerOptions;

  private intervalId: ReturnType<typeof setInterval> | null = null;
  private checkCount: number = 0;

  constructor(options: LazyReconcilerOptions) {
    this.options = options;
  }

  get running(): boolean {
    return this.intervalId !== null;
  }

  /**
   * Checks performed since the last start/restart
   */
  get checks(): number {
    return this.checkCount;
  }

  /**
   * Start checking if not already running
   */
  start(): void {
    if (this.intervalId !== null) {
      return;
    }

    this.checkCount = 0;
    this.options.logger.log('Started checking lazy images');

    if (!this.check()) {
      return;
    }

    this.intervalId = setInterval(() => {
      if (!this.check()) {
        this.stop();
      }
    }, this.options.intervalMs);
  }

  /**
   * Reset the check budget and make sure a sweep is running
   */
  restart(): void {
    this.checkCount = 0;
    this.start();
  }

  stop(): void {
    if (this.intervalId === null) {
      return;
    }

    clearInterval(this.intervalId);
    this.intervalId = null;
  }

  /**
   * Run one sweep
   *
   * @returns true if another sweep is needed
   */
  check(): boolean {
    const { root, onFailure, logger, maxChecks } = this.options;
    const lazyImages = root.querySelectorAll<HTMLImageElement>(LAZY_IMAGE_SELECTOR);
    let needsChecking = false;

    logger.log('Checking lazy images', `${lazyImages.length} images (check #${this.checkCount + 1})`);

    lazyImages.forEach(img => {
      // Already fell back (or gave up) - the state machine owns it now
      if (getStage(img) !== 'edge') {
        return;
      }

      if (img.complete && img.naturalWidth === 0) {
        // Cached failure: complete but no pixels
        onFailure(img);
      } else if (!img.complete) {
        needsChecking = true;
      }
    });

    this.checkCount++;

    if (!needsChecking) {
      logger.log('Stopped checking lazy images', 'all resolved');
      return false;
    }

    if (this.checkCount >= maxChecks) {
      logger.log('Stopped checking lazy images', 'max checks reached');
      return false;
    }

    return true;
  }
}
