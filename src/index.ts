/**
 * Edge Media Fallback - browser client
 *
 * Keeps pages visually correct when media rewritten to the edge worker
 * cannot be served from it:
 * - Edge failure: swap to the origin URL encoded in the edge URL
 * - Origin success: warm the worker so the next visitor gets a cache hit
 * - Origin failure: stop (no retry loops), keep the browser's broken image
 *
 * Error handling philosophy:
 * - Nothing here throws to the page. Unrecognized URLs pass through
 *   unchanged; missing browser features degrade to doing less.
 * - Every entry point is safe to call twice for the same failure.
 *
 * Edge URL shape: https://{worker}/{origin-host}/{path}?query#fragment
 *
 * @version 1.0.0
 */

import type { PublicApi } from './types';
import { parseConfig } from './config';
import { createFallbackClient } from './client';
import { VERSION } from './utils';

export type { ClientConfig, SourceStage, LogEntry, Logger, FallbackContext, PublicApi } from './types';
export type { FallbackClient } from './client';
export { createFallbackClient } from './client';
export { parseConfig, DEFAULT_CONFIG } from './config';
export { extractOriginUrl, buildWorkerUrl, isEdgeUrl } from './url';
export { handleImageFailure, attachImageHandlers } from './fallback';
export { handleMediaFailure, attachMediaHandlers } from './media';
export { LazyImageReconciler } from './lazy';
export { DynamicContentWatcher } from './observer';
export { VERSION };

/**
 * Start the client for a window and publish window.EdgeMediaFallback
 *
 * Loading the script twice (theme + plugin, cached + fresh) must not
 * attach handlers twice, so a second call returns the existing API.
 */
export function install(win: Window = window): PublicApi {
  const existing = win.EdgeMediaFallback;
  if (existing) {
    return existing;
  }

  const config = parseConfig(win.edgeMediaFallbackConfig);
  const client = createFallbackClient(config, win.document);
  client.start();

  const api: PublicApi = {
    version: VERSION,
    handleError: client.handleError,
    handleMediaError: client.handleMediaError,
    logs: client.logs,
  };

  win.EdgeMediaFallback = api;
  return api;
}
