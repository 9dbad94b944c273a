/**
 * Edge URL <-> origin URL mapping
 *
 * The rewriter produces edge URLs of the form
 *   https://{edge-host}/{origin-host}/{origin-path}?query#fragment
 * so the origin URL can always be recovered from the edge URL alone,
 * without asking the worker.
 *
 * Anything that does not fit that shape is returned unchanged: a visibly
 * broken image is preferable to an exception inside an error handler.
 */

/**
 * Extract the origin URL from an edge URL
 *
 * @example
 * extractOriginUrl('https://edge.example.net/example.com/uploads/a.jpg?v=7#frag')
 * // => 'https://example.com/uploads/a.jpg?v=7#frag'
 *
 * @param edgeUrl - URL as found in img.src / img.currentSrc
 * @param minSegments - Path segments required (origin host + path)
 * @returns Origin URL, or edgeUrl unchanged when it is not a rewritten URL
 */
export function extractOriginUrl(edgeUrl: string, minSegments = 2): string {
  try {
    // Rejects relative and otherwise unparsable input
    new URL(edgeUrl);

    const schemeEnd = edgeUrl.indexOf('://');
    if (schemeEnd === -1) {
      return edgeUrl;
    }

    const scheme = edgeUrl.substring(0, schemeEnd);
    const rest = edgeUrl.substring(schemeEnd + 3);

    // Query string and fragment are carried over byte-for-byte
    // (cache-busting versions, SVG sprite references)
    const suffixIndex = rest.search(/[?#]/);
    const location = suffixIndex === -1 ? rest : rest.substring(0, suffixIndex);
    const suffix = suffixIndex === -1 ? '' : rest.substring(suffixIndex);

    // ['edge-host', 'origin-host', 'path', 'to', 'image.jpg']
    const pathParts = location.split('/').slice(1);

    if (pathParts.length < Math.max(2, minSegments) || !pathParts[0]) {
      return edgeUrl;
    }

    const originDomain = pathParts[0];
    const originPath = pathParts.slice(1).join('/');

    return `${scheme}://${originDomain}/${originPath}${suffix}`;
  } catch {
    return edgeUrl;
  }
}

/**
 * Build the worker URL that serves (and caches) an origin URL
 *
 * @example
 * buildWorkerUrl('https://example.com/uploads/a.jpg', 'edge.example.net')
 * // => 'https://edge.example.net/example.com/uploads/a.jpg'
 */
export function buildWorkerUrl(originUrl: string, workerDomain: string): string {
  return `https://${workerDomain}/${originUrl.replace(/^https?:\/\//, '')}`;
}

/**
 * Whether a URL has the rewritten edge shape
 */
export function isEdgeUrl(url: string): boolean {
  return extractOriginUrl(url) !== url;
}
