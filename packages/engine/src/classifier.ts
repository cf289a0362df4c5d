const JS_CONTENT_TYPE_MARKERS = ["javascript", "application/x-javascript", "text/javascript"] as const;

/**
 * Decide whether a response body should be mined for URLs, from its declared
 * Content-Type and/or the URL it was fetched from. Missing inputs simply don't match.
 */
export function isJsLike(contentType?: string | null, sourceUrl?: string | null): boolean {
  if (contentType) {
    const lowered = contentType.toLowerCase();
    if (JS_CONTENT_TYPE_MARKERS.some((marker) => lowered.includes(marker))) {
      return true;
    }
  }

  return Boolean(sourceUrl && sourceUrl.toLowerCase().endsWith(".js"));
}
