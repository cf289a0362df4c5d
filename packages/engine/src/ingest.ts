import { isJsLike } from "./classifier.js";
import { createDiscoveredUrl, UNKNOWN_ORIGIN, type DiscoveryStore } from "./discovery-store.js";
import { extractCandidates } from "./extractor.js";
import { log } from "./logger.js";
import { resolveCandidate } from "./resolver.js";
import { splitUri } from "./uri.js";
import type { CapturedExchange, IngestOptions, IngestResult } from "./types.js";

export const UNKNOWN_SOURCE_FILE = "unknown";

/**
 * Short provenance label for a script: the last `/` segment of its URL without
 * the query string, or "unknown".
 */
export function deriveSourceFile(requestUrl?: string | null): string {
  if (!requestUrl) {
    return UNKNOWN_SOURCE_FILE;
  }
  const lastSegment = requestUrl.slice(requestUrl.lastIndexOf("/") + 1);
  const queryIndex = lastSegment.indexOf("?");
  const filename = queryIndex === -1 ? lastSegment : lastSegment.slice(0, queryIndex);
  return filename || UNKNOWN_SOURCE_FILE;
}

/** `scheme://host` of a resolved URL, or "unknown" when it has no scheme or host. */
export function originKeyOf(resolvedUrl: string): string {
  const parts = splitUri(resolvedUrl);
  if (!parts?.scheme || !parts.host) {
    return UNKNOWN_ORIGIN;
  }
  return `${parts.scheme}://${parts.host}`;
}

/**
 * Classify, extract, resolve and store the URLs found in one intercepted
 * response. A candidate that fails to resolve is skipped without affecting
 * the rest of the batch.
 */
export function ingestExchange(
  store: DiscoveryStore,
  exchange: CapturedExchange,
  options: IngestOptions
): IngestResult {
  const sourceFile = deriveSourceFile(exchange.requestUrl);
  const result: IngestResult = { scanned: false, sourceFile, candidates: 0, resolved: 0, inserted: 0 };

  if (!isJsLike(exchange.contentType, exchange.requestUrl)) {
    return result;
  }
  result.scanned = true;

  if (!exchange.body) {
    return result;
  }

  const candidates = extractCandidates(exchange.body, options.greedy);
  result.candidates = candidates.length;

  for (const candidate of candidates) {
    try {
      const resolved = resolveCandidate(candidate, exchange.context);
      if (resolved === null) {
        log.debug(`Skipped candidate "${candidate}" from ${sourceFile}`, exchange.requestUrl);
        continue;
      }
      result.resolved++;
      if (store.insert(originKeyOf(resolved), createDiscoveredUrl(resolved, sourceFile))) {
        result.inserted++;
      }
    } catch (error) {
      log.debug(`Failed to process candidate "${candidate}": ${String(error)}`, exchange.requestUrl);
    }
  }

  log.debug(
    `Scanned ${sourceFile}: ${result.candidates} candidates, ${result.inserted} new`,
    exchange.requestUrl
  );
  return result;
}
