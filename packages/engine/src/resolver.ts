import type { RequestContext } from "./types.js";
import { isUriReference } from "./uri.js";

const MIN_CANDIDATE_LENGTH = 3;

/** `scheme://host[:port]/`, omitting 80 and 443 whatever the scheme. */
export function buildBaseUrl(context: RequestContext): string {
  const portSuffix = context.port === 80 || context.port === 443 ? "" : `:${context.port}`;
  return `${context.scheme}://${context.host}${portSuffix}/`;
}

function resolveAgainst(candidate: string, base: string): string | null {
  try {
    return new URL(candidate, base).toString();
  } catch {
    return null;
  }
}

function acceptIfUri(value: string | null): string | null {
  return value !== null && isUriReference(value) ? value : null;
}

/**
 * Turn a raw candidate into an absolute URL using the context of the request
 * whose response it was found in. Returns null when the candidate is rejected,
 * including any candidate or result that is not a valid URI reference.
 *
 * - `http://` and `https://` candidates pass through untouched.
 * - `//host/path` takes the scheme of the originating request (`http:` without one).
 * - `/path` is resolved against `scheme://host`; without context it passes through as-is.
 * - Anything else is resolved against the base URL and needs a context.
 */
export function resolveCandidate(raw: string, context?: RequestContext | null): string | null {
  const candidate = raw.trim();
  if (candidate.length < MIN_CANDIDATE_LENGTH || !isUriReference(candidate)) {
    return null;
  }

  if (candidate.startsWith("http://") || candidate.startsWith("https://")) {
    return candidate;
  }

  if (candidate.startsWith("//")) {
    return acceptIfUri(`${context?.scheme === "https" ? "https:" : "http:"}${candidate}`);
  }

  if (candidate.startsWith("/")) {
    if (!context) {
      return candidate;
    }
    return acceptIfUri(resolveAgainst(candidate, `${context.scheme}://${context.host}`));
  }

  if (!context) {
    return null;
  }
  return acceptIfUri(resolveAgainst(candidate, buildBaseUrl(context)));
}
