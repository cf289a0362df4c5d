// RFC 3986 characters: unreserved, reserved and `%`.
const URI_CHARACTERS = /^[A-Za-z0-9\-._~:/?#[\]@!$&'()*+,;=%]*$/;
const BROKEN_PERCENT_ESCAPE = /%(?![0-9A-Fa-f]{2})/;
const URI_PARTS = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#.*)?$/;

export interface UriParts {
  scheme?: string;
  host?: string;
  /** Raw path, possibly empty. */
  path: string;
  query?: string;
}

/** True when `value` only uses URI characters and every `%` starts a valid escape. */
export function isUriReference(value: string): boolean {
  return URI_CHARACTERS.test(value) && !BROKEN_PERCENT_ESCAPE.test(value);
}

function hostOf(authority: string): string | undefined {
  const hostPort = authority.slice(authority.lastIndexOf("@") + 1);
  if (hostPort.startsWith("[")) {
    const end = hostPort.indexOf("]");
    return end === -1 ? undefined : hostPort.slice(0, end + 1);
  }
  const colon = hostPort.indexOf(":");
  const host = colon === -1 ? hostPort : hostPort.slice(0, colon);
  return host || undefined;
}

/**
 * Split a URI reference into its components as written, without decoding or
 * normalising anything. Returns null for strings that are not URI references.
 */
export function splitUri(value: string): UriParts | null {
  if (!isUriReference(value)) {
    return null;
  }
  const match = URI_PARTS.exec(value);
  if (!match) {
    return null;
  }

  const [, scheme, authority, path, query] = match;
  return {
    scheme: scheme || undefined,
    host: authority === undefined ? undefined : hostOf(authority),
    path: path ?? "",
    query,
  };
}
