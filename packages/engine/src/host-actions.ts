import { log } from "./logger.js";

export const REPEATER_LABEL_PREFIX = "ScriptScout-";

/** A plain GET request, ready to hand over to the interception host. */
export interface HostRequest {
  method: "GET";
  url: string;
  host: string;
  port: number;
  secure: boolean;
  /** HTTP/1.1 request line and Host header. */
  raw: string;
}

export type HostActionTarget = "repeater" | "organizer";

/**
 * The two things the interception host can do with a discovered URL.
 * Implementations deliver the request; they don't send it anywhere themselves.
 */
export interface HostActions {
  sendToRepeater(request: HostRequest, label: string): Promise<void>;
  sendToOrganizer(request: HostRequest): Promise<void>;
}

export type ForwardResult =
  | { ok: true; target: HostActionTarget; url: string }
  | { ok: false; target: HostActionTarget; url: string; error: string };

export function joinRowUrl(host: string, path: string): string {
  return `${host}${path}`;
}

export function repeaterLabel(url: string): string {
  return `${REPEATER_LABEL_PREFIX}${url}`;
}

export function buildGetRequest(url: string): HostRequest | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return null;
  }

  const secure = parsed.protocol === "https:";
  const port = parsed.port ? Number(parsed.port) : secure ? 443 : 80;
  const target = `${parsed.pathname}${parsed.search}`;

  return {
    method: "GET",
    url: parsed.toString(),
    host: parsed.hostname,
    port,
    secure,
    raw: `GET ${target} HTTP/1.1\r\nHost: ${parsed.host}\r\n\r\n`,
  };
}

/**
 * Build a GET for the selected row and hand it to the host. Failures are
 * logged and reported back, never thrown.
 */
export async function forwardToHost(
  actions: HostActions,
  target: HostActionTarget,
  host: string,
  path: string
): Promise<ForwardResult> {
  const url = joinRowUrl(host, path);
  const request = buildGetRequest(url);
  if (!request) {
    const error = `Cannot build a request for ${url}`;
    log.error(error, url);
    return { ok: false, target, url, error };
  }

  try {
    if (target === "repeater") {
      await actions.sendToRepeater(request, repeaterLabel(url));
      log.info(`Sent to Repeater: ${url}`, url);
    } else {
      await actions.sendToOrganizer(request);
      log.info(`Sent to Organizer: ${url}`, url);
    }
    return { ok: true, target, url };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error(`Failed to send ${url} to ${target}: ${message}`, url);
    return { ok: false, target, url, error: message };
  }
}
