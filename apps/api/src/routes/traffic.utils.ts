import { z } from "zod";
import type { CapturedExchange, RequestContext } from "@script-scout/engine";

export const originatingRequestSchema = z.object({
  scheme: z.enum(["http", "https"]).optional(),
  secure: z.boolean().optional(),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).optional(),
  path: z.string().default("/"),
});

export const trafficSchema = z.object({
  body: z.string(),
  contentType: z.string().optional(),
  headers: z.record(z.string()).optional(),
  requestUrl: z.string().optional(),
  request: originatingRequestSchema.optional(),
});

export type OriginatingRequest = z.infer<typeof originatingRequestSchema>;
export type TrafficPayload = z.infer<typeof trafficSchema>;

/** Case-insensitive header lookup. */
export function headerValue(headers: Record<string, string> | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

export function toRequestContext(request: OriginatingRequest): RequestContext {
  const scheme = request.scheme ?? (request.secure ? "https" : "http");
  return {
    scheme,
    host: request.host,
    port: request.port ?? (scheme === "https" ? 443 : 80),
    path: request.path,
  };
}

/** Full URL of the originating request, as the host would print it. */
export function buildRequestUrl(context: RequestContext): string {
  const defaultPort = context.scheme === "https" ? 443 : 80;
  const portSuffix = context.port === defaultPort ? "" : `:${context.port}`;
  return `${context.scheme}://${context.host}${portSuffix}${context.path}`;
}

export function toCapturedExchange(payload: TrafficPayload): CapturedExchange {
  const context = payload.request ? toRequestContext(payload.request) : undefined;
  return {
    body: payload.body,
    contentType: payload.contentType ?? headerValue(payload.headers, "Content-Type"),
    requestUrl: payload.requestUrl ?? (context ? buildRequestUrl(context) : undefined),
    context,
  };
}
