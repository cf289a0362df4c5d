import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { log } from "@script-scout/engine";
import type { AppEnv } from "./env.js";
import { contextMiddleware, type AppDeps } from "./middleware/context.js";
import { requireIngestSecret } from "./middleware/ingest-auth.js";
import { trafficRoutes } from "./routes/traffic.js";
import { discoveriesRoutes } from "./routes/discoveries.js";
import { settingsRoutes } from "./routes/settings.js";
import { hostActionsRoutes } from "./routes/host-actions.js";
import { sseRoutes } from "./routes/sse.js";

export interface AppConfig {
  deps: AppDeps;
  corsAllowedOrigins: string[];
  ingestSecret?: string;
  /** Skip per-request access logging (tests). */
  quiet?: boolean;
}

function toOrigin(value: string): string | null {
  try {
    return new URL(value).origin;
  } catch {
    return null;
  }
}

export function createApp(config: AppConfig) {
  const { deps } = config;
  const extraAllowedOrigins = config.corsAllowedOrigins
    .map(toOrigin)
    .filter((origin): origin is string => Boolean(origin));

  function isAllowedOrigin(origin?: string | null): origin is string {
    if (!origin) return false;
    if (extraAllowedOrigins.includes(origin)) return true;
    return /^http:\/\/(localhost|127\.0\.0\.1):\d+$/.test(origin);
  }

  const app = new Hono<AppEnv>();

  // Inject dependencies into context
  app.use("*", contextMiddleware(deps));

  // Logging
  if (!config.quiet) {
    app.use("*", logger());
  }

  // CORS
  app.use(
    "*",
    cors({
      origin: (origin) => (isAllowedOrigin(origin) ? origin : null),
    })
  );

  // Health check
  app.get("/health", (c) => c.json({ status: "ok", timestamp: new Date().toISOString() }));

  // Traffic from the interception host
  const ingestAuth = requireIngestSecret(config.ingestSecret);
  for (const path of ["/api/traffic", "/api/host-actions"]) {
    app.use(path, ingestAuth);
  }

  app.route("/api/traffic", trafficRoutes);
  app.route("/api/discoveries", discoveriesRoutes);
  app.route("/api/settings", settingsRoutes);
  app.route("/api/host-actions", hostActionsRoutes);
  app.route("/api/sse", sseRoutes);

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.onError((error, c) => {
    log.error(`Unhandled error on ${c.req.method} ${c.req.path}: ${error.message}`);
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}

export type AppType = ReturnType<typeof createApp>;
