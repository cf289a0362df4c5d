import { createMiddleware } from "hono/factory";
import type { DiscoveryStore, HostActions } from "@script-scout/engine";
import type { AppEnv } from "../env.js";
import type { HostActionOutbox, PubSubClient } from "../queue/client.js";
import type { SettingsStore } from "../settings-store.js";

/**
 * Dependencies injected into the Hono app.
 * Created once per process by the Node entry, or per test.
 */
export interface AppDeps {
  store: DiscoveryStore;
  settings: SettingsStore;
  hostActions: HostActions;
  outbox?: HostActionOutbox | null;
  events: PubSubClient;
}

/**
 * Middleware that sets per-request dependencies on the Hono context.
 */
export function contextMiddleware(deps: AppDeps) {
  return createMiddleware<AppEnv>(async (c, next) => {
    c.set("store", deps.store);
    c.set("settings", deps.settings);
    c.set("hostActions", deps.hostActions);
    c.set("outbox", deps.outbox ?? null);
    c.set("events", deps.events);
    await next();
  });
}
