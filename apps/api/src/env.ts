import type { DiscoveryStore, HostActions } from "@script-scout/engine";
import type { PubSubClient, HostActionOutbox } from "./queue/client.js";
import type { SettingsStore } from "./settings-store.js";

/**
 * Variables set per-request via context middleware.
 * Accessed in route handlers via c.get("store"), c.get("settings"), etc.
 */
export type AppVariables = {
  store: DiscoveryStore;
  settings: SettingsStore;
  hostActions: HostActions;
  /** Present only when host actions are held in memory for a polling host. */
  outbox: HostActionOutbox | null;
  events: PubSubClient;
};

/**
 * Hono environment type for the API.
 */
export type AppEnv = {
  Variables: AppVariables;
};
