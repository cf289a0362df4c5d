import { DiscoveryStore, type HostActions } from "@script-scout/engine";
import { createApp } from "./app.js";
import { createLocalPubSubClient, HostActionOutbox } from "./queue/client.js";
import { SettingsStore } from "./settings-store.js";

export interface TestAppOptions {
  ingestSecret?: string;
  greedy?: boolean;
  /** Replaces the in-memory outbox; the host-actions route then answers 404. */
  hostActions?: HostActions;
}

/** A fully in-process app: no Redis, no queue, no access log. */
export function createTestApp(options: TestAppOptions = {}) {
  const store = new DiscoveryStore();
  const settings = new SettingsStore({ greedy: options.greedy ?? true });
  const outbox = new HostActionOutbox();
  const events = createLocalPubSubClient();

  const app = createApp({
    deps: {
      store,
      settings,
      hostActions: options.hostActions ?? outbox,
      outbox: options.hostActions ? null : outbox,
      events,
    },
    corsAllowedOrigins: [],
    ingestSecret: options.ingestSecret,
    quiet: true,
  });

  return { app, store, settings, outbox, events };
}

export function jsonRequest(method: string, body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method,
    body: JSON.stringify(body),
    headers: { "Content-Type": "application/json", ...headers },
  };
}
