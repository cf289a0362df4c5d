import { serve } from "@hono/node-server";
import { DiscoveryStore, log } from "@script-scout/engine";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import {
  createLocalPubSubClient,
  createNodeHostActions,
  createNodePubSubClient,
  HostActionOutbox,
} from "./queue/client.js";
import { SettingsStore } from "./settings-store.js";

const config = loadConfig();
const closers: Array<() => Promise<void>> = [];

function createDeps() {
  const store = new DiscoveryStore();
  const settings = new SettingsStore({ greedy: config.defaultGreedy });

  if (config.redisUrl) {
    const hostActions = createNodeHostActions(config.redisUrl);
    const events = createNodePubSubClient(config.redisUrl);
    closers.push(() => hostActions.close(), () => events.close());
    return { store, settings, hostActions, outbox: null, events };
  }

  log.warn("REDIS_URL not set; host actions are kept in memory for polling at /api/host-actions");
  const outbox = new HostActionOutbox();
  return { store, settings, hostActions: outbox, outbox, events: createLocalPubSubClient() };
}

const app = createApp({
  deps: createDeps(),
  corsAllowedOrigins: config.corsAllowedOrigins,
  ingestSecret: config.ingestSecret,
});

console.log(`Starting API server on port ${config.port}...`);

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

console.log(`API server running at http://localhost:${config.port}`);

// Handle graceful shutdown
async function shutdown() {
  console.log("\n[API] Shutting down...");
  server.close();
  await Promise.all(closers.map((close) => close()));
  console.log("[API] Shutdown complete");
  process.exit(0);
}

function onSignal() {
  shutdown().catch((error: unknown) => {
    console.error("[API] Shutdown failed:", error);
    process.exit(1);
  });
}

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);
