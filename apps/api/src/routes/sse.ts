import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import { log } from "@script-scout/engine";
import type { AppEnv } from "../env.js";
import { DISCOVERY_CHANNEL } from "../queue/client.js";

const KEEP_ALIVE_MS = 30000;

const app = new Hono<AppEnv>();

// SSE endpoint telling live views when to re-read the snapshot
app.get("/discoveries", async (c) => {
  const events = c.get("events");

  return streamSSE(c, async (stream) => {
    const unsubscribe = await events.subscribe(DISCOVERY_CHANNEL, (message) => {
      stream
        .writeSSE({
          data: message,
          event: "message",
        })
        .catch((error: unknown) => {
          log.debug(`Dropped refresh for a closed stream: ${String(error)}`);
        });
    });

    try {
      await stream.writeSSE({
        data: JSON.stringify({ type: "connected" }),
        event: "message",
      });

      const keepAlive = setInterval(() => {
        stream
          .writeSSE({
            data: JSON.stringify({ type: "ping" }),
            event: "ping",
          })
          .catch(() => {
            clearInterval(keepAlive);
          });
      }, KEEP_ALIVE_MS);

      // Wait for stream to close
      await new Promise<void>((resolve) => {
        stream.onAbort(() => {
          clearInterval(keepAlive);
          resolve();
        });
      });
    } finally {
      await unsubscribe();
    }
  });
});

export const sseRoutes = app;
