import { Hono } from "hono";
import type { AppEnv } from "../env.js";

const app = new Hono<AppEnv>();

// Pending host actions for a host that polls instead of consuming the queue
app.get("/", (c) => {
  const outbox = c.get("outbox");
  if (!outbox) {
    return c.json({ error: "Host actions are delivered through the queue" }, 404);
  }
  return c.json({ actions: outbox.drain() });
});

export const hostActionsRoutes = app;
