import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { forwardToHost } from "@script-scout/engine";
import type { AppEnv } from "../env.js";
import { publishRefresh } from "../queue/client.js";

const app = new Hono<AppEnv>();

const listQuerySchema = z.object({
  filter: z.string().optional(),
});

const forwardSchema = z.object({
  host: z.string().min(1),
  path: z.string(),
  target: z.enum(["repeater", "organizer"]),
});

// Snapshot of every discovery, filtered by the query or the stored search filter
app.get("/", zValidator("query", listQuerySchema), (c) => {
  const { filter } = c.req.valid("query");
  const store = c.get("store");
  const rows = store.snapshot(filter ?? c.get("settings").get().searchFilter);
  return c.json({ rows, total: store.size() });
});

// Forget everything and reset the search filter
app.delete("/", async (c) => {
  c.get("store").clear();
  c.get("settings").update({ searchFilter: "" });
  await publishRefresh(c.get("events"), "clear");
  return c.json({ success: true });
});

// Hand a selected row over to the interception host
app.post("/forward", zValidator("json", forwardSchema), async (c) => {
  const { host, path, target } = c.req.valid("json");
  const result = await forwardToHost(c.get("hostActions"), target, host, path);
  return c.json(result, result.ok ? 200 : 502);
});

export const discoveriesRoutes = app;
