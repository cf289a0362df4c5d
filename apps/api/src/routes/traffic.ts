import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { ingestExchange } from "@script-scout/engine";
import type { AppEnv } from "../env.js";
import { publishRefresh } from "../queue/client.js";
import { toCapturedExchange, trafficSchema } from "./traffic.utils.js";

const app = new Hono<AppEnv>();

// Receive one intercepted response from the host
app.post("/", zValidator("json", trafficSchema), async (c) => {
  const exchange = toCapturedExchange(c.req.valid("json"));
  const { greedy } = c.get("settings").get();
  const result = ingestExchange(c.get("store"), exchange, { greedy });

  if (result.inserted > 0) {
    await publishRefresh(c.get("events"), "ingest", { inserted: result.inserted });
  }

  return c.json(result);
});

export const trafficRoutes = app;
