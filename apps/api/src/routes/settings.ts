import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import type { AppEnv } from "../env.js";
import { publishRefresh } from "../queue/client.js";

const app = new Hono<AppEnv>();

const updateSettingsSchema = z
  .object({
    greedy: z.boolean().optional(),
    searchFilter: z.string().optional(),
  })
  .strict();

// Get current extraction settings
app.get("/", (c) => c.json({ settings: c.get("settings").get() }));

// Update settings (partial)
app.patch("/", zValidator("json", updateSettingsSchema), async (c) => {
  const patch = c.req.valid("json");
  const settings = c.get("settings").update(patch);

  if (patch.searchFilter !== undefined) {
    await publishRefresh(c.get("events"), "filter");
  }

  return c.json({ settings });
});

export const settingsRoutes = app;
