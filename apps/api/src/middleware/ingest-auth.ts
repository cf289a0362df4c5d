import { createMiddleware } from "hono/factory";

/**
 * Shared-secret check for the interception host. With no secret configured
 * every caller is accepted (local development).
 */
export function requireIngestSecret(secret: string | undefined) {
  return createMiddleware(async (c, next) => {
    if (!secret) {
      return next();
    }

    const auth = c.req.header("Authorization");
    if (auth !== `Bearer ${secret}`) {
      return c.json({ error: "Unauthorized" }, 401);
    }

    return next();
  });
}
