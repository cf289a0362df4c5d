import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { createTestApp } from "./testing.js";

describe("createApp", () => {
  it("answers health checks", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health");
    assert.equal(res.status, 200);
    assert.equal(((await res.json()) as { status: string }).status, "ok");
  });

  it("answers unknown routes with a JSON 404", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/nothing-here");
    assert.equal(res.status, 404);
    assert.deepEqual(await res.json(), { error: "Not found" });
  });

  it("protects the host-action outbox with the ingest secret", async () => {
    const { app } = createTestApp({ ingestSecret: "test-secret" });

    const denied = await app.request("/api/host-actions");
    assert.equal(denied.status, 401);

    const allowed = await app.request("/api/host-actions", {
      headers: { Authorization: "Bearer test-secret" },
    });
    assert.deepEqual(await allowed.json(), { actions: [] });
  });

  it("allows local development origins", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health", { headers: { Origin: "http://localhost:5173" } });
    assert.equal(res.headers.get("Access-Control-Allow-Origin"), "http://localhost:5173");

    const foreign = await app.request("/health", { headers: { Origin: "https://evil.test" } });
    assert.equal(foreign.headers.get("Access-Control-Allow-Origin"), null);
  });
});
