import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { createTestApp, jsonRequest } from "../testing.js";

const body = `var a = "/api/v1/users"; var b = "https://cdn.test/lib.js";`;

describe("settings routes", () => {
  it("returns the defaults", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/settings");
    assert.deepEqual(await res.json(), { settings: { greedy: true, searchFilter: "" } });
  });

  it("switches extraction mode for later traffic", async () => {
    const { app, store } = createTestApp();
    const traffic = {
      body,
      contentType: "text/javascript",
      request: { scheme: "https", host: "shop.test", path: "/app.js" },
    };

    await app.request("/api/traffic", jsonRequest("POST", traffic));
    assert.equal(store.size(), 1);

    const patched = await app.request("/api/settings", jsonRequest("PATCH", { greedy: false }));
    assert.deepEqual(await patched.json(), { settings: { greedy: false, searchFilter: "" } });

    await app.request("/api/traffic", jsonRequest("POST", traffic));
    assert.equal(store.size(), 2);
  });

  it("stores the search filter lower-cased", async () => {
    const { app, settings } = createTestApp();

    await app.request("/api/settings", jsonRequest("PATCH", { searchFilter: "Shop.TEST" }));
    assert.equal(settings.get().searchFilter, "shop.test");
  });

  it("rejects unknown settings", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/settings", jsonRequest("PATCH", { verbose: true }));
    assert.equal(res.status, 400);
  });
});
