import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { DiscoveryStore } from "./discovery-store.js";
import { deriveSourceFile, ingestExchange, originKeyOf } from "./ingest.js";
import type { CapturedExchange, RequestContext } from "./types.js";

const shopContext: RequestContext = { scheme: "https", host: "shop.test", port: 443, path: "/app.js" };
const shopBody = `var a = "/api/v1/users"; var b = "https://cdn.test/lib.js";`;

function shopExchange(overrides: Partial<CapturedExchange> = {}): CapturedExchange {
  return {
    body: shopBody,
    contentType: "text/javascript",
    requestUrl: "https://shop.test/app.js",
    context: shopContext,
    ...overrides,
  };
}

describe("ingestExchange", () => {
  it("stores resolved URLs grouped by origin", () => {
    const store = new DiscoveryStore();
    const result = ingestExchange(store, shopExchange(), { greedy: false });

    assert.deepEqual(result, { scanned: true, sourceFile: "app.js", candidates: 2, resolved: 2, inserted: 2 });
    assert.deepEqual(store.snapshot(""), [
      { host: "https://cdn.test", path: "/lib.js", sourceFile: "app.js", url: "https://cdn.test/lib.js" },
      {
        host: "https://shop.test",
        path: "/api/v1/users",
        sourceFile: "app.js",
        url: "https://shop.test/api/v1/users",
      },
    ]);
    assert.deepEqual(store.origins(), ["https://shop.test", "https://cdn.test"]);
  });

  it("uses the greedy pattern when asked to", () => {
    const store = new DiscoveryStore();
    const result = ingestExchange(store, shopExchange(), { greedy: true });

    assert.equal(result.candidates, 1);
    assert.deepEqual(
      store.snapshot("").map((row) => row.url),
      ["https://shop.test/api/v1/users"]
    );
  });

  it("ignores responses that are not JavaScript", () => {
    const store = new DiscoveryStore();
    const result = ingestExchange(
      store,
      shopExchange({ contentType: "text/html", requestUrl: "https://shop.test/index.html" }),
      { greedy: false }
    );

    assert.equal(result.scanned, false);
    assert.equal(store.size(), 0);
  });

  it("recognises scripts by URL when the content type is missing", () => {
    const store = new DiscoveryStore();
    const result = ingestExchange(
      store,
      shopExchange({ contentType: undefined, requestUrl: "https://shop.test/static/main.js" }),
      { greedy: false }
    );

    assert.equal(result.scanned, true);
    assert.equal(result.sourceFile, "main.js");
    assert.equal(store.size(), 2);
  });

  it("degrades per branch without an originating request", () => {
    const store = new DiscoveryStore();
    const result = ingestExchange(
      store,
      { body: `"/api/a" "rel/b" "//cdn.test/c"`, contentType: "application/javascript" },
      { greedy: true }
    );

    assert.deepEqual(result, { scanned: true, sourceFile: "unknown", candidates: 3, resolved: 2, inserted: 2 });
    assert.deepEqual(store.entries("unknown"), [{ url: "/api/a", sourceFile: "unknown" }]);
    assert.deepEqual(store.entries("http://cdn.test"), [{ url: "http://cdn.test/c", sourceFile: "unknown" }]);
  });

  it("keeps going when a candidate cannot be resolved", () => {
    const store = new DiscoveryStore();
    const result = ingestExchange(
      store,
      shopExchange({
        body: `"rel/x" "https://ok.test/y"`,
        context: { scheme: "https", host: "bad host", port: 443, path: "/" },
      }),
      { greedy: false }
    );

    assert.equal(result.candidates, 2);
    assert.equal(result.resolved, 1);
    assert.deepEqual(
      store.snapshot("").map((row) => row.url),
      ["https://ok.test/y"]
    );
  });

  it("reports nothing new when the same script is seen twice", () => {
    const store = new DiscoveryStore();
    ingestExchange(store, shopExchange(), { greedy: false });
    const again = ingestExchange(store, shopExchange(), { greedy: false });

    assert.equal(again.inserted, 0);
    assert.equal(store.size(), 2);
  });

  it("stores nothing for template placeholders", () => {
    const store = new DiscoveryStore();
    const result = ingestExchange(store, shopExchange({ body: 'fetch("${API}/users")' }), { greedy: true });

    assert.deepEqual(result, { scanned: true, sourceFile: "app.js", candidates: 1, resolved: 0, inserted: 0 });
    assert.equal(store.size(), 0);
  });

  it("handles an empty script body", () => {
    const store = new DiscoveryStore();
    const result = ingestExchange(store, shopExchange({ body: "" }), { greedy: true });
    assert.deepEqual(result, { scanned: true, sourceFile: "app.js", candidates: 0, resolved: 0, inserted: 0 });
  });
});

describe("deriveSourceFile", () => {
  it("takes the last path segment without the query", () => {
    assert.equal(deriveSourceFile("https://shop.test/static/app.js?v=3"), "app.js");
    assert.equal(deriveSourceFile("/bundle.min.js"), "bundle.min.js");
  });

  it("falls back to unknown", () => {
    assert.equal(deriveSourceFile(undefined), "unknown");
    assert.equal(deriveSourceFile("https://shop.test/"), "unknown");
    assert.equal(deriveSourceFile("https://shop.test/?v=1"), "unknown");
  });
});

describe("originKeyOf", () => {
  it("keeps scheme and host only", () => {
    assert.equal(originKeyOf("https://a.test:8443/x?y=1"), "https://a.test");
  });

  it("returns unknown for URLs without scheme or host", () => {
    assert.equal(originKeyOf("/relative"), "unknown");
    assert.equal(originKeyOf("https://a.test/a b"), "unknown");
  });
});
