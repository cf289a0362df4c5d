import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { SettingsStore } from "./settings-store.js";

describe("SettingsStore", () => {
  it("starts from the defaults merged with overrides", () => {
    assert.deepEqual(new SettingsStore().get(), { greedy: true, searchFilter: "" });
    assert.deepEqual(new SettingsStore({ greedy: false, searchFilter: "API" }).get(), {
      greedy: false,
      searchFilter: "api",
    });
  });

  it("hands out copies", () => {
    const settings = new SettingsStore();
    const snapshot = settings.get();
    settings.update({ greedy: false });
    assert.equal(snapshot.greedy, true);
    assert.equal(settings.get().greedy, false);
  });
});
