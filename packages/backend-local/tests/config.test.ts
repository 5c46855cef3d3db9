import { describe, expect, it } from "vitest";

import { loadBackendConfig } from "../src/config.js";

describe("loadBackendConfig", () => {
  it("applies defaults", () => {
    expect(loadBackendConfig({})).toEqual({
      port: 8787,
      dictionaryPath: "words.txt",
      adminToken: undefined,
      debug: false,
    });
  });

  it("reads the environment", () => {
    expect(
      loadBackendConfig({
        PORT: "9000",
        DICTIONARY_PATH: "/srv/words.txt",
        ADMIN_TOKEN: "test-secret",
        DEBUG: "1",
      }),
    ).toEqual({
      port: 9000,
      dictionaryPath: "/srv/words.txt",
      adminToken: "test-secret",
      debug: true,
    });
  });

  it("treats off-like DEBUG values as disabled", () => {
    expect(loadBackendConfig({ DEBUG: "off" }).debug).toBe(false);
    expect(loadBackendConfig({ DEBUG: " False " }).debug).toBe(false);
  });

  it("rejects an invalid port", () => {
    expect(() => loadBackendConfig({ PORT: "http" })).toThrow(/^Invalid environment: PORT: /);
    expect(() => loadBackendConfig({ PORT: "70000" })).toThrow(/PORT/);
  });
});
