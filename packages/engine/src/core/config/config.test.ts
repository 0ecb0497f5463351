/**
 * Engine Configuration — Test Suite
 */

import { describe, it, expect } from "vitest";
import { defaultConfig, loadConfig } from "./index.js";

describe("loadConfig", () => {
  it("defaults to the memory store with access control on", () => {
    expect(loadConfig({})).toEqual({
      store: { driver: "memory" },
      database: { url: null },
      accessControl: { enabled: true },
      logging: { level: "info" },
    });
  });

  it("defaultConfig ignores process.env", () => {
    expect(defaultConfig()).toEqual(loadConfig({}));
  });

  it("reads the postgres driver and its URL", () => {
    const config = loadConfig({
      ARBOR_STORE: "postgres",
      DATABASE_URL: "postgres://localhost:5432/arbor_test",
    });
    expect(config.store.driver).toBe("postgres");
    expect(config.database.url).toBe("postgres://localhost:5432/arbor_test");
  });

  it("fails fast when postgres is selected without DATABASE_URL", () => {
    expect(() => loadConfig({ ARBOR_STORE: "postgres" })).toThrow(
      "DATABASE_URL environment variable is required when ARBOR_STORE=postgres."
    );
  });

  it("rejects unknown store drivers", () => {
    expect(() => loadConfig({ ARBOR_STORE: "sqlite" })).toThrow(
      'ARBOR_STORE must be "memory" or "postgres", got "sqlite"'
    );
  });

  it("parses the access-control switch", () => {
    expect(loadConfig({ ARBOR_ACCESS_CONTROL_ENABLED: "false" }).accessControl.enabled).toBe(false);
    expect(loadConfig({ ARBOR_ACCESS_CONTROL_ENABLED: "0" }).accessControl.enabled).toBe(false);
    expect(loadConfig({ ARBOR_ACCESS_CONTROL_ENABLED: "Yes" }).accessControl.enabled).toBe(true);
    expect(loadConfig({ ARBOR_ACCESS_CONTROL_ENABLED: "" }).accessControl.enabled).toBe(true);
  });

  it("rejects malformed booleans", () => {
    expect(() => loadConfig({ ARBOR_ACCESS_CONTROL_ENABLED: "maybe" })).toThrow(
      'ARBOR_ACCESS_CONTROL_ENABLED must be a boolean ("true" or "false"), got "maybe"'
    );
  });

  it("normalizes and validates LOG_LEVEL", () => {
    expect(loadConfig({ LOG_LEVEL: "DEBUG" }).logging.level).toBe("debug");
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(
      'LOG_LEVEL must be one of debug, info, warn, error, got "verbose"'
    );
  });
});
