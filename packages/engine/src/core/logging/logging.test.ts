/**
 * Logging — Test Suite
 *
 * Validates the structured logger:
 *   - one JSON line per message, carrying level and context
 *   - messages below the threshold are dropped
 *   - warnings and errors reach the observability provider
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Logger } from "@arbor/contracts";
import { createLogger, logOperation } from "./index.js";
import {
  resetObservability,
  setObservabilityProvider,
  type ObservabilityProvider,
} from "../observability/index.js";

function recordingProvider(): ObservabilityProvider & {
  messages: Array<{ message: string; level: string }>;
} {
  const messages: Array<{ message: string; level: string }> = [];
  return {
    name: "recording",
    messages,
    captureException: () => {},
    captureMessage: (message, level) => {
      messages.push({ message, level });
    },
    flush: async () => {},
  };
}

beforeEach(() => {
  resetObservability();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("writes info lines as JSON with level and context", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});

    createLogger("hierarchy").info("Folder created", { path: "/a" });

    expect(spy).toHaveBeenCalledOnce();
    expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({
      level: "info",
      context: "hierarchy",
      message: "Folder created",
      path: "/a",
    });
  });

  it("drops debug lines at the default level", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});

    createLogger("hierarchy").debug("noise");

    expect(spy).not.toHaveBeenCalled();
  });

  it("emits debug lines when the level is debug", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});

    createLogger("hierarchy", "debug").debug("detail");

    expect(spy).toHaveBeenCalledOnce();
  });

  it("drops info lines at warn level", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});

    createLogger("hierarchy", "warn").info("ignored");

    expect(spy).not.toHaveBeenCalled();
  });

  it("forwards warnings to the observability provider", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const provider = recordingProvider();
    setObservabilityProvider(provider);

    createLogger("acl").warn("Permission denied");

    expect(provider.messages).toEqual([{ message: "[acl] Permission denied", level: "warning" }]);
  });

  it("always emits errors, even at the error threshold", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const provider = recordingProvider();
    setObservabilityProvider(provider);

    createLogger("store", "error").error("boom");

    expect(spy).toHaveBeenCalledOnce();
    expect(provider.messages).toEqual([{ message: "[store] boom", level: "error" }]);
  });
});

describe("logOperation", () => {
  function fakeLogger(): Logger {
    return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  }

  it("logs successes at debug", () => {
    const logger = fakeLogger();

    logOperation(logger, "mkdir", 4, true);

    expect(logger.debug).toHaveBeenCalledWith("Operation completed", {
      event: "operation.executed",
      operation: "mkdir",
      durationMs: 4,
      success: true,
    });
  });

  it("logs failures at info with the error message", () => {
    const logger = fakeLogger();

    logOperation(logger, "rmdir", 2, false, "denied");

    expect(logger.info).toHaveBeenCalledWith("Operation failed", {
      event: "operation.executed",
      operation: "rmdir",
      durationMs: 2,
      success: false,
      error: "denied",
    });
  });
});
