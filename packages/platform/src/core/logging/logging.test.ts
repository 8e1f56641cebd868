/**
 * Logging Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createLogger, logDecision } from "./index.js";
import {
  resetObservability,
  setObservabilityProvider,
  type ObservabilityProvider,
} from "../observability/index.js";

const forwarded: string[] = [];
const provider: ObservabilityProvider = {
  name: "recording",
  captureException: () => {},
  captureMessage: (message, level) => forwarded.push(`${level}: ${message}`),
  flush: async () => {},
};

beforeEach(() => {
  forwarded.length = 0;
  setObservabilityProvider(provider);
});

afterEach(() => {
  resetObservability();
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("writes one JSON object per line with its context", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    createLogger("registry").info("Loaded snapshot", { instanceId: "inst-1", roles: 3 });

    expect(spy).toHaveBeenCalledWith(
      '{"level":"info","context":"registry","message":"Loaded snapshot","instanceId":"inst-1","roles":3}'
    );
    expect(forwarded).toEqual([]);
  });

  it("forwards warnings and errors to observability", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger("registry");
    logger.warn("Dangling assignment");
    logger.error("Load failed");

    expect(forwarded).toEqual(["warning: [registry] Dangling assignment", "error: [registry] Load failed"]);
  });
});

describe("logDecision", () => {
  it("logs allowed decisions to stdout", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    logDecision({
      instanceId: "inst-1",
      userId: "alice",
      action: "update",
      modelType: "Plot",
      objectId: "plot-1",
      allowed: true,
      via: "model-grant",
    });

    expect(JSON.parse(String(spy.mock.calls[0]?.[0]))).toEqual({
      level: "info",
      context: "authz",
      event: "authz.decision",
      instanceId: "inst-1",
      userId: "alice",
      action: "update",
      modelType: "Plot",
      objectId: "plot-1",
      allowed: true,
      via: "model-grant",
    });
  });

  it("logs denials to stderr as warnings", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    logDecision({
      instanceId: "inst-1",
      userId: null,
      action: "delete",
      modelType: "Tree",
      allowed: false,
      reason: "not-owner",
    });

    const line = JSON.parse(String(spy.mock.calls[0]?.[0]));
    expect(line.level).toBe("warn");
    expect(line.reason).toBe("not-owner");
    expect(line.userId).toBeNull();
  });
});
