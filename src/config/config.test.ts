import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { MAX_TIMER_DELAY_MS, loadConfigFromEnv, resolveConfig } from "./config.js";

describe("resolveConfig", () => {
  it("should fill every default", () => {
    expect(resolveConfig()).toEqual({
      systemId: "orchestrator",
      tickIntervalMs: 1_000,
      defaultResultTimeoutMs: 30_000,
      stopGracePeriodMs: 5_000,
      defaultMaxConcurrentTasks: 1,
      messageHistoryLimit: 1_000,
      taskLogLimit: 100,
    });
  });

  it("should keep overrides", () => {
    const config = resolveConfig({ tickIntervalMs: 50, systemId: "hub" });

    expect(config.tickIntervalMs).toBe(50);
    expect(config.systemId).toBe("hub");
    expect(config.stopGracePeriodMs).toBe(5_000);
  });

  it("should not mutate the overrides object", () => {
    const overrides = { tickIntervalMs: 50 };
    resolveConfig(overrides);

    expect(overrides).toEqual({ tickIntervalMs: 50 });
  });

  it("should reject out-of-range values with the offending path", () => {
    expect(() => resolveConfig({ tickIntervalMs: 0 })).toThrow(ConfigError);
    expect(() => resolveConfig({ defaultMaxConcurrentTasks: 1.5 })).toThrow(
      /^invalid config at \/defaultMaxConcurrentTasks: /,
    );
  });

  it("should reject timeouts longer than a timer can wait", () => {
    expect(() => resolveConfig({ defaultResultTimeoutMs: 3_000_000_000 })).toThrow(
      /^invalid config at \/defaultResultTimeoutMs: /,
    );
    expect(resolveConfig({ stopGracePeriodMs: MAX_TIMER_DELAY_MS }).stopGracePeriodMs).toBe(
      MAX_TIMER_DELAY_MS,
    );
  });
});

describe("loadConfigFromEnv", () => {
  it("should read overrides from the environment", () => {
    const config = loadConfigFromEnv({
      COORDINATOR_SYSTEM_ID: " hub ",
      COORDINATOR_TICK_INTERVAL_MS: "250",
      COORDINATOR_MAX_CONCURRENT_TASKS: "4",
      COORDINATOR_TASK_LOG_LIMIT: "",
    });

    expect(config).toMatchObject({
      systemId: "hub",
      tickIntervalMs: 250,
      defaultMaxConcurrentTasks: 4,
      taskLogLimit: 100,
    });
  });

  it("should reject a non-numeric value", () => {
    expect(() => loadConfigFromEnv({ COORDINATOR_STOP_GRACE_MS: "soon" })).toThrow(
      'COORDINATOR_STOP_GRACE_MS must be a number, got "soon"',
    );
  });
});
