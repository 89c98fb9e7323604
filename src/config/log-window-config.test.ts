import { describe, expect, it } from "vitest";
import { ConfigError } from "../log-window/errors.js";
import { resolveLogWindowConfig } from "./log-window-config.js";

function issuePaths(run: () => unknown): string[] {
  try {
    run();
  } catch (err) {
    if (err instanceof ConfigError) {
      return err.issues.map((issue) => issue.path);
    }
    throw err;
  }
  return [];
}

describe("resolveLogWindowConfig", () => {
  it("fills defaults around the file path", () => {
    const config = resolveLogWindowConfig({ filePath: "/var/log/app.log" }, {});

    expect(config).toEqual({
      filePath: "/var/log/app.log",
      capacity: 10_000,
      minPollMs: 100,
      maxPollMs: 10_000,
      backoffFactor: 1.5,
      missingFileRetryMs: 5_000,
      errorCooldownMs: 5_000,
      stopTimeoutMs: 5_000,
      streamIntervalMs: 500,
      heartbeatIntervalMs: 15_000,
      defaultPageSize: 100,
      watch: true,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("reads the path and capacity from the environment", () => {
    const config = resolveLogWindowConfig(
      {},
      { LOG_WINDOW_FILE: "/tmp/env.log", LOG_WINDOW_CAPACITY: "25" },
    );

    expect(config.filePath).toBe("/tmp/env.log");
    expect(config.capacity).toBe(25);
  });

  it("prefers explicit values over the environment", () => {
    const config = resolveLogWindowConfig(
      { filePath: "/tmp/explicit.log", capacity: 7 },
      { LOG_WINDOW_FILE: "/tmp/env.log", LOG_WINDOW_CAPACITY: "25" },
    );

    expect(config.filePath).toBe("/tmp/explicit.log");
    expect(config.capacity).toBe(7);
  });

  it("accepts an unbounded capacity", () => {
    expect(resolveLogWindowConfig({ filePath: "a.log", capacity: 0 }, {}).capacity).toBe(0);
  });

  it("requires a file path", () => {
    expect(() => resolveLogWindowConfig({}, {})).toThrow(ConfigError);
    expect(issuePaths(() => resolveLogWindowConfig({}, {}))).toEqual(["filePath"]);
  });

  it("rejects a max poll interval below the minimum", () => {
    expect(
      issuePaths(() => resolveLogWindowConfig({ filePath: "a.log", minPollMs: 500, maxPollMs: 100 }, {})),
    ).toEqual(["maxPollMs"]);
  });

  it("rejects out-of-range values", () => {
    expect(
      issuePaths(() =>
        resolveLogWindowConfig({ filePath: "a.log", capacity: -1, backoffFactor: 0.5 }, {}),
      ),
    ).toEqual(["capacity", "backoffFactor"]);
  });
});
