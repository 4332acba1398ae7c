import { describe, expect, it } from "vitest";

import { loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadConfig", () => {
  it("fills defaults around the required token", () => {
    const config = loadConfig({ GITHUB_TOKEN: "test-token" });

    expect(config).toEqual({
      temporal: { address: "localhost:7233", namespace: "default", taskQueue: "dependency-flow" },
      mysql: { host: "127.0.0.1", port: 3306, database: "dependency_flow", user: "root", password: undefined },
      github: { token: "test-token" },
      pcs: { baseUrl: "http://127.0.0.1:8080", timeoutMs: 30_000 },
      coherencyMode: "strict",
      reminderDelays: {
        CodeFlowReminder: 180_000,
        PullRequestUpdateReminder: 300_000,
        PullRequestCheckReminder: 300_000,
      },
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      GITHUB_TOKEN: "test-token",
      TEMPORAL_ADDRESS: "temporal:7233",
      TEMPORAL_TASK_QUEUE: "flows",
      MYSQL_PORT: "3307",
      MYSQL_PASSWORD: "test-password",
      PCS_BASE_URL: "http://pcs.internal:9000",
      COHERENCY_MODE: " Legacy ",
      UPDATE_REMINDER_MS: "1000",
    });

    expect(config.temporal.address).toBe("temporal:7233");
    expect(config.temporal.taskQueue).toBe("flows");
    expect(config.mysql.port).toBe(3307);
    expect(config.mysql.password).toBe("test-password");
    expect(config.pcs.baseUrl).toBe("http://pcs.internal:9000");
    expect(config.coherencyMode).toBe("legacy");
    expect(config.reminderDelays.PullRequestUpdateReminder).toBe(1000);
  });

  it("falls back to the default for unparseable numbers", () => {
    const config = loadConfig({ GITHUB_TOKEN: "test-token", MYSQL_PORT: "not-a-port" });

    expect(config.mysql.port).toBe(3306);
  });

  it("requires a GitHub token", () => {
    const error = (() => {
      try {
        loadConfig({});
      } catch (err: unknown) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ issues: ["github.token: GITHUB_TOKEN is required"] });
  });

  it("rejects an unknown coherency mode", () => {
    expect(() => loadConfig({ GITHUB_TOKEN: "test-token", COHERENCY_MODE: "lenient" })).toThrow(ConfigError);
  });
});
