/**
 * Daemon configuration, read from the environment and validated with zod.
 */

import { z } from "zod";

import { ConfigError } from "./errors.js";
import { DEFAULT_REMINDER_DELAYS } from "./reminders/index.js";

const configSchema = z.object({
  temporal: z.object({
    address: z.string().min(1),
    namespace: z.string().min(1),
    taskQueue: z.string().min(1),
  }),
  mysql: z.object({
    host: z.string().min(1),
    port: z.number().int().positive(),
    database: z.string().min(1),
    user: z.string().min(1),
    password: z.string().optional(),
  }),
  github: z.object({
    token: z.string().min(1, "GITHUB_TOKEN is required"),
  }),
  pcs: z.object({
    baseUrl: z.string().url("PCS_BASE_URL must be a URL"),
    timeoutMs: z.number().int().positive(),
  }),
  coherencyMode: z.enum(["strict", "legacy"]),
  reminderDelays: z.object({
    CodeFlowReminder: z.number().int().nonnegative(),
    PullRequestUpdateReminder: z.number().int().nonnegative(),
    PullRequestCheckReminder: z.number().int().nonnegative(),
  }),
});

export type DaemonConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadConfig(env: Env = process.env): DaemonConfig {
  const result = configSchema.safeParse({
    temporal: {
      address: env.TEMPORAL_ADDRESS || "localhost:7233",
      namespace: env.TEMPORAL_NAMESPACE || "default",
      taskQueue: env.TEMPORAL_TASK_QUEUE || "dependency-flow",
    },
    mysql: {
      host: env.MYSQL_HOST || "127.0.0.1",
      port: parseNumber(env.MYSQL_PORT, 3306),
      database: env.MYSQL_DATABASE || "dependency_flow",
      user: env.MYSQL_USER || "root",
      password: env.MYSQL_PASSWORD || undefined,
    },
    github: { token: env.GITHUB_TOKEN ?? "" },
    pcs: {
      baseUrl: env.PCS_BASE_URL || "http://127.0.0.1:8080",
      timeoutMs: parseNumber(env.PCS_TIMEOUT_MS, 30_000),
    },
    coherencyMode: (env.COHERENCY_MODE || "strict").trim().toLowerCase(),
    reminderDelays: {
      CodeFlowReminder: parseNumber(env.CODE_FLOW_REMINDER_MS, DEFAULT_REMINDER_DELAYS.CodeFlowReminder),
      PullRequestUpdateReminder: parseNumber(
        env.UPDATE_REMINDER_MS,
        DEFAULT_REMINDER_DELAYS.PullRequestUpdateReminder
      ),
      PullRequestCheckReminder: parseNumber(
        env.CHECK_REMINDER_MS,
        DEFAULT_REMINDER_DELAYS.PullRequestCheckReminder
      ),
    },
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}
