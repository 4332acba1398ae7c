/**
 * Temporal Worker: Dependency Flow Task Queue
 *
 * Polls the task queue and executes reminder and ingestion workflows. The
 * activities close over the daemon's PullRequestUpdater.
 */

import { extname } from "node:path";
import { fileURLToPath } from "node:url";

import { NativeConnection, Worker } from "@temporalio/worker";

import type { TemporalConfig } from "./client.js";
import { createActivities, type ActivityUpdater } from "./activities.js";

export async function createWorker(config: TemporalConfig, updater: ActivityUpdater): Promise<Worker> {
  console.log(`[temporal-worker] Connecting to Temporal at ${config.address}...`);
  const connection = await NativeConnection.connect({ address: config.address });

  // workflows.ts under tsx, workflows.js once built
  const ext = extname(fileURLToPath(import.meta.url));
  const worker = await Worker.create({
    connection,
    namespace: config.namespace,
    taskQueue: config.taskQueue,
    workflowsPath: fileURLToPath(new URL(`./workflows${ext}`, import.meta.url)),
    activities: createActivities(updater),
    maxConcurrentActivityTaskExecutions: 10,
    maxConcurrentWorkflowTaskExecutions: 5,
  });

  console.log(`[temporal-worker] Worker ready on task queue: ${config.taskQueue}`);
  console.log(`[temporal-worker] Namespace: ${config.namespace}`);
  return worker;
}
