/**
 * Daemon Lifecycle
 *
 * Wires the persistent store, the repository host, the PCS client and the
 * Temporal reminders into a PullRequestUpdater and runs the worker that
 * feeds it.
 *
 * Lifecycle:
 *   1. Connect to MySQL (schema is created if missing)
 *   2. Connect to Temporal (client for reminders, worker for execution)
 *   3. Run the worker until shutdown
 *   4. On shutdown: drain the worker, then disconnect MySQL and close the client
 */

import type { Worker } from "@temporalio/worker";

import type { DaemonConfig } from "../config.js";
import { createGitHubRepositoryHost } from "../host/github.js";
import { createBranchSyncClient } from "../pcs/index.js";
import { createTemporalReminderManager } from "../reminders/temporal.js";
import { createMysqlStore } from "../state/mysql.js";
import { createTemporalClient } from "../temporal/client.js";
import { createWorker } from "../temporal/worker.js";
import { PullRequestUpdater } from "../updater/pull-request-updater.js";

export interface Daemon {
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createDaemon(config: DaemonConfig): Daemon {
  const store = createMysqlStore(config.mysql);
  const host = createGitHubRepositoryHost({ token: config.github.token });
  const branchSync = createBranchSyncClient(config.pcs);

  let worker: Worker | null = null;
  let running: Promise<void> | null = null;
  let closeClient: (() => Promise<void>) | null = null;

  return {
    async start() {
      await store.connect();
      console.log(
        `[dependency-flow] Connected to MySQL at ${config.mysql.host}:${config.mysql.port}/${config.mysql.database}`
      );

      const client = await createTemporalClient(config.temporal);
      closeClient = () => client.connection.close();

      const updater = new PullRequestUpdater(
        {
          store,
          subscriptions: store,
          host,
          branchSync,
          reminders: createTemporalReminderManager(client, config.temporal.taskQueue),
          events: store,
        },
        { coherencyMode: config.coherencyMode, reminderDelays: config.reminderDelays }
      );

      worker = await createWorker(config.temporal, updater);
      console.log(`[dependency-flow] Running (coherency mode: ${config.coherencyMode})`);
      running = worker.run();
      await running;
      console.log("[dependency-flow] Worker stopped.");
    },

    async stop() {
      console.log("[dependency-flow] Shutting down...");
      if (worker && worker.getState() === "RUNNING") {
        worker.shutdown();
      }
      // Activities still in flight need MySQL until the worker drains.
      if (running) {
        await Promise.allSettled([running]);
      }
      await store.disconnect();
      if (closeClient) {
        await closeClient();
        closeClient = null;
      }
      console.log("[dependency-flow] Disconnected.");
    },
  };
}
