/**
 * dependency-flow: Dependency Flow Pull Request Daemon
 *
 * Keeps dependency-update pull requests in target repositories in step with
 * builds published by source repositories.
 *
 * Architecture:
 *   Temporal (builds, reminders) → PullRequestUpdater → GitHub / PCS
 *                                        ↕
 *                                  MySQL state store
 *
 * Dependencies:
 *   - @temporalio/*: durable reminders and build ingestion
 *   - mysql2: state bundles, subscriptions, flow events
 *   - @octokit/rest: repository host
 */

import { loadConfig } from "./config.js";
import { createDaemon } from "./lifecycle/daemon.js";

const daemon = createDaemon(loadConfig());

// Register before start(): it blocks until the worker stops.
const stop = () => {
  daemon.stop().catch((err: unknown) => {
    console.error("[dependency-flow] Shutdown failed:", err);
    process.exitCode = 1;
  });
};
process.on("SIGINT", stop);
process.on("SIGTERM", stop);

await daemon.start();
