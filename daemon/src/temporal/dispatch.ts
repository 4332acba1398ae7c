/**
 * Temporal Dispatch CLI: Dependency Flow
 *
 * Thin client for the worker's task queue.
 *
 * Usage:
 *   npx tsx daemon/src/temporal/dispatch.ts update-assets --subscription sub-1 --build 42 \
 *     --repo https://github.com/org/source --commit abc123 --asset Pkg.A=1.2.3
 *   npx tsx daemon/src/temporal/dispatch.ts fire PullRequestCheckReminder subscription:sub-1
 *   npx tsx daemon/src/temporal/dispatch.ts cancel CodeFlowReminder subscription:sub-1
 *
 * Environment:
 *   TEMPORAL_ADDRESS     Temporal server gRPC address (default: localhost:7233)
 *   TEMPORAL_NAMESPACE   Temporal namespace (default: default)
 *   TEMPORAL_TASK_QUEUE  Task queue (default: dependency-flow)
 */

import { WorkflowIdConflictPolicy } from "@temporalio/common";

import { reminderWorkflowId } from "../reminders/index.js";
import { createTemporalReminderManager } from "../reminders/temporal.js";
import { createTemporalClient, type TemporalConfig } from "./client.js";
import { parseDispatchArgs, USAGE, UsageError, type DispatchCommand } from "./dispatch-args.js";
import type { updateAssetsWorkflow } from "./workflows.js";

function parseArgs(): DispatchCommand {
  try {
    return parseDispatchArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`[dispatch] ${err.message}\n\n${USAGE}`);
      process.exit(2);
    }
    throw err;
  }
}

async function main() {
  const parsed = parseArgs();

  const config: TemporalConfig = {
    address: process.env.TEMPORAL_ADDRESS ?? "localhost:7233",
    namespace: process.env.TEMPORAL_NAMESPACE ?? "default",
    taskQueue: process.env.TEMPORAL_TASK_QUEUE ?? "dependency-flow",
  };
  const client = await createTemporalClient(config);

  try {
    switch (parsed.command) {
      case "update-assets": {
        const { input } = parsed;
        const workflowId = `update-assets:${input.subscriptionId}:${input.buildId}`;
        const handle = await client.workflow.start<typeof updateAssetsWorkflow>("updateAssetsWorkflow", {
          taskQueue: config.taskQueue,
          workflowId,
          args: [input],
          workflowIdConflictPolicy: WorkflowIdConflictPolicy.USE_EXISTING,
        });
        console.log(`[dispatch] Started ${workflowId} (run ${handle.firstExecutionRunId})`);
        if (parsed.wait) {
          await handle.result();
          console.log(`[dispatch] ${workflowId} completed`);
        }
        break;
      }

      case "fire": {
        const reminders = createTemporalReminderManager(client, config.taskQueue);
        await reminders.schedule(parsed.payload.ownerKey, parsed.payload.kind, 0, parsed.payload);
        console.log(`[dispatch] Fired ${reminderWorkflowId(parsed.payload.ownerKey, parsed.payload.kind)}`);
        break;
      }

      case "cancel": {
        const reminders = createTemporalReminderManager(client, config.taskQueue);
        await reminders.cancel(parsed.payload.ownerKey, parsed.payload.kind);
        break;
      }
    }
  } finally {
    await client.connection.close();
  }
}

main().catch((err) => {
  console.error("[dispatch] Fatal error:", err);
  process.exit(1);
});
