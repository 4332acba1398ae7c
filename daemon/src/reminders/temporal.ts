/**
 * Temporal-backed reminders.
 *
 * Each (kind, owner key) pair maps to one `reminderWorkflow` execution with a
 * deterministic workflow id. Scheduling starts it with the terminate-existing
 * conflict policy, which replaces a reminder that is still waiting. The
 * workflow sleeps for the due time and then runs the `fireReminder` activity,
 * whose retry policy gives at-least-once delivery.
 */

import { WorkflowNotFoundError, type Client } from "@temporalio/client";
import { WorkflowIdConflictPolicy } from "@temporalio/common";

import type { ReminderKind, ReminderPayload } from "../models/types.js";
import type { reminderWorkflow } from "../temporal/workflows.js";
import { reminderWorkflowId, type ReminderManager } from "./index.js";

export function createTemporalReminderManager(client: Client, taskQueue: string): ReminderManager {
  return {
    async schedule(ownerKey: string, kind: ReminderKind, dueInMs: number, payload: ReminderPayload) {
      const workflowId = reminderWorkflowId(ownerKey, kind);
      await client.workflow.start<typeof reminderWorkflow>("reminderWorkflow", {
        taskQueue,
        workflowId,
        args: [{ payload, dueInMs }],
        workflowIdConflictPolicy: WorkflowIdConflictPolicy.TERMINATE_EXISTING,
      });
      console.log(`[reminders] Scheduled ${workflowId} in ${dueInMs}ms`);
    },

    async cancel(ownerKey: string, kind: ReminderKind) {
      const workflowId = reminderWorkflowId(ownerKey, kind);
      try {
        await client.workflow.getHandle(workflowId).cancel();
        console.log(`[reminders] Cancelled ${workflowId}`);
      } catch (err: unknown) {
        // Already fired or never scheduled.
        if (err instanceof WorkflowNotFoundError) return;
        throw err;
      }
    },
  };
}
