/**
 * Temporal Workflows: Dependency Flow
 *
 * Workflows are deterministic orchestration functions. They contain NO I/O;
 * all external calls happen in Activities.
 *
 *   reminderWorkflow      durable timer: sleep until due, then fire the reminder
 *   updateAssetsWorkflow  durable ingestion of one build for one subscription
 */

import { isCancellation, log, proxyActivities, sleep } from "@temporalio/workflow";

import type { ReminderPayload, UpdateAssetsInput } from "../models/types.js";
import type { DependencyFlowActivities } from "./activities.js";

const { fireReminder, updateAssets } = proxyActivities<DependencyFlowActivities>({
  startToCloseTimeout: "5 minutes",
  retry: {
    initialInterval: "5s",
    maximumInterval: "5 minutes",
    backoffCoefficient: 2,
    nonRetryableErrorTypes: ["SubscriptionNotFoundError"],
  },
});

// ── Workflow Input ──

export interface ReminderWorkflowInput {
  payload: ReminderPayload;
  dueInMs: number;
}

export type ReminderOutcome = "fired" | "cancelled";

// ── Workflows ──

export async function reminderWorkflow(input: ReminderWorkflowInput): Promise<ReminderOutcome> {
  try {
    await sleep(input.dueInMs);
  } catch (err) {
    if (isCancellation(err)) {
      log.info("Reminder cancelled before due", { ...input.payload });
      return "cancelled";
    }
    throw err;
  }

  await fireReminder(input.payload);
  return "fired";
}

export async function updateAssetsWorkflow(input: UpdateAssetsInput): Promise<void> {
  await updateAssets(input);
}
