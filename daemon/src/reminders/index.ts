/**
 * Reminder Contract: durable, at-least-once, never-early callbacks.
 *
 * At most one reminder of a kind is active per owner key; scheduling again
 * replaces the prior one. Cancelling is best-effort, so every handler must
 * tolerate firing after its precondition was resolved.
 */

import type { ReminderKind, ReminderPayload } from "../models/types.js";

export interface ReminderManager {
  schedule(ownerKey: string, kind: ReminderKind, dueInMs: number, payload: ReminderPayload): Promise<void>;
  cancel(ownerKey: string, kind: ReminderKind): Promise<void>;
}

export type ReminderDelays = Record<ReminderKind, number>;

export const DEFAULT_REMINDER_DELAYS: ReminderDelays = {
  CodeFlowReminder: 3 * 60_000,
  PullRequestUpdateReminder: 5 * 60_000,
  PullRequestCheckReminder: 5 * 60_000,
};

export function reminderWorkflowId(ownerKey: string, kind: ReminderKind): string {
  return `reminder:${kind}:${ownerKey}`;
}
