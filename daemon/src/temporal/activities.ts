/**
 * Temporal Activities: Dependency Flow
 *
 * Activities contain all I/O. Each one forwards to an Updater entry point;
 * failures propagate so Temporal retries the activity, which gives reminders
 * their at-least-once delivery.
 */

import { log } from "@temporalio/activity";

import type { ReminderPayload, UpdateAssetsInput } from "../models/types.js";
import type { PullRequestUpdater } from "../updater/pull-request-updater.js";

export type ActivityUpdater = Pick<PullRequestUpdater, "updateAssets" | "processReminder">;

export function createActivities(updater: ActivityUpdater) {
  return {
    async fireReminder(payload: ReminderPayload): Promise<void> {
      log.info("Reminder fired", { kind: payload.kind, ownerKey: payload.ownerKey });
      await updater.processReminder(payload);
    },

    async updateAssets(input: UpdateAssetsInput): Promise<void> {
      log.info("Build received", {
        subscriptionId: input.subscriptionId,
        buildId: input.buildId,
        assets: input.assets.length,
      });
      await updater.updateAssets(input);
    },
  };
}

export type DependencyFlowActivities = ReturnType<typeof createActivities>;
