/**
 * Update Transaction: the unit of work of one entry-point invocation.
 *
 * Holds a private copy of the owner's state bundle plus the reminder
 * changes, caught-up marks and flow events the invocation decided on.
 * Nothing reaches the stores until `commit()`: the bundle is saved first,
 * then subscriptions, reminders and telemetry follow. If any external call
 * throws before that, persisted state is exactly what it was.
 */

import type { ReminderDelays, ReminderManager } from "../reminders/index.js";
import type { FlowEventSink, StateStore, SubscriptionStore } from "../state/index.js";
import { errorMessage } from "../errors.js";
import type {
  DependencyFlowEvent,
  PendingUpdateState,
  PullRequestState,
  ReminderKind,
  StateBundle,
} from "../models/types.js";

export interface TransactionServices {
  store: StateStore;
  subscriptions: SubscriptionStore;
  reminders: ReminderManager;
  events: FlowEventSink;
}

/** Explicit view of the state machine derived from a bundle. */
export type UpdaterPhase =
  | { kind: "Idle" }
  | { kind: "PendingUpdate"; pending: readonly PendingUpdateState[] }
  | { kind: "InProgress"; pullRequest: PullRequestState; pending: readonly PendingUpdateState[] };

export function describePhase(bundle: StateBundle): UpdaterPhase {
  if (bundle.pullRequest) {
    return { kind: "InProgress", pullRequest: bundle.pullRequest, pending: bundle.pendingUpdates };
  }
  if (bundle.pendingUpdates.length > 0) {
    return { kind: "PendingUpdate", pending: bundle.pendingUpdates };
  }
  return { kind: "Idle" };
}

export class UpdateTransaction {
  readonly bundle: StateBundle;
  private readonly reminderChanges = new Map<ReminderKind, "schedule" | "cancel">();
  private readonly caughtUp = new Map<string, number>();
  private readonly flowEvents: DependencyFlowEvent[] = [];

  constructor(
    readonly ownerKey: string,
    loaded: StateBundle,
    private readonly services: TransactionServices,
    private readonly delays: ReminderDelays
  ) {
    this.bundle = structuredClone(loaded);
  }

  // ── Reminders ──

  scheduleReminder(kind: ReminderKind): void {
    this.reminderChanges.set(kind, "schedule");
  }

  cancelReminder(kind: ReminderKind): void {
    this.reminderChanges.set(kind, "cancel");
  }

  // ── Pending updates ──

  /** Queues an update, superseding older builds of the same subscription. */
  upsertPending(update: PendingUpdateState): void {
    const newer = this.bundle.pendingUpdates.some(
      (p) => p.subscriptionId === update.subscriptionId && p.buildId > update.buildId
    );
    if (newer) return;
    this.bundle.pendingUpdates = [
      ...this.bundle.pendingUpdates.filter((p) => p.subscriptionId !== update.subscriptionId),
      structuredClone(update),
    ];
  }

  /** Queues updates that cannot be applied now and arms the update reminder. */
  defer(updates: readonly PendingUpdateState[]): void {
    for (const update of updates) this.upsertPending(update);
    this.scheduleReminder("PullRequestUpdateReminder");
  }

  /** Drops applied (or superseded) updates; disarms reminders once nothing is queued. */
  consume(updates: readonly PendingUpdateState[]): void {
    this.bundle.pendingUpdates = this.bundle.pendingUpdates.filter(
      (p) =>
        !updates.some((u) => u.subscriptionId === p.subscriptionId && p.buildId <= u.buildId)
    );
    if (this.bundle.pendingUpdates.length === 0) {
      this.cancelReminder("PullRequestUpdateReminder");
      this.cancelReminder("CodeFlowReminder");
    }
  }

  // ── Pull request lifecycle ──

  /** Forgets a merged or closed pull request. */
  completePullRequest(pullRequest: PullRequestState, merged: boolean): void {
    if (merged) {
      for (const contained of pullRequest.containedUpdates) {
        this.markCaughtUp(contained.subscriptionId, contained.buildId);
      }
    }
    this.bundle.pullRequest = null;
    this.cancelReminder("PullRequestCheckReminder");

    // A request outstanding while the PR was tracked targeted its head branch.
    const codeFlow = this.bundle.codeFlow;
    if (pullRequest.isCodeFlow && codeFlow?.requestId) {
      const delivered = pullRequest.containedUpdates.at(-1);
      this.bundle.codeFlow = {
        ...codeFlow,
        sourceCommit: delivered?.commit ?? "",
        requestId: null,
      };
      this.cancelReminder("CodeFlowReminder");
    }
  }

  markCaughtUp(subscriptionId: string, buildId: number): void {
    const current = this.caughtUp.get(subscriptionId);
    if (current === undefined || current < buildId) {
      this.caughtUp.set(subscriptionId, buildId);
    }
  }

  recordEvents(events: readonly DependencyFlowEvent[]): void {
    this.flowEvents.push(...events);
  }

  // ── Commit ──

  async commit(): Promise<void> {
    const { store, subscriptions, reminders, events } = this.services;

    await store.save(this.ownerKey, this.bundle);

    for (const [subscriptionId, buildId] of this.caughtUp) {
      await subscriptions.markCaughtUp(subscriptionId, buildId);
    }

    for (const [kind, change] of this.reminderChanges) {
      if (change === "schedule") {
        await reminders.schedule(this.ownerKey, kind, this.delays[kind], {
          ownerKey: this.ownerKey,
          kind,
        });
      } else {
        await reminders.cancel(this.ownerKey, kind);
      }
    }

    if (this.flowEvents.length > 0) {
      try {
        await events.record(this.flowEvents);
      } catch (err: unknown) {
        console.error(
          `[updater] Failed to record ${this.flowEvents.length} flow events for ${this.ownerKey}: ${errorMessage(err)}`
        );
      }
    }
  }
}
