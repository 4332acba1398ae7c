/**
 * Pull Request Updater: the per-target reconciliation state machine.
 *
 * Entry points:
 *   updateAssets             a new build was observed for a subscription
 *   processPendingUpdates    PullRequestUpdateReminder fired
 *   processCodeFlowReminder  CodeFlowReminder fired
 *   checkPullRequest         PullRequestCheckReminder fired
 *
 * Every invocation runs on the lane of its owner key (subscription id, or the
 * batch key of batchable subscriptions). Lanes execute one job at a time, so
 * the state machine never sees concurrent mutation of its own bundle.
 *
 * Phases: Idle → InProgress (PR open, check reminder armed) → Idle, with
 * PendingUpdate whenever an update waits on a reminder.
 */

import { randomUUID } from "node:crypto";

import Bottleneck from "bottleneck";

import { getRequiredUpdates, mergeRequiredUpdates } from "../coherency/index.js";
import { SubscriptionNotFoundError } from "../errors.js";
import type { RepositoryHost } from "../host/index.js";
import type {
  AssetUpdate,
  CoherencyErrorDetails,
  CoherencyMode,
  ContainedUpdate,
  DependencyFlowEvent,
  PendingUpdateState,
  PullRequestState,
  ReminderPayload,
  Subscription,
  UpdateAssetsInput,
} from "../models/types.js";
import type { BranchSyncService } from "../pcs/index.js";
import {
  DEFAULT_REMINDER_DELAYS,
  type ReminderDelays,
  type ReminderManager,
} from "../reminders/index.js";
import type { FlowEventSink, StateStore, SubscriptionStore } from "../state/index.js";
import { synchronizePullRequest } from "../synchronizer/index.js";
import { CodeFlowCoordinator } from "./code-flow.js";
import { commitMessage, describePullRequest } from "./description.js";
import { branchSlug, ownerKeyFor, targetOf, type UpdateTarget } from "./keys.js";
import { describePhase, UpdateTransaction } from "./transaction.js";

export interface UpdaterServices {
  store: StateStore;
  subscriptions: SubscriptionStore;
  host: RepositoryHost;
  branchSync: BranchSyncService;
  reminders: ReminderManager;
  events: FlowEventSink;
}

export interface UpdaterOptions {
  coherencyMode: CoherencyMode;
  reminderDelays?: Partial<ReminderDelays>;
}

interface ComputedUpdates {
  perUpdate: Array<{ update: PendingUpdateState; required: AssetUpdate[] }>;
  merged: AssetUpdate[];
  coherencySuccessful: boolean;
  coherencyErrors: CoherencyErrorDetails[];
}

function toContained(update: PendingUpdateState): ContainedUpdate {
  return {
    subscriptionId: update.subscriptionId,
    buildId: update.buildId,
    sourceRepository: update.sourceRepository,
    commit: update.commit,
  };
}

function mergeContained(
  existing: readonly ContainedUpdate[],
  updates: readonly PendingUpdateState[]
): ContainedUpdate[] {
  const ids = new Set(updates.map((u) => u.subscriptionId));
  return [...existing.filter((c) => !ids.has(c.subscriptionId)), ...updates.map(toContained)];
}

export class PullRequestUpdater {
  private readonly lanes = new Bottleneck.Group({ maxConcurrent: 1 });
  private readonly codeFlow: CodeFlowCoordinator;
  private readonly delays: ReminderDelays;

  constructor(
    private readonly services: UpdaterServices,
    private readonly options: UpdaterOptions
  ) {
    this.codeFlow = new CodeFlowCoordinator(services);
    this.delays = { ...DEFAULT_REMINDER_DELAYS, ...options.reminderDelays };
  }

  // ── Entry points ──

  async updateAssets(input: UpdateAssetsInput): Promise<void> {
    const subscription = await this.requireSubscription(input.subscriptionId);
    const ownerKey = ownerKeyFor(subscription);
    const update: PendingUpdateState = {
      subscriptionId: input.subscriptionId,
      buildId: input.buildId,
      sourceRepository: input.sourceRepository,
      commit: input.commit,
      assets: input.assets.map((a) => ({ name: a.name, version: a.version })),
      isCodeFlow: input.sourceEnabled && input.assets.length > 0,
    };

    await this.runOnLane(ownerKey, async (tx) => {
      console.log(
        `[updater] ${ownerKey}: build ${update.buildId} with ${update.assets.length} assets (phase ${describePhase(tx.bundle).kind})`
      );
      if (update.isCodeFlow) {
        await this.codeFlow.updateAssets(tx, targetOf(subscription), update);
      } else {
        await this.applyClassic(tx, targetOf(subscription), [update]);
      }
    });
  }

  async processPendingUpdates(ownerKey: string): Promise<void> {
    await this.runOnLane(ownerKey, async (tx) => {
      const pending = [...tx.bundle.pendingUpdates];
      if (pending.length === 0) {
        console.log(`[updater] ${ownerKey}: no pending updates; reminder already resolved`);
        return;
      }
      await this.replayPending(tx, pending);
    });
  }

  async processCodeFlowReminder(ownerKey: string): Promise<void> {
    await this.runOnLane(ownerKey, async (tx) => {
      const pending = tx.bundle.pendingUpdates.find((p) => p.isCodeFlow);
      if (!pending) {
        console.log(`[updater] ${ownerKey}: no pending code-flow update; reminder already resolved`);
        return;
      }
      const target = targetOf(await this.requireSubscription(pending.subscriptionId));
      await this.codeFlow.processReminder(tx, target);
    });
  }

  async checkPullRequest(ownerKey: string): Promise<void> {
    await this.runOnLane(ownerKey, async (tx) => {
      const pullRequest = tx.bundle.pullRequest;
      if (!pullRequest) {
        console.log(`[updater] ${ownerKey}: no tracked pull request; nothing to check`);
        return;
      }

      const sync = await synchronizePullRequest(this.services.host, pullRequest);
      switch (sync.kind) {
        case "InProgressCanUpdate":
        case "InProgressCannotUpdate":
          tx.scheduleReminder("PullRequestCheckReminder");
          return;

        case "Completed":
        case "NotFound": {
          const merged = sync.kind === "Completed" && sync.merged;
          console.log(
            `[updater] ${ownerKey}: ${pullRequest.url} ${merged ? "merged" : "closed"}; clearing state`
          );
          tx.completePullRequest(pullRequest, merged);
          const pending = [...tx.bundle.pendingUpdates];
          if (pending.length > 0) {
            await this.replayPending(tx, pending);
          }
          return;
        }
      }
    });
  }

  /** Routes a fired reminder to its handler. */
  async processReminder(payload: ReminderPayload): Promise<void> {
    switch (payload.kind) {
      case "PullRequestUpdateReminder":
        return this.processPendingUpdates(payload.ownerKey);
      case "CodeFlowReminder":
        return this.processCodeFlowReminder(payload.ownerKey);
      case "PullRequestCheckReminder":
        return this.checkPullRequest(payload.ownerKey);
    }
  }

  // ── Lanes ──

  private runOnLane(ownerKey: string, work: (tx: UpdateTransaction) => Promise<void>): Promise<void> {
    return this.lanes.key(ownerKey).schedule(async () => {
      const loaded = await this.services.store.load(ownerKey);
      const tx = new UpdateTransaction(ownerKey, loaded, this.services, this.delays);
      await work(tx);
      await tx.commit();
    });
  }

  private async requireSubscription(id: string): Promise<Subscription> {
    const subscription = await this.services.subscriptions.getSubscription(id);
    if (!subscription) throw new SubscriptionNotFoundError(id);
    return subscription;
  }

  private async replayPending(tx: UpdateTransaction, pending: PendingUpdateState[]): Promise<void> {
    const target = targetOf(await this.requireSubscription(pending[0].subscriptionId));
    const classic = pending.filter((p) => !p.isCodeFlow);
    const codeFlow = pending.filter((p) => p.isCodeFlow);

    if (classic.length > 0) {
      await this.applyClassic(tx, target, classic);
    }
    const latest = codeFlow.reduce<PendingUpdateState | null>(
      (best, p) => (!best || p.buildId > best.buildId ? p : best),
      null
    );
    if (latest) {
      await this.codeFlow.updateAssets(tx, target, latest);
    }
  }

  // ── Classic flow ──

  private async applyClassic(
    tx: UpdateTransaction,
    target: UpdateTarget,
    updates: PendingUpdateState[]
  ): Promise<void> {
    const pullRequest = tx.bundle.pullRequest;
    if (!pullRequest) {
      await this.createPullRequest(tx, target, updates);
      return;
    }

    const sync = await synchronizePullRequest(this.services.host, pullRequest);
    switch (sync.kind) {
      case "InProgressCanUpdate":
        await this.updatePullRequest(tx, target, pullRequest, updates);
        return;

      case "InProgressCannotUpdate":
        console.log(
          `[updater] ${tx.ownerKey}: ${pullRequest.url} cannot be updated (${sync.reason}); deferring`
        );
        tx.defer(updates);
        return;

      case "Completed":
      case "NotFound":
        tx.completePullRequest(pullRequest, sync.kind === "Completed" && sync.merged);
        await this.createPullRequest(tx, target, updates);
        return;
    }
  }

  private async computeRequiredUpdates(
    target: UpdateTarget,
    ref: string,
    updates: readonly PendingUpdateState[]
  ): Promise<ComputedUpdates> {
    const perUpdate: ComputedUpdates["perUpdate"] = [];
    const coherencyErrors: CoherencyErrorDetails[] = [];
    let coherencySuccessful = true;

    for (const update of updates) {
      const result = await getRequiredUpdates(this.services.host, {
        targetRepository: target.repository,
        ref,
        update,
        mode: this.options.coherencyMode,
      });
      perUpdate.push({ update, required: result.requiredUpdates });
      coherencyErrors.push(...result.errors);
      coherencySuccessful &&= result.coherencySuccessful;
    }

    return {
      perUpdate,
      merged: mergeRequiredUpdates(perUpdate.map((p) => p.required)),
      coherencySuccessful,
      coherencyErrors,
    };
  }

  private flowEvents(
    tx: UpdateTransaction,
    computed: ComputedUpdates,
    url: string,
    reason: DependencyFlowEvent["reason"]
  ): DependencyFlowEvent[] {
    const recordedAt = new Date();
    return computed.perUpdate.flatMap(({ update, required }) =>
      required.map((assetUpdate) => ({
        subscriptionId: update.subscriptionId,
        buildId: update.buildId,
        ownerKey: tx.ownerKey,
        assetName: assetUpdate.to.name,
        fromVersion: assetUpdate.from.version,
        toVersion: assetUpdate.to.version,
        pullRequestUrl: url,
        flowType: "Classic" as const,
        reason,
        recordedAt,
      }))
    );
  }

  private async createPullRequest(
    tx: UpdateTransaction,
    target: UpdateTarget,
    updates: PendingUpdateState[]
  ): Promise<void> {
    const { host } = this.services;
    const computed = await this.computeRequiredUpdates(target, target.branch, updates);

    if (computed.merged.length === 0) {
      console.log(`[updater] ${tx.ownerKey}: ${target.branch} already up to date; no pull request needed`);
      for (const update of updates) tx.markCaughtUp(update.subscriptionId, update.buildId);
      tx.consume(updates);
      return;
    }

    const headBranch = `dependency-flow/${branchSlug(tx.ownerKey)}-${randomUUID().slice(0, 8)}`;
    await host.createBranch(target.repository, target.branch, headBranch);
    const sha = await host.commitUpdates(target.repository, headBranch, computed.merged, commitMessage(updates));

    const state: Omit<PullRequestState, "url"> = {
      headBranch,
      status: "InProgress",
      isCodeFlow: false,
      coherencySuccessful: computed.coherencySuccessful,
      coherencyErrors: computed.coherencyErrors,
      containedUpdates: updates.map(toContained),
      requiredUpdates: computed.merged,
      lastUpdateSha: sha,
    };
    const url = await host.createPullRequest(target.repository, {
      ...describePullRequest(target.branch, state),
      headBranch,
      baseBranch: target.branch,
    });

    tx.bundle.pullRequest = { ...state, url };
    tx.scheduleReminder("PullRequestCheckReminder");
    tx.consume(updates);
    tx.recordEvents(this.flowEvents(tx, computed, url, "New"));
    console.log(`[updater] ${tx.ownerKey}: opened ${url} with ${computed.merged.length} updates`);
  }

  private async updatePullRequest(
    tx: UpdateTransaction,
    target: UpdateTarget,
    pullRequest: PullRequestState,
    updates: PendingUpdateState[]
  ): Promise<void> {
    const { host } = this.services;
    const computed = await this.computeRequiredUpdates(target, pullRequest.headBranch, updates);

    if (computed.merged.length === 0) {
      const noOp = updates.filter((u) => u.assets.length === 0);
      for (const update of noOp) tx.markCaughtUp(update.subscriptionId, update.buildId);
      const carried = updates.filter((u) => u.assets.length > 0);
      if (carried.length > 0) {
        tx.bundle.pullRequest = {
          ...pullRequest,
          containedUpdates: mergeContained(pullRequest.containedUpdates, carried),
        };
      }
      tx.scheduleReminder("PullRequestCheckReminder");
      tx.consume(updates);
      return;
    }

    const sha = await host.commitUpdates(
      target.repository,
      pullRequest.headBranch,
      computed.merged,
      commitMessage(updates)
    );
    const next: PullRequestState = {
      ...pullRequest,
      coherencySuccessful: computed.coherencySuccessful,
      coherencyErrors: computed.coherencyErrors,
      containedUpdates: mergeContained(pullRequest.containedUpdates, updates),
      requiredUpdates: mergeRequiredUpdates([pullRequest.requiredUpdates, computed.merged]),
      lastUpdateSha: sha,
    };
    await host.updatePullRequest(pullRequest.url, describePullRequest(target.branch, next));

    tx.bundle.pullRequest = next;
    tx.scheduleReminder("PullRequestCheckReminder");
    tx.consume(updates);
    tx.recordEvents(this.flowEvents(tx, computed, pullRequest.url, "Updated"));
    console.log(`[updater] ${tx.ownerKey}: pushed ${computed.merged.length} updates to ${pullRequest.url}`);
  }
}
