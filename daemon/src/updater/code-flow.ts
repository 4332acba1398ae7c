/**
 * Code Flow Coordinator
 *
 * Code-flow subscriptions never commit to the target repository. They ask
 * PCS for a head branch carrying the build's source changes and open a pull
 * request from it once PCS reports the branch ready.
 *
 * Dedup rule: while a request for a commit is outstanding, another build at
 * the same commit never reaches PCS again. The CodeFlowReminder polls the
 * outstanding request instead.
 */

import type { RepositoryHost } from "../host/index.js";
import type {
  CodeFlowState,
  DependencyFlowEvent,
  PendingUpdateState,
  PullRequestState,
} from "../models/types.js";
import type { BranchSyncResult, BranchSyncService } from "../pcs/index.js";
import { synchronizePullRequest } from "../synchronizer/index.js";
import { describePullRequest } from "./description.js";
import type { UpdateTarget } from "./keys.js";
import type { UpdateTransaction } from "./transaction.js";

export interface CodeFlowServices {
  host: RepositoryHost;
  branchSync: BranchSyncService;
}

function codeFlowEvents(
  tx: UpdateTransaction,
  update: PendingUpdateState,
  url: string,
  reason: DependencyFlowEvent["reason"]
): DependencyFlowEvent[] {
  const recordedAt = new Date();
  return update.assets.map((asset) => ({
    subscriptionId: update.subscriptionId,
    buildId: update.buildId,
    ownerKey: tx.ownerKey,
    assetName: asset.name,
    fromVersion: null,
    toVersion: asset.version,
    pullRequestUrl: url,
    flowType: "CodeFlow",
    reason,
    recordedAt,
  }));
}

export class CodeFlowCoordinator {
  constructor(private readonly services: CodeFlowServices) {}

  /** UpdateAssets for a code-flow subscription. */
  async updateAssets(
    tx: UpdateTransaction,
    target: UpdateTarget,
    update: PendingUpdateState
  ): Promise<void> {
    const codeFlow = tx.bundle.codeFlow;
    if (codeFlow && update.buildId < codeFlow.lastSynchronizedBuildId) {
      console.log(
        `[code-flow] ${tx.ownerKey}: ignoring build ${update.buildId}, already synchronized build ${codeFlow.lastSynchronizedBuildId}`
      );
      tx.consume([update]);
      return;
    }

    const pullRequest = tx.bundle.pullRequest;
    if (pullRequest) {
      const sameCommit = codeFlow?.sourceCommit === update.commit;
      const outstanding = sameCommit && codeFlow?.requestId != null;
      const sync = await synchronizePullRequest(this.services.host, pullRequest);
      switch (sync.kind) {
        case "Completed":
        case "NotFound":
          console.log(`[code-flow] ${tx.ownerKey}: pull request ${pullRequest.url} is gone (${sync.kind})`);
          tx.completePullRequest(pullRequest, sync.kind === "Completed" && sync.merged);
          break;

        case "InProgressCannotUpdate":
          if (sameCommit) return;
          console.log(
            `[code-flow] ${tx.ownerKey}: ${pullRequest.url} cannot be updated (${sync.reason}); deferring build ${update.buildId}`
          );
          tx.defer([{ ...update, isCodeFlow: true }]);
          return;

        case "InProgressCanUpdate":
          if (outstanding) return;
          if (sameCommit) {
            tx.consume([update]);
            return;
          }
          await this.requestSync(tx, target, update, pullRequest.headBranch);
          return;
      }
    }

    // Re-read: completing a pull request drops a request aimed at its head branch.
    const current = tx.bundle.codeFlow;
    const sameCommit = current?.sourceCommit === update.commit;

    if (current && sameCommit && current.requestId != null) {
      // Already requested a fresh branch; only the host can tell us it appeared.
      if (await this.services.host.branchExists(target.repository, current.headBranch)) {
        await this.deliver(tx, target, update, current.headBranch);
        return;
      }
      console.log(`[code-flow] ${tx.ownerKey}: still waiting for ${current.headBranch}`);
      tx.upsertPending({ ...update, isCodeFlow: true });
      return;
    }

    if (sameCommit) {
      // This commit already flowed through a pull request.
      tx.consume([update]);
      return;
    }

    await this.requestSync(tx, target, update, null);
  }

  /** CodeFlowReminder fired: poll the outstanding request. */
  async processReminder(tx: UpdateTransaction, target: UpdateTarget): Promise<void> {
    const codeFlow = tx.bundle.codeFlow;
    const requestId = codeFlow?.requestId;
    const pending = tx.bundle.pendingUpdates.filter((p) => p.isCodeFlow);
    const update =
      pending.find((p) => p.commit === codeFlow?.sourceCommit) ?? pending[pending.length - 1];

    if (!codeFlow || !requestId || !update) {
      console.log(`[code-flow] ${tx.ownerKey}: no outstanding branch request; nothing to poll`);
      return;
    }

    const result = await this.services.branchSync.pollSync(requestId);
    await this.applySyncResult(tx, target, update, codeFlow, result);
  }

  private async requestSync(
    tx: UpdateTransaction,
    target: UpdateTarget,
    update: PendingUpdateState,
    headBranch: string | null
  ): Promise<void> {
    console.log(
      `[code-flow] ${tx.ownerKey}: requesting branch sync for ${update.sourceRepository}@${update.commit}`
    );
    const result = await this.services.branchSync.requestSync({
      subscriptionId: update.subscriptionId,
      buildId: update.buildId,
      sourceRepository: update.sourceRepository,
      commit: update.commit,
      assets: update.assets,
      targetRepository: target.repository,
      targetBranch: target.branch,
      ...(headBranch ? { headBranch } : {}),
    });

    const previous = tx.bundle.codeFlow;
    const codeFlow: CodeFlowState = {
      sourceCommit: update.commit,
      headBranch: result.headBranch,
      lastSynchronizedBuildId: Math.max(previous?.lastSynchronizedBuildId ?? 0, update.buildId),
      requestId: null,
    };
    await this.applySyncResult(tx, target, update, codeFlow, result);
  }

  private async applySyncResult(
    tx: UpdateTransaction,
    target: UpdateTarget,
    update: PendingUpdateState,
    codeFlow: CodeFlowState,
    result: BranchSyncResult
  ): Promise<void> {
    switch (result.kind) {
      case "Pending":
        tx.bundle.codeFlow = { ...codeFlow, headBranch: result.headBranch, requestId: result.requestId };
        tx.upsertPending({ ...update, isCodeFlow: true });
        tx.scheduleReminder("CodeFlowReminder");
        return;

      case "Ready":
        tx.bundle.codeFlow = { ...codeFlow, headBranch: result.headBranch, requestId: null };
        await this.deliver(tx, target, update, result.headBranch);
        return;
    }
  }

  /** Head commit PCS left on the branch; any later move comes from someone else. */
  private async liveHead(url: string): Promise<string | null> {
    const live = await this.services.host.getPullRequest(url);
    return live?.headSha ?? null;
  }

  /** The head branch is ready: open the pull request or refresh the existing one. */
  private async deliver(
    tx: UpdateTransaction,
    target: UpdateTarget,
    update: PendingUpdateState,
    headBranch: string
  ): Promise<void> {
    const { host } = this.services;
    const contained = {
      subscriptionId: update.subscriptionId,
      buildId: update.buildId,
      sourceRepository: update.sourceRepository,
      commit: update.commit,
    };
    const existing = tx.bundle.pullRequest;

    if (existing) {
      const next: PullRequestState = {
        ...existing,
        containedUpdates: [
          ...existing.containedUpdates.filter((c) => c.subscriptionId !== update.subscriptionId),
          contained,
        ],
      };
      await host.updatePullRequest(existing.url, describePullRequest(target.branch, next));
      tx.bundle.pullRequest = { ...next, lastUpdateSha: await this.liveHead(existing.url) };
      tx.recordEvents(codeFlowEvents(tx, update, existing.url, "Updated"));
      console.log(`[code-flow] ${tx.ownerKey}: updated ${existing.url} to ${update.commit}`);
    } else {
      const state: Omit<PullRequestState, "url"> = {
        headBranch,
        status: "InProgress",
        isCodeFlow: true,
        coherencySuccessful: true,
        coherencyErrors: [],
        containedUpdates: [contained],
        requiredUpdates: [],
        lastUpdateSha: null,
      };
      const content = describePullRequest(target.branch, state);
      const url = await host.createPullRequest(target.repository, {
        ...content,
        headBranch,
        baseBranch: target.branch,
      });
      tx.bundle.pullRequest = { ...state, url, lastUpdateSha: await this.liveHead(url) };
      tx.recordEvents(codeFlowEvents(tx, update, url, "New"));
      console.log(`[code-flow] ${tx.ownerKey}: opened ${url} from ${headBranch}`);
    }

    if (tx.bundle.codeFlow) {
      tx.bundle.codeFlow = {
        ...tx.bundle.codeFlow,
        sourceCommit: update.commit,
        lastSynchronizedBuildId: Math.max(tx.bundle.codeFlow.lastSynchronizedBuildId, update.buildId),
        requestId: null,
      };
    }
    tx.scheduleReminder("PullRequestCheckReminder");
    tx.consume([update]);
    tx.cancelReminder("CodeFlowReminder");
  }
}
