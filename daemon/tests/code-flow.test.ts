import { beforeEach, describe, expect, it, vi } from "vitest";

import type { CodeFlowState, PullRequestState, UpdateAssetsInput } from "../src/models/types.js";
import { createHarness, makeSubscription, SOURCE_REPO, TARGET_REPO, type Harness } from "./helpers/fakes.js";

const KEY = "subscription:sub-1";
const HEAD = "codeflow/sub-1";
const PR_URL = "https://github.com/org/target/pull/1";

function build(buildId: number, commit: string): UpdateAssetsInput {
  return {
    subscriptionId: "sub-1",
    buildId,
    sourceRepository: SOURCE_REPO,
    commit,
    assets: [{ name: "Pkg.A", version: `${buildId}.0.0` }],
    sourceEnabled: true,
  };
}

function codeFlowState(overrides: Partial<CodeFlowState> = {}): CodeFlowState {
  return { sourceCommit: "sha123", headBranch: HEAD, lastSynchronizedBuildId: 1, requestId: null, ...overrides };
}

function trackedPullRequest(overrides: Partial<PullRequestState> = {}): PullRequestState {
  return {
    url: PR_URL,
    headBranch: HEAD,
    status: "InProgress",
    isCodeFlow: true,
    coherencySuccessful: true,
    coherencyErrors: [],
    containedUpdates: [{ subscriptionId: "sub-1", buildId: 1, sourceRepository: SOURCE_REPO, commit: "sha123" }],
    requiredUpdates: [],
    lastUpdateSha: "branch-sha",
    ...overrides,
  };
}

describe("code flow", () => {
  let h: Harness;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    h = createHarness();
    h.subscriptions.add(makeSubscription({ sourceEnabled: true }));
    h.branchSync.requestSync.mockResolvedValue({ kind: "Pending", requestId: "req-1", headBranch: HEAD });
  });

  /** Opens the host-side pull request and seeds matching state. */
  async function seedOpenPullRequest(pullRequest: Partial<PullRequestState> = {}, codeFlow: Partial<CodeFlowState> = {}) {
    h.host.addBranch(TARGET_REPO, HEAD);
    const url = await h.host.createPullRequest(TARGET_REPO, {
      title: "seed",
      description: "seed",
      headBranch: HEAD,
      baseBranch: "main",
    });
    h.store.bundles.set(KEY, {
      pullRequest: trackedPullRequest({ url, ...pullRequest }),
      codeFlow: codeFlowState(codeFlow),
      pendingUpdates: [],
    });
  }

  it("requests a branch from PCS when nothing is tracked", async () => {
    await h.updater.updateAssets(build(1, "sha123"));

    expect(h.branchSync.requestSync).toHaveBeenCalledTimes(1);
    expect(h.branchSync.requestSync).toHaveBeenCalledWith({
      subscriptionId: "sub-1",
      buildId: 1,
      sourceRepository: SOURCE_REPO,
      commit: "sha123",
      assets: [{ name: "Pkg.A", version: "1.0.0" }],
      targetRepository: TARGET_REPO,
      targetBranch: "main",
    });
    expect(h.store.get(KEY)).toEqual({
      pullRequest: null,
      codeFlow: codeFlowState({ requestId: "req-1" }),
      pendingUpdates: [
        {
          subscriptionId: "sub-1",
          buildId: 1,
          sourceRepository: SOURCE_REPO,
          commit: "sha123",
          assets: [{ name: "Pkg.A", version: "1.0.0" }],
          isCodeFlow: true,
        },
      ],
    });
    expect(h.reminders.activeKinds(KEY)).toEqual(["CodeFlowReminder"]);
  });

  it("waits for the branch instead of asking PCS again for the same commit", async () => {
    await h.updater.updateAssets(build(1, "sha123"));
    const before = h.store.get(KEY);

    await h.updater.updateAssets(build(1, "sha123"));

    expect(h.branchSync.requestSync).toHaveBeenCalledTimes(1);
    expect(h.store.get(KEY)).toEqual(before);
    expect(h.reminders.activeKinds(KEY)).toEqual(["CodeFlowReminder"]);
  });

  it("opens the pull request once the branch appears on the host", async () => {
    await h.updater.updateAssets(build(1, "sha123"));
    h.host.addBranch(TARGET_REPO, HEAD);

    await h.updater.updateAssets(build(1, "sha123"));

    expect(h.branchSync.requestSync).toHaveBeenCalledTimes(1);
    expect(h.store.get(KEY)).toEqual({
      pullRequest: trackedPullRequest(),
      codeFlow: codeFlowState(),
      pendingUpdates: [],
    });
    expect(h.host.requirePullRequest(PR_URL)).toMatchObject({ headBranch: HEAD, baseBranch: "main" });
    expect(h.reminders.activeKinds(KEY)).toEqual(["PullRequestCheckReminder"]);
    expect(h.events.events).toEqual([
      {
        subscriptionId: "sub-1",
        buildId: 1,
        ownerKey: KEY,
        assetName: "Pkg.A",
        fromVersion: null,
        toVersion: "1.0.0",
        pullRequestUrl: PR_URL,
        flowType: "CodeFlow",
        reason: "New",
        recordedAt: expect.any(Date),
      },
    ]);
  });

  it("opens the pull request when PCS answers the reminder's poll with a ready branch", async () => {
    await h.updater.updateAssets(build(1, "sha123"));
    h.branchSync.pollSync.mockResolvedValue({ kind: "Ready", headBranch: HEAD });

    await h.updater.processCodeFlowReminder(KEY);

    expect(h.branchSync.pollSync).toHaveBeenCalledWith("req-1");
    const state = h.store.get(KEY);
    expect(state.pullRequest?.url).toBe(PR_URL);
    expect(state.codeFlow).toEqual(codeFlowState());
    expect(state.pendingUpdates).toEqual([]);
    expect(h.reminders.activeKinds(KEY)).toEqual(["PullRequestCheckReminder"]);
  });

  it("re-arms the code flow reminder while PCS is still working", async () => {
    await h.updater.updateAssets(build(1, "sha123"));
    h.branchSync.pollSync.mockResolvedValue({ kind: "Pending", requestId: "req-1", headBranch: HEAD });
    const before = h.store.get(KEY);

    await h.updater.processCodeFlowReminder(KEY);

    expect(h.store.get(KEY)).toEqual(before);
    expect(h.reminders.scheduled.filter((r) => r.kind === "CodeFlowReminder")).toHaveLength(2);
  });

  it("tolerates a code flow reminder that fires after its work was done", async () => {
    await h.updater.processCodeFlowReminder(KEY);

    expect(h.branchSync.pollSync).not.toHaveBeenCalled();
    expect(h.store.get(KEY)).toEqual({ pullRequest: null, codeFlow: null, pendingUpdates: [] });
    expect(h.reminders.scheduled).toEqual([]);
  });

  it("changes nothing for the same commit while the pull request cannot be updated", async () => {
    await seedOpenPullRequest({ lastUpdateSha: "sha-old" });
    const before = h.store.get(KEY);

    await h.updater.updateAssets(build(1, "sha123"));

    expect(h.branchSync.requestSync).not.toHaveBeenCalled();
    expect(h.store.get(KEY)).toEqual(before);
    expect(h.reminders.scheduled).toEqual([]);
  });

  it("changes nothing for the same commit when the pull request already carries it", async () => {
    await seedOpenPullRequest();
    const before = h.store.get(KEY);

    await h.updater.updateAssets(build(1, "sha123"));

    expect(h.branchSync.requestSync).not.toHaveBeenCalled();
    expect(h.store.get(KEY)).toEqual(before);
    expect(h.reminders.scheduled).toEqual([]);
  });

  it("flows a new commit into the open pull request's branch", async () => {
    await seedOpenPullRequest();
    h.branchSync.requestSync.mockResolvedValue({ kind: "Ready", headBranch: HEAD });

    await h.updater.updateAssets(build(2, "sha456"));

    expect(h.branchSync.requestSync).toHaveBeenCalledWith(
      expect.objectContaining({ buildId: 2, commit: "sha456", headBranch: HEAD })
    );
    const state = h.store.get(KEY);
    expect(state.codeFlow).toEqual(codeFlowState({ sourceCommit: "sha456", lastSynchronizedBuildId: 2 }));
    expect(state.pullRequest?.containedUpdates).toEqual([
      { subscriptionId: "sub-1", buildId: 2, sourceRepository: SOURCE_REPO, commit: "sha456" },
    ]);
    expect(h.host.requirePullRequest(PR_URL).description).toContain("- **Commit**: sha456");
    expect(h.events.events.map((e) => [e.reason, e.toVersion])).toEqual([["Updated", "2.0.0"]]);
    expect(h.reminders.activeKinds(KEY)).toEqual(["PullRequestCheckReminder"]);
  });

  it("records the branch head it opened the pull request at and defers once someone else pushes", async () => {
    h.branchSync.requestSync.mockResolvedValue({ kind: "Ready", headBranch: HEAD });
    await h.updater.updateAssets(build(1, "sha123"));
    expect(h.store.get(KEY).pullRequest?.lastUpdateSha).toBe("branch-sha");

    h.host.pushForeignCommit(PR_URL, "human-edit");
    await h.updater.updateAssets(build(2, "sha456"));

    expect(h.branchSync.requestSync).toHaveBeenCalledTimes(1);
    expect(h.store.get(KEY).pendingUpdates.map((p) => [p.buildId, p.commit])).toEqual([[2, "sha456"]]);
    expect(h.reminders.activeKinds(KEY)).toEqual(["PullRequestCheckReminder", "PullRequestUpdateReminder"]);
  });

  it("requests a fresh branch when the pull request merges while PCS is updating its head", async () => {
    await seedOpenPullRequest();
    h.branchSync.requestSync
      .mockResolvedValueOnce({ kind: "Pending", requestId: "req-1", headBranch: HEAD })
      .mockResolvedValueOnce({ kind: "Pending", requestId: "req-2", headBranch: "codeflow/sub-1-2" });
    await h.updater.updateAssets(build(2, "sha456"));
    h.host.setStatus(PR_URL, "merged");

    await h.updater.checkPullRequest(KEY);

    expect(h.host.pullRequests.size).toBe(1);
    expect(h.branchSync.pollSync).not.toHaveBeenCalled();
    expect(h.branchSync.requestSync).toHaveBeenCalledTimes(2);
    expect(h.branchSync.requestSync).toHaveBeenLastCalledWith(expect.not.objectContaining({ headBranch: HEAD }));
    expect(h.subscriptions.lastApplied("sub-1")).toBe(1);
    const state = h.store.get(KEY);
    expect(state.pullRequest).toBeNull();
    expect(state.codeFlow).toEqual(
      codeFlowState({ sourceCommit: "sha456", headBranch: "codeflow/sub-1-2", lastSynchronizedBuildId: 2, requestId: "req-2" })
    );
    expect(state.pendingUpdates.map((p) => p.buildId)).toEqual([2]);
    expect(h.reminders.activeKinds(KEY)).toEqual(["CodeFlowReminder"]);
  });

  it("defers a new commit while the pull request cannot be updated", async () => {
    await seedOpenPullRequest({ lastUpdateSha: "sha-old" });

    await h.updater.updateAssets(build(2, "sha456"));

    expect(h.branchSync.requestSync).not.toHaveBeenCalled();
    expect(h.store.get(KEY).pendingUpdates.map((p) => [p.buildId, p.isCodeFlow])).toEqual([[2, true]]);
    expect(h.reminders.activeKinds(KEY)).toEqual(["PullRequestUpdateReminder"]);
  });

  it("starts over after the code flow pull request merged", async () => {
    await seedOpenPullRequest();
    h.host.setStatus(PR_URL, "merged");

    await h.updater.updateAssets(build(2, "sha456"));

    expect(h.subscriptions.lastApplied("sub-1")).toBe(1);
    expect(h.branchSync.requestSync).toHaveBeenCalledWith(expect.not.objectContaining({ headBranch: HEAD }));
    const state = h.store.get(KEY);
    expect(state.pullRequest).toBeNull();
    expect(state.codeFlow).toEqual(
      codeFlowState({ sourceCommit: "sha456", lastSynchronizedBuildId: 2, requestId: "req-1" })
    );
  });

  it("drops builds older than the last synchronized one", async () => {
    h.store.bundles.set(KEY, {
      pullRequest: null,
      codeFlow: codeFlowState({ sourceCommit: "sha999", lastSynchronizedBuildId: 5 }),
      pendingUpdates: [],
    });

    await h.updater.updateAssets(build(3, "sha456"));

    expect(h.branchSync.requestSync).not.toHaveBeenCalled();
    expect(h.store.get(KEY).codeFlow?.lastSynchronizedBuildId).toBe(5);
  });
});
