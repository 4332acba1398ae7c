/**
 * Pull Request Synchronizer
 *
 * Classifies the live state of a tracked pull request. This is the single
 * decision point gating whether the updater pushes changes now or defers:
 *
 *   NotFound                nothing tracked, or the host lost the PR
 *   InProgressCanUpdate     open, head still at the commit we pushed last
 *   InProgressCannotUpdate  open, someone else moved the head branch
 *   Completed               merged or closed
 */

import type { HostPullRequest, RepositoryHost } from "../host/index.js";
import type { PullRequestState } from "../models/types.js";

export type SyncResult =
  | { kind: "NotFound" }
  | { kind: "InProgressCanUpdate" }
  | { kind: "InProgressCannotUpdate"; reason: string }
  | { kind: "Completed"; merged: boolean };

export function classifyPullRequest(
  tracked: PullRequestState,
  live: HostPullRequest | null
): SyncResult {
  if (!live) return { kind: "NotFound" };

  switch (live.status) {
    case "merged":
      return { kind: "Completed", merged: true };
    case "closed":
      return { kind: "Completed", merged: false };
    case "open":
      if (tracked.lastUpdateSha !== null && tracked.lastUpdateSha !== live.headSha) {
        return {
          kind: "InProgressCannotUpdate",
          reason: `head moved from ${tracked.lastUpdateSha} to ${live.headSha}`,
        };
      }
      return { kind: "InProgressCanUpdate" };
  }
}

export async function synchronizePullRequest(
  host: Pick<RepositoryHost, "getPullRequest">,
  tracked: PullRequestState | null
): Promise<SyncResult> {
  if (!tracked) return { kind: "NotFound" };
  const live = await host.getPullRequest(tracked.url);
  return classifyPullRequest(tracked, live);
}
