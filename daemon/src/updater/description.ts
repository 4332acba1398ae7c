/**
 * Pull request title, description and commit message.
 */

import type { PullRequestContent } from "../host/index.js";
import type { AssetUpdate, PendingUpdateState, PullRequestState } from "../models/types.js";

type DescribedState = Pick<
  PullRequestState,
  "containedUpdates" | "requiredUpdates" | "coherencySuccessful" | "coherencyErrors" | "isCodeFlow"
>;

function distinctSources(state: DescribedState): string[] {
  return [...new Set(state.containedUpdates.map((u) => u.sourceRepository))];
}

function formatUpdate(update: AssetUpdate): string {
  return `  - **${update.to.name}**: ${update.from.version} → ${update.to.version}`;
}

export function describePullRequest(targetBranch: string, state: DescribedState): PullRequestContent {
  const sources = distinctSources(state);
  const title =
    sources.length === 1
      ? `[${targetBranch}] Update dependencies from ${sources[0]}`
      : `[${targetBranch}] Update dependencies from ${sources.length} repositories`;

  const lines: string[] = [
    state.isCodeFlow
      ? "This pull request brings source changes synchronized from the following builds."
      : "This pull request updates the following dependencies.",
    "",
  ];

  for (const contained of state.containedUpdates) {
    lines.push(`## From ${contained.sourceRepository}`);
    lines.push(`- **Subscription**: ${contained.subscriptionId}`);
    lines.push(`- **Build**: ${contained.buildId}`);
    lines.push(`- **Commit**: ${contained.commit}`);

    const updates = state.requiredUpdates.filter(
      (u) => u.reason === "direct" && u.to.repoUri === contained.sourceRepository
    );
    if (updates.length > 0) {
      lines.push("- **Updates**:");
      lines.push(...updates.map(formatUpdate));
    }
    lines.push("");
  }

  const coherency = state.requiredUpdates.filter((u) => u.reason === "coherency");
  if (coherency.length > 0) {
    lines.push("## Coherency Updates");
    lines.push(...coherency.map(formatUpdate));
    lines.push("");
  }

  if (!state.coherencySuccessful) {
    lines.push("## Coherency Check Failed");
    for (const detail of state.coherencyErrors) {
      lines.push(`- ${detail.error}`);
      lines.push(...detail.potentialSolutions.map((s) => `  - ${s}`));
    }
    lines.push("");
  }

  return { title, description: lines.join("\n").trimEnd() };
}

export function commitMessage(updates: readonly PendingUpdateState[]): string {
  const sources = [...new Set(updates.map((u) => u.sourceRepository))];
  const builds = updates.map((u) => `- ${u.sourceRepository} build ${u.buildId} (${u.commit})`);
  return [`Update dependencies from ${sources.join(", ")}`, "", ...builds].join("\n");
}
