/**
 * Dependency Flow Types: Shared type definitions for the updater subsystem.
 *
 * Subscriptions and builds arrive as immutable value records. Everything the
 * updater persists per target key lives in a {@link StateBundle}.
 */

// ── Subscriptions & Builds ──

export type UpdateFrequency = "EveryBuild" | "EveryDay" | "EveryWeek" | "None";

export interface SubscriptionPolicy {
  batchable: boolean;
  updateFrequency: UpdateFrequency;
}

export interface Subscription {
  id: string;
  channelId: number;
  sourceRepository: string;
  targetRepository: string;
  targetBranch: string;
  policy: SubscriptionPolicy;
  /** Code-flow subscriptions route changes through the branch-sync service. */
  sourceEnabled: boolean;
  lastAppliedBuildId: number | null;
}

export interface Asset {
  name: string;
  version: string;
}

export interface Build {
  id: number;
  sourceRepository: string;
  commit: string;
  assets: readonly Asset[];
}

// ── Dependency graph ──

/** One entry of a repository's dependency manifest. */
export interface DependencyDetail {
  name: string;
  version: string;
  repoUri: string;
  commit: string;
  /** Name of the dependency this one must stay coherent with. */
  coherentParentDependency?: string;
  pinned?: boolean;
}

export type UpdateReason = "direct" | "coherency";

export interface AssetUpdate {
  from: DependencyDetail;
  to: DependencyDetail;
  reason: UpdateReason;
}

export interface CoherencyErrorDetails {
  error: string;
  potentialSolutions: string[];
}

export type CoherencyMode = "strict" | "legacy";

// ── Persisted state ──

/** A queued, not-yet-applied update for one subscription. */
export interface PendingUpdateState {
  subscriptionId: string;
  buildId: number;
  sourceRepository: string;
  commit: string;
  assets: Asset[];
  isCodeFlow: boolean;
}

export type PullRequestStatus = "None" | "InProgress" | "Completed";

export interface ContainedUpdate {
  subscriptionId: string;
  buildId: number;
  sourceRepository: string;
  commit: string;
}

export interface PullRequestState {
  url: string;
  headBranch: string;
  status: Exclude<PullRequestStatus, "None">;
  isCodeFlow: boolean;
  coherencySuccessful: boolean;
  coherencyErrors: CoherencyErrorDetails[];
  containedUpdates: ContainedUpdate[];
  requiredUpdates: AssetUpdate[];
  /** Head commit the updater last pushed; null for code-flow PRs. */
  lastUpdateSha: string | null;
}

export interface CodeFlowState {
  sourceCommit: string;
  headBranch: string;
  lastSynchronizedBuildId: number;
  /** Outstanding branch-sync request, null once the branch was delivered. */
  requestId: string | null;
}

/** Everything persisted for one owner key, written atomically. */
export interface StateBundle {
  pullRequest: PullRequestState | null;
  codeFlow: CodeFlowState | null;
  pendingUpdates: PendingUpdateState[];
}

export function emptyBundle(): StateBundle {
  return { pullRequest: null, codeFlow: null, pendingUpdates: [] };
}

// ── Reminders ──

export type ReminderKind =
  | "CodeFlowReminder"
  | "PullRequestUpdateReminder"
  | "PullRequestCheckReminder";

export const REMINDER_KINDS: readonly ReminderKind[] = [
  "CodeFlowReminder",
  "PullRequestUpdateReminder",
  "PullRequestCheckReminder",
];

export interface ReminderPayload {
  ownerKey: string;
  kind: ReminderKind;
}

// ── Telemetry ──

export type FlowType = "Classic" | "CodeFlow";

export interface DependencyFlowEvent {
  subscriptionId: string;
  buildId: number;
  ownerKey: string;
  assetName: string;
  fromVersion: string | null;
  toVersion: string;
  pullRequestUrl: string;
  flowType: FlowType;
  reason: "New" | "Updated";
  recordedAt: Date;
}

// ── Entry points ──

export interface UpdateAssetsInput {
  subscriptionId: string;
  buildId: number;
  sourceRepository: string;
  commit: string;
  assets: Asset[];
  sourceEnabled: boolean;
}
