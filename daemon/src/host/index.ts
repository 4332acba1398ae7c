/**
 * Repository Host: the source-control platform the updater opens pull
 * requests on. The GitHub implementation lives in ./github.ts.
 */

import type { DependencyGraphReader } from "../coherency/index.js";
import type { AssetUpdate } from "../models/types.js";

export type HostPullRequestStatus = "open" | "merged" | "closed";

export interface HostPullRequest {
  url: string;
  status: HostPullRequestStatus;
  headSha: string;
}

export interface PullRequestContent {
  title: string;
  description: string;
}

export interface NewPullRequest extends PullRequestContent {
  headBranch: string;
  baseBranch: string;
}

export interface RepositoryHost extends DependencyGraphReader {
  createBranch(repoUri: string, baseBranch: string, newBranch: string): Promise<void>;
  /** Applies the updates to the manifest on `branch` and returns the new commit sha. */
  commitUpdates(
    repoUri: string,
    branch: string,
    updates: readonly AssetUpdate[],
    message: string
  ): Promise<string>;
  /** Returns the pull request URL. */
  createPullRequest(repoUri: string, pullRequest: NewPullRequest): Promise<string>;
  updatePullRequest(url: string, content: PullRequestContent): Promise<void>;
  /** Null when the host does not know the pull request. */
  getPullRequest(url: string): Promise<HostPullRequest | null>;
  branchExists(repoUri: string, branch: string): Promise<boolean>;
}

/** Path of the dependency manifest inside every participating repository. */
export const DEPENDENCY_MANIFEST_PATH = "eng/dependencies.json";
