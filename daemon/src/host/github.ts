/**
 * GitHub Repository Host
 *
 * Implements the repository host on the GitHub REST API (@octokit/rest).
 * Every participating repository carries its dependency manifest at
 * `eng/dependencies.json`:
 *
 *   { "dependencies": [ { "name", "version", "repoUri", "commit",
 *                         "coherentParentDependency"?, "pinned"? } ] }
 *
 * Updates are committed by rewriting that file on the head branch.
 */

import { Octokit } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";
import { z } from "zod";

import { RepositoryHostError } from "../errors.js";
import type { AssetUpdate, DependencyDetail } from "../models/types.js";
import {
  DEPENDENCY_MANIFEST_PATH,
  type HostPullRequest,
  type NewPullRequest,
  type PullRequestContent,
  type RepositoryHost,
} from "./index.js";

export interface GitHubHostConfig {
  token: string;
  userAgent?: string;
}

interface RepoRef {
  owner: string;
  repo: string;
}

const manifestSchema = z.object({
  dependencies: z.array(
    z.object({
      name: z.string().min(1),
      version: z.string().min(1),
      repoUri: z.string().min(1),
      commit: z.string().min(1),
      coherentParentDependency: z.string().optional(),
      pinned: z.boolean().optional(),
    })
  ),
});

export function parseRepoUri(repoUri: string): RepoRef {
  const match = repoUri.match(/^https:\/\/github\.com\/([^/]+)\/([^/]+?)(?:\.git)?\/?$/);
  if (!match) {
    throw new RepositoryHostError(`Not a GitHub repository URI: ${repoUri}`, null);
  }
  return { owner: match[1], repo: match[2] };
}

export function parsePullRequestUrl(url: string): RepoRef & { pullNumber: number } {
  const match = url.match(/^https:\/\/github\.com\/([^/]+)\/([^/]+)\/pull\/(\d+)\/?$/);
  if (!match) {
    throw new RepositoryHostError(`Not a GitHub pull request URL: ${url}`, null);
  }
  return { owner: match[1], repo: match[2], pullNumber: Number(match[3]) };
}

/** Applies updates to a manifest, matching names case-insensitively. */
export function applyUpdatesToManifest(
  dependencies: readonly DependencyDetail[],
  updates: readonly AssetUpdate[]
): DependencyDetail[] {
  const byName = new Map(updates.map((u) => [u.to.name.toLowerCase(), u.to]));
  return dependencies.map((dep) => {
    const to = byName.get(dep.name.toLowerCase());
    return to ? { ...dep, version: to.version, repoUri: to.repoUri, commit: to.commit } : dep;
  });
}

function isNotFound(err: unknown): boolean {
  return err instanceof RequestError && err.status === 404;
}

function wrap(action: string, err: unknown): RepositoryHostError {
  if (err instanceof RepositoryHostError) return err;
  if (err instanceof RequestError) {
    return new RepositoryHostError(`GitHub ${action} failed: ${err.message}`, err.status, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new RepositoryHostError(`GitHub ${action} failed: ${message}`, null, { cause: err });
}

export function createGitHubRepositoryHost(config: GitHubHostConfig): RepositoryHost {
  const octokit = new Octokit({
    auth: config.token,
    userAgent: config.userAgent ?? "dependency-flow-daemon/0.1",
  });

  async function readManifest(
    ref: RepoRef,
    gitRef: string
  ): Promise<{ dependencies: DependencyDetail[]; sha: string } | null> {
    let data;
    try {
      ({ data } = await octokit.repos.getContent({ ...ref, path: DEPENDENCY_MANIFEST_PATH, ref: gitRef }));
    } catch (err: unknown) {
      if (isNotFound(err)) return null;
      throw wrap(`read of ${DEPENDENCY_MANIFEST_PATH}`, err);
    }

    if (Array.isArray(data) || !("content" in data) || typeof data.content !== "string") {
      throw new RepositoryHostError(
        `${ref.owner}/${ref.repo}@${gitRef}: ${DEPENDENCY_MANIFEST_PATH} is not a file`,
        null
      );
    }
    const text = Buffer.from(data.content, "base64").toString("utf8");
    const manifest = manifestSchema.parse(JSON.parse(text));
    return { dependencies: manifest.dependencies, sha: data.sha };
  }

  return {
    async getDependencies(repoUri, ref) {
      const manifest = await readManifest(parseRepoUri(repoUri), ref);
      return manifest?.dependencies ?? [];
    },

    async createBranch(repoUri, baseBranch, newBranch) {
      const repo = parseRepoUri(repoUri);
      try {
        const { data } = await octokit.git.getRef({ ...repo, ref: `heads/${baseBranch}` });
        await octokit.git.createRef({ ...repo, ref: `refs/heads/${newBranch}`, sha: data.object.sha });
      } catch (err: unknown) {
        throw wrap(`branch creation of ${newBranch}`, err);
      }
    },

    async commitUpdates(repoUri, branch, updates, message) {
      const repo = parseRepoUri(repoUri);
      const manifest = await readManifest(repo, branch);
      if (!manifest) {
        throw new RepositoryHostError(`${repoUri}@${branch} has no ${DEPENDENCY_MANIFEST_PATH}`, 404);
      }

      const next = { dependencies: applyUpdatesToManifest(manifest.dependencies, updates) };
      try {
        const { data } = await octokit.repos.createOrUpdateFileContents({
          ...repo,
          path: DEPENDENCY_MANIFEST_PATH,
          message,
          branch,
          sha: manifest.sha,
          content: Buffer.from(`${JSON.stringify(next, null, 2)}\n`, "utf8").toString("base64"),
        });
        const sha = data.commit.sha;
        if (!sha) throw new RepositoryHostError(`GitHub did not return a commit for ${branch}`, null);
        return sha;
      } catch (err: unknown) {
        throw wrap(`commit to ${branch}`, err);
      }
    },

    async createPullRequest(repoUri, pullRequest: NewPullRequest) {
      const repo = parseRepoUri(repoUri);
      try {
        const { data } = await octokit.pulls.create({
          ...repo,
          title: pullRequest.title,
          body: pullRequest.description,
          head: pullRequest.headBranch,
          base: pullRequest.baseBranch,
        });
        return data.html_url;
      } catch (err: unknown) {
        throw wrap(`pull request creation from ${pullRequest.headBranch}`, err);
      }
    },

    async updatePullRequest(url, content: PullRequestContent) {
      const { pullNumber, ...repo } = parsePullRequestUrl(url);
      try {
        await octokit.pulls.update({
          ...repo,
          pull_number: pullNumber,
          title: content.title,
          body: content.description,
        });
      } catch (err: unknown) {
        throw wrap(`update of ${url}`, err);
      }
    },

    async getPullRequest(url): Promise<HostPullRequest | null> {
      const { pullNumber, ...repo } = parsePullRequestUrl(url);
      try {
        const { data } = await octokit.pulls.get({ ...repo, pull_number: pullNumber });
        const status = data.merged ? "merged" : data.state === "closed" ? "closed" : "open";
        return { url, status, headSha: data.head.sha };
      } catch (err: unknown) {
        if (isNotFound(err)) return null;
        throw wrap(`lookup of ${url}`, err);
      }
    },

    async branchExists(repoUri, branch) {
      try {
        await octokit.repos.getBranch({ ...parseRepoUri(repoUri), branch });
        return true;
      } catch (err: unknown) {
        if (isNotFound(err)) return false;
        throw wrap(`lookup of branch ${branch}`, err);
      }
    },
  };
}
