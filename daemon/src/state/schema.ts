/**
 * Row validation for values read back from MySQL.
 */

import { z } from "zod";

const dependencyDetail = z.object({
  name: z.string(),
  version: z.string(),
  repoUri: z.string(),
  commit: z.string(),
  coherentParentDependency: z.string().optional(),
  pinned: z.boolean().optional(),
});

const assetUpdate = z.object({
  from: dependencyDetail,
  to: dependencyDetail,
  reason: z.enum(["direct", "coherency"]),
});

export const pullRequestStateSchema = z.object({
  url: z.string().min(1),
  headBranch: z.string().min(1),
  status: z.enum(["InProgress", "Completed"]),
  isCodeFlow: z.boolean(),
  coherencySuccessful: z.boolean(),
  coherencyErrors: z.array(
    z.object({ error: z.string(), potentialSolutions: z.array(z.string()) })
  ),
  containedUpdates: z.array(
    z.object({
      subscriptionId: z.string(),
      buildId: z.number().int(),
      sourceRepository: z.string(),
      commit: z.string(),
    })
  ),
  requiredUpdates: z.array(assetUpdate),
  lastUpdateSha: z.string().nullable(),
});

export const codeFlowStateSchema = z.object({
  sourceCommit: z.string(),
  headBranch: z.string(),
  lastSynchronizedBuildId: z.number().int(),
  requestId: z.string().nullable(),
});

export const pendingUpdatesSchema = z.array(
  z.object({
    subscriptionId: z.string(),
    buildId: z.number().int(),
    sourceRepository: z.string(),
    commit: z.string(),
    assets: z.array(z.object({ name: z.string(), version: z.string() })),
    isCodeFlow: z.boolean(),
  })
);

const flag = z.union([z.boolean(), z.number()]).transform((v) => v === true || v === 1);

export const subscriptionRowSchema = z.object({
  id: z.string(),
  channel_id: z.coerce.number().int(),
  source_repository: z.string(),
  target_repository: z.string(),
  target_branch: z.string(),
  batchable: flag,
  update_frequency: z.enum(["EveryBuild", "EveryDay", "EveryWeek", "None"]),
  source_enabled: flag,
  last_applied_build_id: z.coerce.number().int().nullable(),
});
