/**
 * Owner keys. Batchable subscriptions share one key per target
 * repository and branch; everything else is keyed by subscription.
 */

import type { Subscription } from "../models/types.js";

export interface UpdateTarget {
  repository: string;
  branch: string;
}

export function ownerKeyFor(subscription: Subscription): string {
  return subscription.policy.batchable
    ? `batch:${subscription.targetRepository}:${subscription.targetBranch}`
    : `subscription:${subscription.id}`;
}

export function targetOf(subscription: Subscription): UpdateTarget {
  return { repository: subscription.targetRepository, branch: subscription.targetBranch };
}

/** Branch-name safe rendering of an owner key. */
export function branchSlug(ownerKey: string): string {
  return ownerKey
    .replace(/^[a-z]+:/, "")
    .replace(/^https?:\/\/[^/]+\//, "")
    .replace(/[^A-Za-z0-9._-]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 60);
}
