/**
 * Error types surfaced by the daemon.
 *
 * External-call failures propagate to whoever invoked the entry point
 * (a Temporal activity or the dispatch CLI) so the invocation is retried.
 */

export class SubscriptionNotFoundError extends Error {
  constructor(readonly subscriptionId: string) {
    super(`Subscription ${subscriptionId} was not found`);
    this.name = "SubscriptionNotFoundError";
  }
}

export class RepositoryHostError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RepositoryHostError";
  }
}

export class BranchSyncError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly body: string | null = null
  ) {
    super(message);
    this.name = "BranchSyncError";
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
