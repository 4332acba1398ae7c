/**
 * Branch Synchronization Service (PCS) client
 *
 * Code-flow updates never commit directly: PCS materializes a head branch in
 * the target repository that carries the source changes of a build. A
 * request either completes immediately or returns a request id to poll.
 *
 *   POST {baseUrl}/codeflow             → SyncResponse
 *   GET  {baseUrl}/codeflow/{requestId} → SyncResponse
 */

import { z } from "zod";

import { BranchSyncError, errorMessage } from "../errors.js";
import type { Asset } from "../models/types.js";

export type BranchSyncResult =
  | { kind: "Ready"; headBranch: string }
  | { kind: "Pending"; requestId: string; headBranch: string };

export interface BranchSyncRequest {
  subscriptionId: string;
  buildId: number;
  sourceRepository: string;
  commit: string;
  assets: readonly Asset[];
  targetRepository: string;
  targetBranch: string;
  /** Existing PR head branch to update; omitted for a fresh branch. */
  headBranch?: string;
}

export interface BranchSyncService {
  requestSync(request: BranchSyncRequest): Promise<BranchSyncResult>;
  pollSync(requestId: string): Promise<BranchSyncResult>;
}

export interface BranchSyncClientConfig {
  baseUrl: string;
  timeoutMs?: number;
}

const syncResponseSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("ready"), headBranch: z.string().min(1) }),
  z.object({
    status: z.literal("pending"),
    requestId: z.string().min(1),
    headBranch: z.string().min(1),
  }),
]);

export function createBranchSyncClient(config: BranchSyncClientConfig): BranchSyncService {
  const baseUrl = config.baseUrl.replace(/\/+$/, "");
  const timeoutMs = config.timeoutMs ?? 30_000;

  async function call(path: string, init: RequestInit): Promise<BranchSyncResult> {
    const url = `${baseUrl}${path}`;
    let response: Response;
    try {
      response = await fetch(url, {
        ...init,
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err: unknown) {
      throw new BranchSyncError(`PCS unreachable at ${url}: ${errorMessage(err)}`, null);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new BranchSyncError(
        `PCS ${init.method ?? "GET"} ${path} failed: HTTP ${response.status} ${response.statusText}`,
        response.status,
        body
      );
    }

    const parsed = syncResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BranchSyncError(
        `PCS ${path} returned an unexpected body: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
        response.status
      );
    }

    const data = parsed.data;
    return data.status === "ready"
      ? { kind: "Ready", headBranch: data.headBranch }
      : { kind: "Pending", requestId: data.requestId, headBranch: data.headBranch };
  }

  return {
    requestSync(request) {
      return call("/codeflow", { method: "POST", body: JSON.stringify(request) });
    },

    pollSync(requestId) {
      return call(`/codeflow/${encodeURIComponent(requestId)}`, { method: "GET" });
    },
  };
}
