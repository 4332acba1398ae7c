import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { BranchSyncError } from "../src/errors.js";
import { createBranchSyncClient } from "../src/pcs/index.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const request = {
  subscriptionId: "sub-1",
  buildId: 1,
  sourceRepository: "https://github.com/org/source",
  commit: "sha123",
  assets: [{ name: "Pkg.A", version: "1.0.0" }],
  targetRepository: "https://github.com/org/target",
  targetBranch: "main",
};

describe("createBranchSyncClient", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("requestSync() posts the build and maps a pending answer", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ status: "pending", requestId: "req-1", headBranch: "codeflow/sub-1" }));
    const client = createBranchSyncClient({ baseUrl: "http://pcs.test/" });

    const result = await client.requestSync(request);

    expect(result).toEqual({ kind: "Pending", requestId: "req-1", headBranch: "codeflow/sub-1" });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://pcs.test/codeflow");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify(request));
  });

  it("pollSync() fetches the request and maps a ready answer", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ status: "ready", headBranch: "codeflow/sub-1" }));
    const client = createBranchSyncClient({ baseUrl: "http://pcs.test" });

    await expect(client.pollSync("req 1")).resolves.toEqual({ kind: "Ready", headBranch: "codeflow/sub-1" });
    expect(fetchMock.mock.calls[0][0]).toBe("http://pcs.test/codeflow/req%201");
  });

  it("raises BranchSyncError with status and body on HTTP failures", async () => {
    fetchMock.mockResolvedValue(new Response("no capacity", { status: 503, statusText: "Service Unavailable" }));
    const client = createBranchSyncClient({ baseUrl: "http://pcs.test" });

    const error = await client.requestSync(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BranchSyncError);
    expect(error).toMatchObject({
      message: "PCS POST /codeflow failed: HTTP 503 Service Unavailable",
      status: 503,
      body: "no capacity",
    });
  });

  it("raises BranchSyncError when PCS cannot be reached", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const client = createBranchSyncClient({ baseUrl: "http://pcs.test" });

    await expect(client.pollSync("req-1")).rejects.toThrow(
      "PCS unreachable at http://pcs.test/codeflow/req-1: fetch failed"
    );
  });

  it("rejects answers it does not understand", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ status: "done" }));
    const client = createBranchSyncClient({ baseUrl: "http://pcs.test" });

    await expect(client.pollSync("req-1")).rejects.toBeInstanceOf(BranchSyncError);
  });
});
