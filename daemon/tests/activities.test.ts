import { beforeEach, describe, expect, it, vi } from "vitest";

const { logInfo } = vi.hoisted(() => ({ logInfo: vi.fn() }));

vi.mock("@temporalio/activity", () => ({
  log: { info: logInfo, warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import type { ReminderPayload, UpdateAssetsInput } from "../src/models/types.js";
import { createActivities } from "../src/temporal/activities.js";

describe("createActivities", () => {
  const updater = {
    updateAssets: vi.fn<(input: UpdateAssetsInput) => Promise<void>>(),
    processReminder: vi.fn<(payload: ReminderPayload) => Promise<void>>(),
  };

  beforeEach(() => {
    vi.clearAllMocks();
    updater.updateAssets.mockResolvedValue(undefined);
    updater.processReminder.mockResolvedValue(undefined);
  });

  it("fireReminder routes the payload to the updater", async () => {
    const activities = createActivities(updater);

    await activities.fireReminder({ ownerKey: "subscription:sub-1", kind: "PullRequestCheckReminder" });

    expect(updater.processReminder).toHaveBeenCalledWith({
      ownerKey: "subscription:sub-1",
      kind: "PullRequestCheckReminder",
    });
    expect(logInfo).toHaveBeenCalledWith("Reminder fired", {
      kind: "PullRequestCheckReminder",
      ownerKey: "subscription:sub-1",
    });
  });

  it("updateAssets forwards the build and propagates failures for retry", async () => {
    updater.updateAssets.mockRejectedValue(new Error("GitHub is down"));
    const activities = createActivities(updater);
    const input = {
      subscriptionId: "sub-1",
      buildId: 10,
      sourceRepository: "https://github.com/org/source",
      commit: "c1",
      assets: [{ name: "Pkg.A", version: "2.0.0" }],
      sourceEnabled: false,
    };

    await expect(activities.updateAssets(input)).rejects.toThrow("GitHub is down");
    expect(updater.updateAssets).toHaveBeenCalledWith(input);
  });
});
