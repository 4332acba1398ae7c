import { describe, expect, it } from "vitest";

import { commitMessage, describePullRequest } from "../src/updater/description.js";
import { dependency, OTHER_SOURCE_REPO, SOURCE_REPO } from "./helpers/fakes.js";

describe("describePullRequest", () => {
  it("lists direct updates per source, coherency updates, and coherency failures", () => {
    const content = describePullRequest("main", {
      isCodeFlow: false,
      coherencySuccessful: false,
      coherencyErrors: [{ error: "Parent @ c1 does not contain dependency Child", potentialSolutions: ["Pin Child"] }],
      containedUpdates: [{ subscriptionId: "sub-1", buildId: 10, sourceRepository: SOURCE_REPO, commit: "c1" }],
      requiredUpdates: [
        {
          from: dependency("Pkg.A", "1.0.0"),
          to: dependency("Pkg.A", "2.0.0", { commit: "c1" }),
          reason: "direct",
        },
        {
          from: dependency("Child", "1.0.0", { repoUri: OTHER_SOURCE_REPO }),
          to: dependency("Child", "5.0.0", { repoUri: OTHER_SOURCE_REPO }),
          reason: "coherency",
        },
      ],
    });

    expect(content.title).toBe("[main] Update dependencies from https://github.com/org/source");
    expect(content.description).toBe(
      [
        "This pull request updates the following dependencies.",
        "",
        "## From https://github.com/org/source",
        "- **Subscription**: sub-1",
        "- **Build**: 10",
        "- **Commit**: c1",
        "- **Updates**:",
        "  - **Pkg.A**: 1.0.0 → 2.0.0",
        "",
        "## Coherency Updates",
        "  - **Child**: 1.0.0 → 5.0.0",
        "",
        "## Coherency Check Failed",
        "- Parent @ c1 does not contain dependency Child",
        "  - Pin Child",
      ].join("\n")
    );
  });

  it("counts sources in the title of a batched pull request", () => {
    const content = describePullRequest("release/1.0", {
      isCodeFlow: true,
      coherencySuccessful: true,
      coherencyErrors: [],
      containedUpdates: [
        { subscriptionId: "sub-1", buildId: 1, sourceRepository: SOURCE_REPO, commit: "c1" },
        { subscriptionId: "sub-2", buildId: 2, sourceRepository: OTHER_SOURCE_REPO, commit: "o1" },
      ],
      requiredUpdates: [],
    });

    expect(content.title).toBe("[release/1.0] Update dependencies from 2 repositories");
    expect(content.description.split("\n")[0]).toBe(
      "This pull request brings source changes synchronized from the following builds."
    );
  });
});

describe("commitMessage", () => {
  it("names every build it carries", () => {
    const message = commitMessage([
      { subscriptionId: "sub-1", buildId: 10, sourceRepository: SOURCE_REPO, commit: "c1", assets: [], isCodeFlow: false },
    ]);

    expect(message).toBe(
      "Update dependencies from https://github.com/org/source\n\n- https://github.com/org/source build 10 (c1)"
    );
  });
});
