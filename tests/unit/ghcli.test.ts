import { describe, it, expect, vi } from "vitest";
import { assertGhAuthenticated, createGhCliTracker } from "../../src/ghcli";
import type { CommandRunner } from "../../src/ghcli";
import { parsePullRequestUrl } from "../../src/tracker";

const pr = parsePullRequestUrl("https://github.com/acme/widgets/pull/7");

describe("createGhCliTracker", () => {
  it("maps tracker operations to gh commands, creating labels through the issues API", async () => {
    const run = vi.fn<CommandRunner>(() => "");
    const tracker = createGhCliTracker("/work", run);

    await tracker.addLabels(pr, ["ui", "core"]);
    await tracker.addAssignees(pr, ["alice", "bob"]);
    await tracker.createComment(pr, "Wrong repository");
    await tracker.setState(pr, "closed");
    await tracker.setState(pr, "open");

    expect(run.mock.calls).toEqual([
      [
        [
          "api",
          "--method",
          "POST",
          "--hostname",
          "github.com",
          "--silent",
          "repos/acme/widgets/issues/7/labels",
          "-f",
          "labels[]=ui",
          "-f",
          "labels[]=core"
        ],
        "/work"
      ],
      [["pr", "edit", pr.url, "--add-assignee", "alice,bob"], "/work"],
      [["pr", "comment", pr.url, "--body", "Wrong repository"], "/work"],
      [["pr", "close", pr.url], "/work"],
      [["pr", "reopen", pr.url], "/work"]
    ]);
  });

  it("surfaces gh failures", async () => {
    const run = vi.fn<CommandRunner>(() => {
      throw new Error("GraphQL: Could not resolve to a PullRequest");
    });
    await expect(createGhCliTracker("/work", run).addLabels(pr, ["ui"])).rejects.toThrow(
      "GraphQL: Could not resolve to a PullRequest"
    );
  });
});

describe("assertGhAuthenticated", () => {
  it("passes when gh is logged in", () => {
    const run = vi.fn<CommandRunner>(() => "Logged in to github.com");
    expect(() => assertGhAuthenticated("/work", run)).not.toThrow();
    expect(run).toHaveBeenCalledWith(["auth", "status"], "/work");
  });

  it("explains how to log in otherwise", () => {
    const run = vi.fn<CommandRunner>(() => {
      throw new Error("exit status 1");
    });
    expect(() => assertGhAuthenticated("/work", run)).toThrow(/Run `gh auth login`/);
  });
});
