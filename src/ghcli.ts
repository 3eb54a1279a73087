import { execFileSync } from "node:child_process";
import type { TrackerClient } from "./types";

export type CommandRunner = (args: readonly string[], cwd: string) => string;

export const runGh: CommandRunner = (args, cwd) =>
  execFileSync("gh", args, { encoding: "utf8", cwd, stdio: ["ignore", "pipe", "pipe"] }).trim();

export function assertGhAuthenticated(cwd: string, run: CommandRunner = runGh) {
  try {
    run(["auth", "status"], cwd);
  } catch {
    throw new Error(
      "Missing GitHub auth for local pull request updates. Run `gh auth login` (or pass API_KEY / set GH_TOKEN / GITHUB_TOKEN)."
    );
  }
}

/**
 * Tracker client backed by the `gh` CLI, for local runs where `gh` already
 * holds the credentials. Pull requests are addressed by URL.
 */
export function createGhCliTracker(cwd: string, run: CommandRunner = runGh): TrackerClient {
  return {
    // `pr edit --add-label` refuses labels the repository lacks; the issues endpoint creates them
    async addLabels(pr, labels) {
      run(
        [
          "api",
          "--method",
          "POST",
          "--hostname",
          pr.host,
          "--silent",
          `repos/${pr.owner}/${pr.repo}/issues/${pr.number}/labels`,
          ...labels.flatMap(label => ["-f", `labels[]=${label}`])
        ],
        cwd
      );
    },
    async addAssignees(pr, assignees) {
      run(["pr", "edit", pr.url, "--add-assignee", assignees.join(",")], cwd);
    },
    async createComment(pr, body) {
      run(["pr", "comment", pr.url, "--body", body], cwd);
    },
    async setState(pr, state) {
      run(["pr", state === "closed" ? "close" : "reopen", pr.url], cwd);
    }
  };
}
