import { Octokit } from "octokit";
import type { PullRequestRef, PullRequestState, TrackerClient, TrackerKind } from "./types";

type IssueParams = { owner: string; repo: string; issue_number: number };

/** The slice of `octokit.rest` the tracker client calls. */
export type GitHubRest = {
  issues: {
    addLabels(params: IssueParams & { labels: string[] }): Promise<unknown>;
    addAssignees(params: IssueParams & { assignees: string[] }): Promise<unknown>;
    createComment(params: IssueParams & { body: string }): Promise<unknown>;
  };
  pulls: {
    update(params: { owner: string; repo: string; pull_number: number; state: PullRequestState }): Promise<unknown>;
  };
};

export function getOctokit(token: string) {
  if (!token) throw new Error("Missing GitHub token (pass API_KEY or set GITHUB_TOKEN / GH_TOKEN env var)");
  return new Octokit({ auth: token });
}

function issue(pr: PullRequestRef): IssueParams {
  return { owner: pr.owner, repo: pr.repo, issue_number: pr.number };
}

export function createGitHubTracker(octokit: { rest: GitHubRest }): TrackerClient {
  return {
    async addLabels(pr, labels) {
      await octokit.rest.issues.addLabels({ ...issue(pr), labels });
    },
    async addAssignees(pr, assignees) {
      await octokit.rest.issues.addAssignees({ ...issue(pr), assignees });
    },
    async createComment(pr, body) {
      await octokit.rest.issues.createComment({ ...issue(pr), body });
    },
    async setState(pr, state) {
      await octokit.rest.pulls.update({ owner: pr.owner, repo: pr.repo, pull_number: pr.number, state });
    }
  };
}

/** REST client for the tracker a pull request URL points at. */
export function createTokenTracker(kind: TrackerKind, token: string): TrackerClient {
  switch (kind.kind) {
    case "github":
      return createGitHubTracker(getOctokit(token));
  }
}
