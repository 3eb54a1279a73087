import { errorMessage, RoutingError } from "./errors";
import { sortByPriority, unionChiefs, unionTopics } from "./resolve";
import type { PullRequestRef, Segment, TrackerClient, TrackerKind, UpdateResult } from "./types";

function parseUrl(u: string, what: string): URL {
  try {
    return new URL(u);
  } catch {
    throw new RoutingError("invalid-pull-request-url", `Failed to parse ${what} URL '${u}'`);
  }
}

export function trackerKindFromUrl(u: string): TrackerKind {
  const url = parseUrl(u, "project manager");
  if (url.host === "github.com") return { kind: "github", host: url.host };
  throw new RoutingError("unsupported-tracker", `Cannot find project manager handler for url '${u}'`);
}

/** Accepts only `{host}/{owner}/{repo}/pull/{number}`. */
export function parsePullRequestUrl(u: string): PullRequestRef {
  const url = parseUrl(u, "pull request");
  const parts = url.pathname.split("/");
  const invalid = () => new RoutingError("invalid-pull-request-url", `Invalid pull request URL '${u}'`);

  if (/[?#]/.test(u)) throw invalid();
  if (parts.length !== 5 || parts[0] !== "" || parts[3] !== "pull") throw invalid();
  const [, owner, repo, , num] = parts;
  if (!owner || !repo || !/^\d+$/.test(num)) throw invalid();
  const number = Number(num);
  if (!Number.isSafeInteger(number) || number <= 0) throw invalid();

  return { host: url.host, owner, repo, number, url: u };
}

/** First segment, by priority, whose repository hosts the pull request. */
export function findTargetRepository(prUrl: string, segments: Segment[]): string {
  const hit = sortByPriority(segments).find(s => s.repository && prUrl.startsWith(s.repository));
  return hit?.repository ?? "";
}

export function redirectComment(pr: PullRequestRef, repository: string): string {
  return [
    `This pull request does not belong to ${pr.owner}/${pr.repo}.`,
    "",
    `According to the maintainers file, the changes should be submitted to ${repository}.`,
    "Closing it here; please open it again against that repository."
  ].join("\n");
}

async function call(what: string, fn: () => Promise<void>) {
  try {
    await fn();
  } catch (e) {
    throw new RoutingError("tracker", `Failed to ${what}: ${errorMessage(e)}`, { cause: e });
  }
}

export async function updatePullRequest(params: {
  client: TrackerClient;
  pullRequestUrl: string;
  segments: Segment[];
  closeIfUnowned: boolean;
}): Promise<UpdateResult> {
  const { client, pullRequestUrl, closeIfUnowned } = params;
  if (!params.segments.length) {
    throw new RoutingError("no-segments", "No matching segments found for this patch. Please edit your maintainers file");
  }

  const segments = sortByPriority(params.segments);
  const labels = unionTopics(segments);
  const assignees = unionChiefs(segments);
  if (!assignees.length) throw new RoutingError("no-chiefs", "Chiefs not found for this pull request");

  const pr = parsePullRequestUrl(pullRequestUrl);
  const repository = findTargetRepository(pullRequestUrl, segments);

  if (repository) {
    if (labels.length) await call("add labels to pull request", () => client.addLabels(pr, labels));
    await call("add assignees to pull request", () => client.addAssignees(pr, assignees));
    return { action: "assigned", pullRequest: pr, repository, labels, assignees };
  }

  if (!closeIfUnowned) throw new RoutingError("no-repository", "No repository found for this pull request");

  const target = segments.find(s => s.repository)?.repository;
  if (!target) throw new RoutingError("no-repository", "No repository found for this pull request");

  await call("comment on pull request", () => client.createComment(pr, redirectComment(pr, target)));
  await call("close pull request", () => client.setState(pr, "closed"));
  return { action: "closed", pullRequest: pr, repository: target, labels: [], assignees: [] };
}
