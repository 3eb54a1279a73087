import path from "node:path";
import { applyExcludes } from "./excludes";
import { getFilePatches } from "./git";
import type { GitRunner } from "./git";
import { formatSegment } from "./maintainers";
import { Matcher } from "./matcher";
import { assertResolved, distinctRepositories, resolveSegments, sortByPriority } from "./resolve";
import { trackerKindFromUrl, updatePullRequest } from "./tracker";
import type {
  Logger,
  MaintainersConfig,
  Resolution,
  Segment,
  TrackerClient,
  TrackerKind,
  UpdateResult
} from "./types";

export type ChangesetOptions = {
  repoPath: string;
  excludePatterns: string[];
  git?: GitRunner;
};

export type TrackerFactory = (kind: TrackerKind) => TrackerClient;

export function findSegments(
  config: MaintainersConfig,
  opts: ChangesetOptions,
  revision: string | undefined,
  logger: Logger
): Resolution {
  const changed = getFilePatches(revision, path.resolve(opts.repoPath), opts.git);
  const patches = applyExcludes(changed, opts.excludePatterns);
  logger.info(`Changed files: ${changed.length} (after excludes: ${patches.length})`);
  return resolveSegments(config, patches, logger);
}

/** Segments in priority order; with paths, only those whose file rules claim one of them. */
export function runList(config: MaintainersConfig, paths: string[], logger: Logger): Segment[] {
  const matcher = new Matcher(logger);
  const segments = sortByPriority(config.segments).filter(
    s => !paths.length || paths.some(p => matcher.isFileNameMatch(s, p))
  );
  for (const s of segments) logger.info(formatSegment(s));
  return segments;
}

export function runSubmit(
  config: MaintainersConfig,
  opts: ChangesetOptions,
  revision: string | undefined,
  logger: Logger
): string[] {
  const segments = assertResolved(findSegments(config, opts, revision, logger));
  const repositories = distinctRepositories(segments);

  if (!repositories.length) {
    logger.info(`Your patch concerns ${segments.map(s => s.name).join(", ")}, but no repository is defined for them.`);
    return repositories;
  }
  logger.info(
    [
      "Please submit your patch to one of the following repositories:",
      "",
      ...repositories.map(r => ` - ${r}`),
      ""
    ].join("\n")
  );
  return repositories;
}

export async function runUpdatePullRequest(
  config: MaintainersConfig,
  opts: ChangesetOptions,
  params: { revision: string; pullRequestUrl: string; closeIfUnowned: boolean; createTracker: TrackerFactory },
  logger: Logger
): Promise<UpdateResult> {
  const kind = trackerKindFromUrl(params.pullRequestUrl);
  const segments = assertResolved(findSegments(config, opts, params.revision, logger));
  logger.info(`Matching segments: ${segments.map(s => s.name).join(", ")}`);

  const result = await updatePullRequest({
    client: params.createTracker(kind),
    pullRequestUrl: params.pullRequestUrl,
    segments,
    closeIfUnowned: params.closeIfUnowned
  });

  if (result.action === "assigned") {
    logger.info(
      `Updated ${result.pullRequest.url}: assignees=${result.assignees.join(", ")}` +
        (result.labels.length ? ` labels=${result.labels.join(", ")}` : "")
    );
  } else {
    logger.warn(`Closed ${result.pullRequest.url}; it should be submitted to ${result.repository}`);
  }
  return result;
}
