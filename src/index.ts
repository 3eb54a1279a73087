import * as core from "@actions/core";
import { findSegments } from "./app";
import { errorMessage } from "./errors";
import { parseBool, readMultiline } from "./excludes";
import { createTokenTracker } from "./github";
import { loadMaintainers } from "./maintainers";
import { assertResolved, distinctRepositories, unionChiefs, unionTopics } from "./resolve";
import { trackerKindFromUrl, updatePullRequest } from "./tracker";
import type { Logger } from "./types";

const logger: Logger = {
  info: (m) => core.info(m),
  warn: (m) => core.warning(m),
  error: (m) => core.error(m)
};

async function run() {
  try {
    const maintainersFile = core.getInput("maintainers_file") || ".maintainers.ini";
    const revision = core.getInput("revision", { required: true });
    const pullRequestUrl = core.getInput("pull_request_url");
    const closeIfUnowned = parseBool(core.getInput("close_if_unowned"));
    const excludePatterns = readMultiline(core.getInput("exclude_patterns"));
    const opts = { repoPath: core.getInput("repo_path") || ".", excludePatterns };

    const kind = pullRequestUrl ? trackerKindFromUrl(pullRequestUrl) : null;

    const config = loadMaintainers(maintainersFile, logger);
    const segments = assertResolved(findSegments(config, opts, revision, logger));

    core.setOutput("segments_json", JSON.stringify(segments.map(s => s.name)));
    core.setOutput("repositories_json", JSON.stringify(distinctRepositories(segments)));
    core.setOutput("chiefs", unionChiefs(segments).join(","));
    core.setOutput("topics", unionTopics(segments).join(","));

    if (!kind) {
      core.info("pull_request_url not set; not updating the pull request.");
      return;
    }

    const token = core.getInput("github_token") || process.env.GITHUB_TOKEN || process.env.GH_TOKEN || "";
    const result = await updatePullRequest({
      client: createTokenTracker(kind, token),
      pullRequestUrl,
      segments,
      closeIfUnowned
    });
    core.setOutput("action", result.action);
    core.info(`Pull request ${result.action}; repository=${result.repository}`);
  } catch (e) {
    core.setFailed(errorMessage(e));
  }
}

void run();
