#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { runList, runSubmit, runUpdatePullRequest } from "./app";
import type { TrackerFactory } from "./app";
import { errorMessage, exitCodeFor, RoutingError } from "./errors";
import { readMultiline } from "./excludes";
import { assertGhAuthenticated, createGhCliTracker } from "./ghcli";
import { createTokenTracker } from "./github";
import { loadMaintainers } from "./maintainers";
import type { Logger } from "./types";

function printHelp() {
  process.stdout.write(
    [
      "segment-owners - route patches to the maintainers of the project segments they touch",
      "",
      "Usage:",
      "  segment-owners [options] list [PATH...]",
      "  segment-owners [options] submit [REVISION]",
      "  segment-owners [options] update-pull-request REVISION PULL_REQUEST_URL [API_KEY]",
      "",
      "Options:",
      "  -m, --maintainers-file <path> Maintainers configuration file (default: .maintainers.ini)",
      "  --repo-path <path>            Repository to diff (default: .)",
      "  --exclude <file|->            File with newline-separated globs to leave out, or '-' to read stdin",
      "  --close-if-unowned            update-pull-request: comment and close PRs sent to the wrong repository",
      "  -h, --help                    Show this help",
      "",
      "Without REVISION, submit looks at the uncommitted changes of the working tree.",
      "update-pull-request uses API_KEY, GITHUB_TOKEN or GH_TOKEN when set, and the `gh` CLI otherwise.",
      ""
    ].join("\n")
  );
}

function takeArg(argv: string[], i: number, name: string): string {
  const v = argv[i + 1];
  if (!v) throw new RoutingError("usage", `Missing value for ${name}`);
  return v;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const c of process.stdin) chunks.push(Buffer.from(c));
  return Buffer.concat(chunks).toString("utf8");
}

function trackerFactory(token: string, cwd: string): TrackerFactory {
  return kind => {
    if (token) return createTokenTracker(kind, token);
    switch (kind.kind) {
      case "github":
        assertGhAuthenticated(cwd);
        return createGhCliTracker(cwd);
    }
  };
}

async function main() {
  const argv = process.argv.slice(2);
  if (!argv.length || argv.includes("-h") || argv.includes("--help")) {
    printHelp();
    return;
  }

  const logger: Logger = {
    info: (m) => process.stdout.write(m + "\n"),
    warn: (m) => process.stderr.write(m + "\n"),
    error: (m) => process.stderr.write(m + "\n")
  };

  let maintainersFile = ".maintainers.ini";
  let repoPath = ".";
  let excludePatterns: string[] = [];
  let closeIfUnowned = false;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "-m" || a === "--maintainers-file") maintainersFile = takeArg(argv, i++, a);
    else if (a === "--repo-path") repoPath = takeArg(argv, i++, a);
    else if (a === "--exclude") {
      const v = takeArg(argv, i++, a);
      const raw = v === "-" ? await readStdin() : readFileSync(v, "utf8");
      excludePatterns = readMultiline(raw);
    } else if (a === "--close-if-unowned") closeIfUnowned = true;
    else if (a.startsWith("-")) throw new RoutingError("usage", `Unknown arg: ${a}`);
    else positional.push(a);
  }

  const [command, ...args] = positional;
  const config = loadMaintainers(maintainersFile, logger);
  const opts = { repoPath, excludePatterns };

  switch (command) {
    case "list":
      runList(config, args, logger);
      return;
    case "submit":
      if (args.length > 1) throw new RoutingError("usage", "submit takes at most one REVISION");
      runSubmit(config, opts, args[0], logger);
      return;
    case "update-pull-request": {
      const [revision, pullRequestUrl, apiKey] = args;
      if (!revision || !pullRequestUrl) {
        throw new RoutingError("usage", "update-pull-request needs REVISION and PULL_REQUEST_URL");
      }
      const token = apiKey || process.env.GITHUB_TOKEN || process.env.GH_TOKEN || "";
      await runUpdatePullRequest(
        config,
        opts,
        { revision, pullRequestUrl, closeIfUnowned, createTracker: trackerFactory(token, repoPath) },
        logger
      );
      return;
    }
    default:
      throw new RoutingError("usage", command ? `Unknown command: ${command}` : "Missing command");
  }
}

main().catch((e) => {
  process.stderr.write(errorMessage(e) + "\n");
  process.exitCode = exitCodeFor(e);
});
