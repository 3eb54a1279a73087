import { execFileSync } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { errorMessage, RoutingError } from "./errors";
import type { ChunkType, DiffChunk, FilePatch } from "./types";

export type GitRunner = (args: readonly string[], cwd: string) => string;
export type FileReader = (file: string) => string;

// large generated files can produce big diffs
const MAX_BUFFER = 64 * 1024 * 1024;

export const runGit: GitRunner = (args, cwd) =>
  execFileSync("git", args, { encoding: "utf8", cwd, maxBuffer: MAX_BUFFER, stdio: ["ignore", "pipe", "pipe"] });

function sh(run: GitRunner, args: readonly string[], cwd: string, what: string): string {
  try {
    return run(args, cwd);
  } catch (e) {
    throw new RoutingError("resolution", `${what}: ${errorMessage(e).trim()}`, { cause: e });
  }
}

function tryRevParse(run: GitRunner, ref: string, cwd: string): string | undefined {
  try {
    const out = run(["rev-parse", "--verify", "--quiet", `${ref}^{commit}`], cwd).trim();
    return out || undefined;
  } catch {
    return undefined;
  }
}

/**
 * Resolves a revision to a commit hash. Hash prefixes found in the history of
 * HEAD win over names; then the revision itself, a local branch and a
 * remote-tracking branch are tried in that order.
 */
export function resolveRevision(revision: string, cwd: string, run: GitRunner = runGit): string {
  const history = sh(run, ["rev-list", "HEAD"], cwd, "Failed to get history of HEAD");
  if (/^[0-9a-f]+$/i.test(revision)) {
    const prefix = revision.toLowerCase();
    const hit = history.split("\n").find(h => h.trim().startsWith(prefix));
    if (hit) return hit.trim();
  }

  for (const ref of [revision, `refs/heads/${revision}`, `refs/remotes/${revision}`]) {
    const hash = tryRevParse(run, ref, cwd);
    if (hash) return hash;
  }
  throw new RoutingError("resolution", `Failed to resolve revision '${revision}'`);
}

// Path output must not depend on the user's quotePath, mnemonicPrefix or noprefix settings.
const DIFF_ARGS = [
  "-c",
  "core.quotePath=false",
  "diff",
  "--no-color",
  "--no-ext-diff",
  "--no-renames",
  "--src-prefix=a/",
  "--dst-prefix=b/"
];
const UNTRACKED_ARGS = ["ls-files", "-z", "--others", "--exclude-standard"];

const readUtf8: FileReader = file => fs.readFileSync(file, "utf8");

/**
 * File patches from `revision` to HEAD, or, without a revision, the
 * uncommitted changes (staged, unstaged and untracked) against HEAD.
 * Untracked files carry their whole content as one added chunk.
 */
export function getFilePatches(
  revision: string | undefined,
  cwd: string,
  run: GitRunner = runGit,
  read: FileReader = readUtf8
): FilePatch[] {
  sh(run, ["rev-parse", "--verify", "HEAD"], cwd, "Failed to get HEAD of repository");

  if (revision) {
    const commit = resolveRevision(revision, cwd, run);
    return parseDiff(sh(run, [...DIFF_ARGS, commit, "HEAD"], cwd, "Failed to create patch"));
  }

  const patches = parseDiff(sh(run, [...DIFF_ARGS, "HEAD"], cwd, "Failed to create patch"));
  const untracked = sh(run, UNTRACKED_ARGS, cwd, "Failed to list untracked files");
  const known = new Set(patches.map(p => p.newPath));
  for (const file of untracked.split("\0").filter(Boolean)) {
    if (known.has(file)) continue;
    let content: string;
    try {
      content = read(path.join(cwd, file));
    } catch (e) {
      throw new RoutingError("resolution", `Failed to read untracked file '${file}': ${errorMessage(e)}`, { cause: e });
    }
    patches.push({ oldPath: null, newPath: file, chunks: content ? [{ type: "added", content }] : [] });
  }
  return patches;
}

const ESCAPES: Record<string, string> = { a: "\x07", b: "\b", t: "\t", n: "\n", v: "\v", f: "\f", r: "\r" };

// git C-quotes paths with special characters; octal escapes are UTF-8 bytes.
export function unquotePath(p: string): string {
  if (p.length < 2 || !p.startsWith('"') || !p.endsWith('"')) return p;
  const bytes: number[] = [];
  const body = p.slice(1, -1);
  for (let i = 0; i < body.length; i++) {
    const c = body[i];
    if (c !== "\\") {
      bytes.push(...Buffer.from(c, "utf8"));
      continue;
    }
    const next = body[++i] ?? "";
    const octal = /^[0-7]{3}/.exec(body.slice(i, i + 3));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += 2;
    } else {
      bytes.push(...Buffer.from(ESCAPES[next] ?? next, "utf8"));
    }
  }
  return Buffer.from(bytes).toString("utf8");
}

// "--- a/foo" -> "foo", "--- /dev/null" -> null
function headerPath(rest: string): string | null {
  const p = unquotePath(rest.replace(/\t.*$/, "").trim());
  if (p === "/dev/null") return null;
  return p.replace(/^[ab]\//, "");
}

// "diff --git a/x b/x"; without renames both sides name the same file
function gitHeaderPaths(line: string): { oldPath: string; newPath: string } | null {
  const rest = line.slice("diff --git ".length);
  let a: string;
  let b: string;
  const quoted = /^("(?:[^"\\]|\\.)*") ("(?:[^"\\]|\\.)*")$/.exec(rest);
  if (quoted) {
    a = unquotePath(quoted[1]);
    b = unquotePath(quoted[2]);
  } else {
    const half = (rest.length - 1) / 2;
    if (rest.charAt(half) !== " ") return null;
    a = rest.slice(0, half);
    b = rest.slice(half + 1);
  }
  if (!a.startsWith("a/") || !b.startsWith("b/")) return null;
  return { oldPath: a.slice(2), newPath: b.slice(2) };
}

const LINE_TYPES: Record<string, ChunkType> = { " ": "equal", "+": "added", "-": "deleted" };

/**
 * Parses unified `git diff` output. Hunk lines are grouped into chunks of
 * consecutive lines of the same type; each chunk keeps its trailing newlines.
 */
export function parseDiff(diff: string): FilePatch[] {
  const patches: FilePatch[] = [];
  const headers: string[] = [];
  let current: FilePatch | undefined;
  let inHunk = false;

  const pushLine = (type: ChunkType, text: string) => {
    if (!current) return;
    const last: DiffChunk | undefined = current.chunks[current.chunks.length - 1];
    if (last && last.type === type) last.content += text + "\n";
    else current.chunks.push({ type, content: text + "\n" });
  };

  for (const line of diff.split("\n")) {
    if (line.startsWith("diff --git ")) {
      const paths = gitHeaderPaths(line);
      current = { oldPath: paths?.oldPath ?? null, newPath: paths?.newPath ?? null, chunks: [] };
      patches.push(current);
      headers.push(line);
      inHunk = false;
      continue;
    }
    if (!current) continue;

    if (line.startsWith("@@")) {
      inHunk = true;
      continue;
    }
    if (inHunk) {
      const type = LINE_TYPES[line.charAt(0)];
      if (type) {
        pushLine(type, line.slice(1));
        continue;
      }
      if (line.startsWith("\\")) continue; // "\ No newline at end of file"
      inHunk = false;
    }

    if (line.startsWith("--- ")) current.oldPath = headerPath(line.slice(4));
    else if (line.startsWith("+++ ")) current.newPath = headerPath(line.slice(4));
    else if (line.startsWith("new file mode")) current.oldPath = null;
    else if (line.startsWith("deleted file mode")) current.newPath = null;
  }

  patches.forEach((p, i) => {
    if (p.oldPath === null && p.newPath === null) {
      throw new RoutingError("resolution", `Cannot read the file path from diff header '${headers[i]}'`);
    }
  });
  return patches;
}
