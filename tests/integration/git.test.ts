import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync, unlinkSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { execFileSync } from "node:child_process";
import { getFilePatches } from "../../src/git";
import { parseMaintainers } from "../../src/maintainers";
import { resolveSegments } from "../../src/resolve";

function createTempRepo(): { dir: string; git: (args: string[]) => string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "segment-owners-git-"));
  const git = (args: string[]) => execFileSync("git", args, { cwd: dir, encoding: "utf8" });

  git(["init"]);
  git(["config", "user.name", "Test"]);
  git(["config", "user.email", "test@test.com"]);
  git(["config", "core.autocrlf", "false"]);
  git(["config", "commit.gpgsign", "false"]);

  return {
    dir,
    git,
    cleanup: () => rmSync(dir, { recursive: true, force: true })
  };
}

function addCommit(dir: string, file: string, content: string | Buffer, msg: string) {
  writeFileSync(join(dir, file), content);
  execFileSync("git", ["add", file], { cwd: dir });
  execFileSync("git", ["commit", "-m", msg], { cwd: dir });
}

describe("getFilePatches against a real repository", () => {
  let dir: string;
  let git: (args: string[]) => string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, git, cleanup } = createTempRepo());
  });

  afterEach(() => cleanup());

  it("reads non-ASCII and prefixed paths the same whatever the user's diff settings", () => {
    addCommit(dir, "base.txt", "one\n", "base");
    git(["config", "diff.mnemonicPrefix", "true"]);
    git(["config", "core.quotePath", "true"]);

    writeFileSync(join(dir, "base.txt"), "two\n");
    writeFileSync(join(dir, "café.md"), "menu\n");
    git(["add", "café.md"]);

    const patches = getFilePatches(undefined, dir);
    expect(patches).toEqual([
      {
        oldPath: "base.txt",
        newPath: "base.txt",
        chunks: [
          { type: "deleted", content: "one\n" },
          { type: "added", content: "two\n" }
        ]
      },
      { oldPath: null, newPath: "café.md", chunks: [{ type: "added", content: "menu\n" }] }
    ]);
  });

  it("lets content rules claim untracked files", () => {
    addCommit(dir, "base.txt", "one\n", "base");
    writeFileSync(join(dir, "new.ts"), "// TODO later\n");

    const patches = getFilePatches(undefined, dir);
    expect(patches).toEqual([{ oldPath: null, newPath: "new.ts", chunks: [{ type: "added", content: "// TODO later\n" }] }]);

    const config = parseMaintainers("[todo]\nChiefs = alice\nContentPatterns = TODO\n");
    const resolution = resolveSegments(config, patches);
    expect([...resolution.segments.keys()]).toEqual(["todo"]);
    expect(resolution.paths).toEqual(["new.ts"]);
  });

  it("keeps the path of a deleted binary file when diff.noprefix is set", () => {
    addCommit(dir, "base.txt", "one\n", "base");
    addCommit(dir, "img.bin", Buffer.from([0, 1, 2, 0, 255]), "add image");
    const before = git(["rev-parse", "HEAD"]).trim();
    unlinkSync(join(dir, "img.bin"));
    git(["commit", "-am", "drop image"]);
    git(["config", "diff.noprefix", "true"]);

    expect(getFilePatches(before, dir)).toEqual([{ oldPath: "img.bin", newPath: null, chunks: [] }]);
  });
});
