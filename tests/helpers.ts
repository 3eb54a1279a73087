import type { FilePatch, Logger, Segment } from "../src/types";

export function segment(name: string, overrides: Partial<Segment> = {}): Segment {
  return {
    name,
    repository: "",
    chiefs: [`${name}-chief`],
    reviewers: [],
    filePatterns: [],
    fileExcludePatterns: [],
    contentPatterns: [],
    contentExcludePatterns: [],
    priority: 0,
    topics: [],
    chat: "",
    mailList: "",
    issueTracker: "",
    ...overrides
  };
}

export function modified(path: string, ...added: string[]): FilePatch {
  return {
    oldPath: path,
    newPath: path,
    chunks: [
      { type: "equal", content: "unchanged\n" },
      ...added.map(line => ({ type: "added" as const, content: line + "\n" }))
    ]
  };
}

export function deleted(path: string, content = ""): FilePatch {
  return { oldPath: path, newPath: null, chunks: content ? [{ type: "deleted", content }] : [] };
}

export type RecordingLogger = Logger & { lines: { level: keyof Logger; msg: string }[] };

export function recordingLogger(): RecordingLogger {
  const lines: RecordingLogger["lines"] = [];
  return {
    lines,
    info: (msg) => lines.push({ level: "info", msg }),
    warn: (msg) => lines.push({ level: "warn", msg }),
    error: (msg) => lines.push({ level: "error", msg })
  };
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected the call to throw");
}
