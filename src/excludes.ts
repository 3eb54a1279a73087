import { minimatch } from "minimatch";
import { effectivePath } from "./matcher";
import type { FilePatch } from "./types";

export function parseBool(v: string) {
  return String(v).toLowerCase() === "true";
}

export function readMultiline(input: string): string[] {
  return (input || "")
    .split("\n")
    .map(s => s.trim())
    .filter(s => s && !s.startsWith("#"));
}

export function isExcluded(file: string, excludePatterns: string[]): boolean {
  return excludePatterns.some(p => minimatch(file, p, { dot: true }));
}

/** Drops patches whose effective path matches one of the exclude globs. */
export function applyExcludes(patches: FilePatch[], excludePatterns: string[]): FilePatch[] {
  if (!excludePatterns.length) return patches;
  return patches.filter(p => !isExcluded(effectivePath(p), excludePatterns));
}
