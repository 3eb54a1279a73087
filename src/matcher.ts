import { errorMessage, RoutingError } from "./errors";
import type { FilePatch, Logger, Segment } from "./types";

/**
 * Path a patch is judged by: the new path, or the old one when the file was deleted.
 */
export function effectivePath(patch: FilePatch): string {
  const path = patch.newPath ?? patch.oldPath;
  if (path === null) throw new RoutingError("resolution", "File patch has neither an old nor a new path");
  return path;
}

export function patchContent(patch: FilePatch): string {
  return patch.chunks.map(c => c.content).join("");
}

/**
 * Evaluates segment rules against file patches. Compiled expressions are cached
 * per instance; an expression that fails to compile is reported once through the
 * logger and then never matches.
 */
export class Matcher {
  private readonly compiled = new Map<string, RegExp | null>();

  constructor(private readonly logger?: Logger) {}

  isFileNameMatch(segment: Segment, path: string): boolean {
    return this.accepts(segment, segment.filePatterns, segment.fileExcludePatterns, path, "");
  }

  isContentMatch(segment: Segment, content: string): boolean {
    return this.accepts(segment, segment.contentPatterns, segment.contentExcludePatterns, content, "m");
  }

  isConcerned(segment: Segment, patch: FilePatch): boolean {
    if (this.isFileNameMatch(segment, effectivePath(patch))) return true;
    if (!segment.contentPatterns.length) return false;
    return this.isContentMatch(segment, patchContent(patch));
  }

  private accepts(segment: Segment, include: string[], exclude: string[], text: string, flags: string): boolean {
    if (!include.some(p => this.test(segment, p, flags, text))) return false;
    return !exclude.some(p => this.test(segment, p, flags, text));
  }

  private test(segment: Segment, pattern: string, flags: string, text: string): boolean {
    const re = this.compile(segment, pattern, flags);
    return re !== null && re.test(text);
  }

  private compile(segment: Segment, pattern: string, flags: string): RegExp | null {
    const key = `${flags}/${pattern}`;
    const cached = this.compiled.get(key);
    if (cached !== undefined) return cached;

    let re: RegExp | null;
    try {
      re = new RegExp(pattern, flags);
    } catch (e) {
      this.logger?.warn(`Ignoring invalid pattern '${pattern}' in segment '${segment.name}': ${errorMessage(e)}`);
      re = null;
    }
    this.compiled.set(key, re);
    return re;
  }
}
