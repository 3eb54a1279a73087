import { RoutingError } from "./errors";
import { effectivePath, Matcher } from "./matcher";
import type { FilePatch, Logger, MaintainersConfig, Owner, Resolution, ResolvedSet, Segment } from "./types";

/**
 * Matches every file patch against every configured segment. `paths` lists each
 * effective path of the changeset once, whether or not a segment claimed it.
 */
export function resolveSegments(config: MaintainersConfig, patches: FilePatch[], logger?: Logger): Resolution {
  const matcher = new Matcher(logger);
  const segments: ResolvedSet = new Map();
  const paths = new Set<string>();

  for (const patch of patches) {
    paths.add(effectivePath(patch));
    for (const segment of config.segments) {
      if (segments.has(segment.name)) continue;
      if (matcher.isConcerned(segment, patch)) segments.set(segment.name, segment);
    }
  }

  return { segments, paths: [...paths] };
}

export function assertResolved(resolution: Resolution): Segment[] {
  if (!resolution.paths.length) {
    throw new RoutingError("nothing-to-submit", "No changes found, nothing to submit");
  }
  if (!resolution.segments.size) {
    throw new RoutingError(
      "no-owner",
      `No matching segments found for this patch (${resolution.paths.length} files). Please edit your maintainers file`
    );
  }
  return sortByPriority(resolution.segments.values());
}

// Array.prototype.sort is stable, so equal priorities keep their incoming order.
export function sortByPriority(segments: Iterable<Segment>): Segment[] {
  return [...segments].sort((a, b) => b.priority - a.priority);
}

function appendNew<T>(out: T[], seen: Set<T>, values: Iterable<T>) {
  for (const v of values) {
    if (seen.has(v)) continue;
    seen.add(v);
    out.push(v);
  }
}

function collect<T>(segments: Segment[], pick: (s: Segment) => Iterable<T>): T[] {
  const out: T[] = [];
  const seen = new Set<T>();
  for (const s of sortByPriority(segments)) appendNew(out, seen, pick(s));
  return out;
}

export function distinctRepositories(segments: Segment[]): string[] {
  return collect(segments, s => (s.repository ? [s.repository] : []));
}

export function unionChiefs(segments: Segment[]): Owner[] {
  return collect(segments, s => s.chiefs);
}

export function unionTopics(segments: Segment[]): string[] {
  return collect(segments, s => s.topics);
}
