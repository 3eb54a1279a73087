import fs from "node:fs";
import { z } from "zod";
import { errorMessage, RoutingError } from "./errors";
import type { Logger, MaintainersConfig, Segment } from "./types";

type Section = { name: string; line: number; values: Record<string, string> };

export function splitList(value: string): string[] {
  return value
    .split(",")
    .map(s => s.trim())
    .filter(Boolean);
}

const list = z.string().default("").transform(splitList);
const text = z.string().default("");

const sectionSchema = z.object({
  repository: text,
  chat: text,
  mailList: text,
  issueTracker: text,
  chiefs: list.pipe(z.array(z.string()).min(1, "missing 'Chiefs' property")),
  reviewers: list,
  filePatterns: list,
  fileExcludePatterns: list,
  contentPatterns: list,
  contentExcludePatterns: list,
  priority: z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, "'Priority' must be an integer")
    .default("0")
    .transform(Number),
  topics: list
});

type SegmentKey = keyof z.input<typeof sectionSchema>;

const KEYS: Record<string, SegmentKey> = {
  repository: "repository",
  chat: "chat",
  maillist: "mailList",
  issuetracker: "issueTracker",
  chiefs: "chiefs",
  reviewers: "reviewers",
  filepatterns: "filePatterns",
  fileexcludepatterns: "fileExcludePatterns",
  contentpatterns: "contentPatterns",
  contentexcludepatterns: "contentExcludePatterns",
  priority: "priority",
  topics: "topics"
};

function unquote(v: string) {
  return v.length >= 2 && v.startsWith('"') && v.endsWith('"') ? v.slice(1, -1) : v;
}

/**
 * Splits a maintainers file into its sections. Keys before the first section
 * header belong to the default section and are dropped.
 */
export function parseSections(source: string): Section[] {
  const sections: Section[] = [];
  const names = new Set<string>();
  let current: Section | undefined;

  source.split(/\r?\n/).forEach((raw, idx) => {
    const line = raw.trim();
    const lineNo = idx + 1;
    if (!line || line.startsWith("#") || line.startsWith(";")) return;

    if (line.startsWith("[")) {
      if (!line.endsWith("]")) throw new RoutingError("config", `Malformed section header on line ${lineNo}: ${line}`);
      const name = line.slice(1, -1).trim();
      if (!name) throw new RoutingError("config", `Empty section name on line ${lineNo}`);
      if (names.has(name)) throw new RoutingError("config", `Duplicate config section '${name}' on line ${lineNo}`);
      names.add(name);
      current = { name, line: lineNo, values: {} };
      sections.push(current);
      return;
    }

    const eq = line.indexOf("=");
    if (eq <= 0) throw new RoutingError("config", `Malformed line ${lineNo}: expected 'key = value'`);
    if (!current) return;
    current.values[line.slice(0, eq).trim()] = unquote(line.slice(eq + 1).trim());
  });

  return sections;
}

export function toSegment(section: Section, logger?: Logger): Segment {
  const input: Partial<Record<SegmentKey, string>> = {};
  for (const [key, value] of Object.entries(section.values)) {
    const field = KEYS[key.toLowerCase().replace(/[-_ ]/g, "")];
    if (!field) {
      logger?.warn(`Ignoring unknown key '${key}' in config section '${section.name}'`);
      continue;
    }
    input[field] = value;
  }

  const parsed = sectionSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => i.message).join("; ");
    throw new RoutingError("config", `Invalid config section '${section.name}': ${issues}`);
  }
  return { name: section.name, ...parsed.data };
}

export function parseMaintainers(source: string, logger?: Logger): MaintainersConfig {
  const segments = parseSections(source).map(s => toSegment(s, logger));
  if (!segments.length) logger?.warn("Warning! No project segments defined.");
  return { segments };
}

export function loadMaintainers(filePath: string, logger?: Logger): MaintainersConfig {
  let source: string;
  try {
    source = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw new RoutingError("config", `Failed to initialize maintainers: ${errorMessage(e)}`, { cause: e });
  }
  return parseMaintainers(source, logger);
}

export function formatSegment(s: Segment): string {
  const lines = [`[${s.name}]`, ` Chiefs: ${s.chiefs.join(", ")}`, ` Priority: ${s.priority}`];
  const optional: Array<[string, string]> = [
    ["Topics", s.topics.join(", ")],
    ["Reviewers", s.reviewers.join(", ")],
    ["Repository", s.repository],
    ["Issue tracker", s.issueTracker],
    ["Mailing list", s.mailList],
    ["Chat", s.chat],
    ["File patterns", s.filePatterns.join(", ")],
    ["Content patterns", s.contentPatterns.join(", ")],
    ["File exclude patterns", s.fileExcludePatterns.join(", ")],
    ["Content exclude patterns", s.contentExcludePatterns.join(", ")]
  ];
  for (const [label, value] of optional) if (value) lines.push(` ${label}: ${value}`);
  return lines.join("\n") + "\n";
}
