export type Owner = string;

export type Segment = {
  name: string;
  // where patches for this segment should be submitted; empty for advisory segments
  repository: string;
  chiefs: Owner[];
  reviewers: Owner[];
  filePatterns: string[];
  fileExcludePatterns: string[];
  contentPatterns: string[];
  contentExcludePatterns: string[];
  priority: number;
  topics: string[];
  chat: string;
  mailList: string;
  issueTracker: string;
};

export type MaintainersConfig = {
  segments: Segment[];
};

export type ChunkType = "equal" | "added" | "deleted";

export type DiffChunk = {
  type: ChunkType;
  content: string;
};

export type FilePatch = {
  oldPath: string | null; // null for created files
  newPath: string | null; // null for deleted files
  chunks: DiffChunk[];
};

export type ResolvedSet = Map<string, Segment>;

export type Resolution = {
  segments: ResolvedSet;
  paths: string[];
};

export type TrackerKind = { kind: "github"; host: string };

export type PullRequestRef = {
  host: string;
  owner: string;
  repo: string;
  number: number;
  url: string;
};

export type PullRequestState = "open" | "closed";

export interface TrackerClient {
  addLabels(pr: PullRequestRef, labels: string[]): Promise<void>;
  addAssignees(pr: PullRequestRef, assignees: Owner[]): Promise<void>;
  createComment(pr: PullRequestRef, body: string): Promise<void>;
  setState(pr: PullRequestRef, state: PullRequestState): Promise<void>;
}

export type UpdateResult = {
  action: "assigned" | "closed";
  pullRequest: PullRequestRef;
  repository: string;
  labels: string[];
  assignees: Owner[];
};

export type Logger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};
