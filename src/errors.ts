export type ErrorKind =
  | "unexpected"
  | "usage"
  | "config"
  | "resolution"
  | "nothing-to-submit"
  | "no-owner"
  | "no-segments"
  | "no-chiefs"
  | "invalid-pull-request-url"
  | "unsupported-tracker"
  | "no-repository"
  | "tracker";

const EXIT_CODES: Record<ErrorKind, number> = {
  unexpected: 1,
  config: 2,
  resolution: 3,
  "nothing-to-submit": 4,
  "no-owner": 5,
  "no-segments": 5,
  "no-chiefs": 6,
  "invalid-pull-request-url": 7,
  "unsupported-tracker": 8,
  "no-repository": 9,
  tracker: 10,
  usage: 64
};

export class RoutingError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RoutingError";
    this.kind = kind;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function exitCodeFor(e: unknown): number {
  return e instanceof RoutingError ? EXIT_CODES[e.kind] : EXIT_CODES.unexpected;
}
