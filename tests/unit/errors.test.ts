import { describe, it, expect } from "vitest";
import { errorMessage, exitCodeFor, RoutingError } from "../../src/errors";

describe("exitCodeFor", () => {
  it("gives each failure class its own exit code", () => {
    expect(exitCodeFor(new RoutingError("config", "bad"))).toBe(2);
    expect(exitCodeFor(new RoutingError("resolution", "bad"))).toBe(3);
    expect(exitCodeFor(new RoutingError("nothing-to-submit", "bad"))).toBe(4);
    expect(exitCodeFor(new RoutingError("no-owner", "bad"))).toBe(5);
    expect(exitCodeFor(new RoutingError("invalid-pull-request-url", "bad"))).toBe(7);
    expect(exitCodeFor(new RoutingError("no-repository", "bad"))).toBe(9);
    expect(exitCodeFor(new RoutingError("tracker", "bad"))).toBe(10);
    expect(exitCodeFor(new RoutingError("usage", "bad"))).toBe(64);
  });

  it("treats anything else as unexpected", () => {
    expect(exitCodeFor(new Error("boom"))).toBe(1);
    expect(exitCodeFor("boom")).toBe(1);
  });
});

describe("RoutingError", () => {
  it("keeps the cause", () => {
    const cause = new Error("ENOENT");
    const e = new RoutingError("config", "Failed to initialize maintainers: ENOENT", { cause });
    expect(e.cause).toBe(cause);
    expect(e.name).toBe("RoutingError");
    expect(errorMessage(e)).toBe("Failed to initialize maintainers: ENOENT");
    expect(errorMessage(42)).toBe("42");
  });
});
