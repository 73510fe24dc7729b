import { describe, it, expect } from "vitest";

import {
  ConfigError,
  PermanentError,
  PublishError,
  RetryExhaustedError,
  SourceUnavailableError,
  StructuralParseError,
  TransientError,
  errorMessage,
  exitCodeFor,
} from "../../src/errors.js";

describe("errors", () => {
  it("should map each fatal error class to its exit status", () => {
    expect(exitCodeFor(new SourceUnavailableError("offline"))).toBe(1);
    expect(exitCodeFor(new PermanentError("gone", 404))).toBe(1);
    expect(exitCodeFor(new ConfigError("bad"))).toBe(1);
    expect(exitCodeFor(new RetryExhaustedError("page 1/2", 5, new Error("timeout")))).toBe(2);
    expect(exitCodeFor(new PublishError("disk full"))).toBe(3);
    expect(exitCodeFor(new StructuralParseError("epss", "no rows"))).toBe(4);
  });

  it("should map unknown errors to 1", () => {
    expect(exitCodeFor(new Error("boom"))).toBe(1);
    expect(exitCodeFor("boom")).toBe(1);
  });

  it("should name the operation and the last cause after exhausted retries", () => {
    const error = new RetryExhaustedError("page 3/9", 5, new TransientError("HTTP 503"));
    expect(error.message).toBe("page 3/9 failed after 5 attempts: HTTP 503");
    expect(error.name).toBe("RetryExhaustedError");
    expect(error.details).toEqual({ operation: "page 3/9", attempts: 5 });
  });

  it("should keep the HTTP status on fetch errors", () => {
    expect(new TransientError("HTTP 500", { status: 500 }).status).toBe(500);
    expect(new PermanentError("HTTP 410", 410).details).toEqual({ status: 410 });
  });

  it("should render messages of any thrown value", () => {
    expect(errorMessage(new Error("a"))).toBe("a");
    expect(errorMessage(42)).toBe("42");
  });
});
