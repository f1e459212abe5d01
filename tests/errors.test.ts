/**
 * Tests for structured error types (MonologueError).
 *
 * Covers: monologueError, asError, isMonologueError, errorLogFields
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { monologueError, asError, isMonologueError, errorLogFields } from "../src/errors.js";

// ---------------------------------------------------------------------------
// monologueError factory
// ---------------------------------------------------------------------------

describe("monologueError", () => {
  test("creates an Error with kind and retryable fields", () => {
    const e = monologueError("generation_error", "backend failed");
    assert.ok(e instanceof Error);
    assert.strictEqual(e.kind, "generation_error");
    assert.strictEqual(e.message, "backend failed");
    assert.strictEqual(e.retryable, false); // default
    assert.ok(e.stack, "should have a stack trace");
  });

  test("retryable can be set to true", () => {
    const e = monologueError("timeout_error", "slow", { retryable: true });
    assert.strictEqual(e.retryable, true);
  });

  test("optional fields are set when provided", () => {
    const e = monologueError("generation_error", "fail", {
      endpoint: "http://localhost:1234/v1/completions",
      model: "local-model",
      latency_ms: 450,
      cause: new Error("underlying"),
    });
    assert.strictEqual(e.endpoint, "http://localhost:1234/v1/completions");
    assert.strictEqual(e.model, "local-model");
    assert.strictEqual(e.latency_ms, 450);
    assert.ok(e.cause instanceof Error);
  });

  test("optional fields are omitted when not provided", () => {
    const e = monologueError("config_error", "bad config");
    assert.strictEqual(e.endpoint, undefined);
    assert.strictEqual(e.model, undefined);
    assert.strictEqual(e.latency_ms, undefined);
    assert.strictEqual(e.cause, undefined);
  });

  test("latency_ms of 0 is preserved (not treated as falsy)", () => {
    const e = monologueError("generation_error", "fast fail", { latency_ms: 0 });
    assert.strictEqual(e.latency_ms, 0);
  });
});

// ---------------------------------------------------------------------------
// asError
// ---------------------------------------------------------------------------

describe("asError", () => {
  test("returns Error instances unchanged", () => {
    const original = new Error("original");
    assert.strictEqual(asError(original), original);
  });

  test("wraps strings into Error", () => {
    const result = asError("something broke");
    assert.ok(result instanceof Error);
    assert.strictEqual(result.message, "something broke");
  });

  test("handles null and undefined", () => {
    assert.strictEqual(asError(null).message, "Unknown error");
    assert.strictEqual(asError(undefined).message, "Unknown error");
  });

  test("handles numbers and objects via String()", () => {
    assert.strictEqual(asError(42).message, "42");
    assert.strictEqual(asError({ code: 42 }).message, "[object Object]");
  });
});

// ---------------------------------------------------------------------------
// isMonologueError
// ---------------------------------------------------------------------------

describe("isMonologueError", () => {
  test("returns true for monologueError instances", () => {
    assert.strictEqual(isMonologueError(monologueError("tool_error", "x")), true);
  });

  test("returns false for plain Error", () => {
    assert.strictEqual(isMonologueError(new Error("nope")), false);
  });

  test("returns false for non-Error objects", () => {
    assert.strictEqual(isMonologueError({ kind: "tool_error", retryable: true }), false);
  });

  test("returns false for null, undefined and strings", () => {
    assert.strictEqual(isMonologueError(null), false);
    assert.strictEqual(isMonologueError(undefined), false);
    assert.strictEqual(isMonologueError("error"), false);
  });

  test("returns true for Error augmented with kind and retryable", () => {
    const e = Object.assign(new Error("manual"), { kind: "tool_error", retryable: false });
    assert.strictEqual(isMonologueError(e), true);
  });
});

// ---------------------------------------------------------------------------
// errorLogFields
// ---------------------------------------------------------------------------

describe("errorLogFields", () => {
  test("returns basic fields for a minimal error", () => {
    const fields = errorLogFields(monologueError("config_error", "bad"));
    assert.strictEqual(fields.kind, "config_error");
    assert.strictEqual(fields.message, "bad");
    assert.strictEqual(fields.retryable, false);
    assert.ok(fields.stack, "should include stack");
  });

  test("includes optional fields when present", () => {
    const fields = errorLogFields(monologueError("generation_error", "fail", {
      endpoint: "http://localhost:1234",
      model: "m",
      latency_ms: 100,
    }));
    assert.strictEqual(fields.endpoint, "http://localhost:1234");
    assert.strictEqual(fields.model, "m");
    assert.strictEqual(fields.latency_ms, 100);
  });

  test("resolves cause into cause_message and cause_stack", () => {
    const fields = errorLogFields(monologueError("search_error", "search failed", { cause: new Error("root cause") }));
    assert.strictEqual(fields.cause_message, "root cause");
    assert.ok(fields.cause_stack);
  });

  test("resolves non-Error cause via asError", () => {
    const fields = errorLogFields(monologueError("generation_error", "fail", { cause: "string cause" }));
    assert.strictEqual(fields.cause_message, "string cause");
  });

  test("result is JSON-serializable", () => {
    const fields = errorLogFields(monologueError("session_error", "test", { cause: new Error("inner") }));
    const parsed: unknown = JSON.parse(JSON.stringify(fields));
    assert.deepStrictEqual(typeof parsed === "object" && parsed !== null && "kind" in parsed ? parsed.kind : null, "session_error");
  });
});
