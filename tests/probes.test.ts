import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ProbeSchedule, parseProbeFile, loadProbeFile } from "../src/runtime/probes.js";
import { isMonologueError } from "../src/errors.js";

describe("ProbeSchedule", () => {
  it("fires each index once", () => {
    const s = new ProbeSchedule([{ at: 3, text: "three" }, { at: 5, text: "five" }]);
    assert.equal(s.take(1), null);
    assert.equal(s.take(3), "three");
    assert.equal(s.take(3), null);
    assert.equal(s.take(5), "five");
    assert.deepEqual(s.firedIndices(), [3, 5]);
  });

  it("fresh copies keep the probes and forget what fired", () => {
    const s = new ProbeSchedule([{ at: 2, text: "two" }]);
    s.take(2);
    const f = s.fresh();
    assert.deepEqual(f.firedIndices(), []);
    assert.equal(f.take(2), "two");
  });
});

describe("parseProbeFile", () => {
  it("reads probe definitions", () => {
    assert.deepEqual(parseProbeFile({ probes: [{ at: 20, text: "How are you?" }] }), [
      { at: 20, text: "How are you?" },
    ]);
  });

  it("rejects malformed files", () => {
    assert.throws(() => parseProbeFile({}), (e: unknown) => isMonologueError(e) && e.kind === "config_error");
    assert.throws(() => parseProbeFile({ probes: [{ at: 0, text: "x" }] }));
    assert.throws(() => parseProbeFile({ probes: [{ at: 1 }] }));
    assert.throws(() => parseProbeFile({ probes: [{ at: 1.5, text: "x" }] }));
  });

  it("loads from disk", () => {
    const dir = mkdtempSync(join(tmpdir(), "monologue-probes-"));
    try {
      const file = join(dir, "exp.json");
      writeFileSync(file, JSON.stringify({ probes: [{ at: 4, text: "four" }] }));
      assert.deepEqual(loadProbeFile(file), [{ at: 4, text: "four" }]);
      assert.throws(() => loadProbeFile(join(dir, "missing.json")), /Failed to read experiment file/);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
