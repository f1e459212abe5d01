import { describe, it, beforeEach, afterEach, before, after } from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Logger } from "../src/logger.js";
import { SessionStore, SeedStore, revivalText, modelTag, sessionName } from "../src/session.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "monologue-session-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("revival text and naming", () => {
  it("trims the buffer end and appends the reminder after a blank line", () => {
    assert.equal(revivalText("thoughts  \n\n", "REMINDER"), "thoughts\n\nREMINDER");
  });

  it("makes the model name filesystem-safe", () => {
    assert.equal(modelTag("org/model name\\v2"), "org_model_name_v2");
    assert.equal(modelTag(null), "unknown");
    assert.equal(modelTag("m".repeat(60) + "END"), "m".repeat(47) + "END");
  });

  it("builds session names", () => {
    assert.equal(sessionName("20260101_120000", "qwen/qwen3-8b", 42), "20260101_120000_qwen_qwen3-8b_n42");
  });
});

describe("SessionStore", () => {
  before(() => Logger.redirect(() => {}));
  after(() => Logger.redirect(null));

  it("saves and reads back verbatim", () => {
    const store = new SessionStore(join(dir, "sessions"));
    const path = store.save("20260101_000000_m_n3", "buffer\n\nREMINDER");
    assert.equal(path, join(dir, "sessions", "20260101_000000_m_n3.txt"));
    assert.equal(readFileSync(path, "utf-8"), "buffer\n\nREMINDER");
    assert.equal(store.read("20260101_000000_m_n3"), "buffer\n\nREMINDER");
    assert.equal(store.read("nope"), null);
  });

  it("lists newest first", () => {
    const store = new SessionStore(dir);
    store.save("20260101_000000_m_n1", "a");
    store.save("20260301_000000_m_n1", "b");
    store.save("20260201_000000_m_n1", "c");
    writeFileSync(join(dir, "notes.md"), "ignored");
    assert.deepEqual(store.list(), ["20260301_000000_m_n1", "20260201_000000_m_n1", "20260101_000000_m_n1"]);
  });

  it("lists nothing for a missing directory", () => {
    assert.deepEqual(new SessionStore(join(dir, "absent")).list(), []);
  });

  it("previews the first 300 characters", () => {
    const store = new SessionStore(dir);
    store.save("s", "x".repeat(1200));
    assert.equal(store.preview("s"), `[1,200 chars]\n\n${"x".repeat(300)}...`);
    assert.equal(store.preview("missing"), "");
  });

  it("removes sessions", () => {
    const store = new SessionStore(dir);
    store.save("s", "text");
    assert.equal(store.remove("s"), true);
    assert.equal(store.remove("s"), false);
    assert.equal(existsSync(join(dir, "s.txt")), false);
  });

  it("rejects names that leave the directory", () => {
    const store = new SessionStore(dir);
    assert.throws(() => store.save("../escape", "x"), /Invalid name/);
    assert.throws(() => store.read(".hidden"), /Invalid name/);
    assert.throws(() => store.read("  "), /Invalid name/);
  });
});

describe("SeedStore", () => {
  before(() => Logger.redirect(() => {}));
  after(() => Logger.redirect(null));

  it("saves, lists and loads seeds", () => {
    const store = new SeedStore(join(dir, "seeds"));
    const path = store.save("curious", "I wonder about the sea.");
    assert.deepEqual(JSON.parse(readFileSync(path, "utf-8")), { name: "curious", seed: "I wonder about the sea." });
    store.save("alpha", "A");
    assert.deepEqual(store.list(), ["alpha", "curious"]);
    assert.equal(store.load("curious"), "I wonder about the sea.");
    assert.equal(store.load("missing"), null);
  });

  it("returns null for an unreadable seed file", () => {
    const store = new SeedStore(dir);
    writeFileSync(join(dir, "broken.json"), "{not json");
    assert.equal(store.load("broken"), null);
  });

  it("removes seeds", () => {
    const store = new SeedStore(dir);
    store.save("gone", "x");
    assert.equal(store.remove("gone"), true);
    assert.deepEqual(store.list(), []);
  });
});
