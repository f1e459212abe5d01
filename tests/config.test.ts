import { describe, it, beforeEach, afterEach, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Logger } from "../src/logger.js";
import { isMonologueError } from "../src/errors.js";
import {
  DEFAULT_LIMITS,
  DEFAULT_URL,
  loadLimits,
  parseArgs,
  resolveLimits,
  saveLimits,
  validateLimits,
  type MonologueConfig,
} from "../src/cli/config.js";

function runConfig(argv: string[], env: NodeJS.ProcessEnv = {}): MonologueConfig {
  const parsed = parseArgs(argv, env);
  assert.equal(parsed.kind, "run");
  if (parsed.kind !== "run") throw new Error("unreachable");
  return parsed.config;
}

const isConfigError = (e: unknown) => isMonologueError(e) && e.kind === "config_error";

describe("parseArgs", () => {
  it("fills in defaults", () => {
    const c = runConfig([]);
    assert.equal(c.url, DEFAULT_URL);
    assert.equal(c.locale, "ja");
    assert.equal(c.searchCommand, "claude");
    assert.deepEqual(c.searchArgs, ["-p"]);
    assert.equal(c.search, true);
    assert.equal(c.headless, false);
    assert.equal(c.compressAt, undefined);
  });

  it("takes the URL from the environment", () => {
    assert.equal(runConfig([], { MONOLOGUE_URL: "http://backend:9000" }).url, "http://backend:9000");
    assert.equal(runConfig(["--url", "http://flag:1"], { MONOLOGUE_URL: "http://env:2" }).url, "http://flag:1");
  });

  it("reads every flag", () => {
    const c = runConfig([
      "--locale", "en",
      "--revive", "20260101_000000_m_n4",
      "--experiment", "probes.json",
      "--compress-at", "1000",
      "--max-context", "2000",
      "--search-command", "my-search --quiet -x",
      "--no-search",
      "--headless",
      "-v",
    ]);
    assert.equal(c.locale, "en");
    assert.equal(c.revive, "20260101_000000_m_n4");
    assert.equal(c.experiment, "probes.json");
    assert.equal(c.compressAt, 1000);
    assert.equal(c.maxContext, 2000);
    assert.equal(c.searchCommand, "my-search");
    assert.deepEqual(c.searchArgs, ["--quiet", "-x"]);
    assert.equal(c.search, false);
    assert.equal(c.headless, true);
    assert.equal(c.verbose, true);
  });

  it("short-circuits on help and version", () => {
    assert.deepEqual(parseArgs(["--headless", "-h"], {}), { kind: "help" });
    assert.deepEqual(parseArgs(["--version"], {}), { kind: "version" });
  });

  it("rejects bad input", () => {
    assert.throws(() => parseArgs(["--bogus"], {}), /Unknown argument: --bogus/);
    assert.throws(() => parseArgs(["--locale", "fr"], {}), isConfigError);
    assert.throws(() => parseArgs(["--compress-at", "lots"], {}), /--compress-at expects an integer/);
    assert.throws(() => parseArgs(["--url"], {}), /--url expects a value/);
    assert.throws(() => parseArgs(["--revive", "--headless"], {}), /--revive expects a value/);
  });
});

describe("validateLimits", () => {
  it("accepts compress below max", () => {
    assert.deepEqual(validateLimits({ compressAtChars: 10, maxContextChars: 20 }), {
      compressAtChars: 10,
      maxContextChars: 20,
    });
  });

  it("rejects compress at or above max", () => {
    assert.throws(() => validateLimits({ compressAtChars: 20, maxContextChars: 20 }), /Compress must be < Max/);
  });

  it("rejects non-positive or fractional values", () => {
    assert.throws(() => validateLimits({ compressAtChars: 0, maxContextChars: 20 }), isConfigError);
    assert.throws(() => validateLimits({ compressAtChars: 1.5, maxContextChars: 20 }), isConfigError);
  });
});

describe("limits file", () => {
  let dir: string;
  before(() => Logger.redirect(() => {}));
  after(() => Logger.redirect(null));
  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "monologue-config-"));
  });
  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("saves with snake_case keys and loads them back", () => {
    const file = join(dir, "limits.json");
    saveLimits(file, { compressAtChars: 5000, maxContextChars: 8000 });
    assert.equal(readFileSync(file, "utf-8"), '{\n  "compress_at_chars": 5000,\n  "max_context_chars": 8000\n}\n');
    assert.deepEqual(loadLimits(file), { compressAtChars: 5000, maxContextChars: 8000 });
  });

  it("falls back on a missing or invalid file", () => {
    assert.deepEqual(loadLimits(join(dir, "absent.json")), DEFAULT_LIMITS);
    const bad = join(dir, "bad.json");
    writeFileSync(bad, JSON.stringify({ compress_at_chars: 9000, max_context_chars: 100 }));
    assert.deepEqual(loadLimits(bad), DEFAULT_LIMITS);
    writeFileSync(bad, "not json");
    assert.deepEqual(loadLimits(bad), DEFAULT_LIMITS);
  });

  it("fills a missing key from the fallback", () => {
    const file = join(dir, "partial.json");
    writeFileSync(file, JSON.stringify({ compress_at_chars: 1000 }));
    assert.deepEqual(loadLimits(file), { compressAtChars: 1000, maxContextChars: 90_000 });
  });

  it("lets flags override the file", () => {
    const file = join(dir, "limits.json");
    saveLimits(file, { compressAtChars: 5000, maxContextChars: 8000 });
    const config = runConfig(["--config", file, "--max-context", "6000"]);
    assert.deepEqual(resolveLimits(config), { compressAtChars: 5000, maxContextChars: 6000 });
    assert.throws(() => resolveLimits({ ...config, compressAt: 7000 }), /Compress must be < Max/);
  });
});
