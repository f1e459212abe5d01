/**
 * CLI argument parsing, limits file, and help text.
 */

import { readFileSync, writeFileSync, existsSync } from "node:fs";
import { Logger } from "../logger.js";
import { monologueError, asError, errorLogFields } from "../errors.js";
import { isLocale, type Locale } from "../prompts.js";
import { getVersion } from "../version.js";

export interface ContextLimits {
  /** Compress once the buffer grows past this many characters. */
  compressAtChars: number;
  /** Configured ceiling; compression must fire before it is reached. */
  maxContextChars: number;
}

export const DEFAULT_LIMITS: ContextLimits = { compressAtChars: 75_000, maxContextChars: 90_000 };

export interface MonologueConfig {
  url: string;
  locale: Locale;
  logDir: string;
  sessionsDir: string;
  seedsDir: string;
  configFile: string;
  seedFile?: string;
  revive?: string;
  experiment?: string;
  searchCommand: string;
  searchArgs: string[];
  search: boolean;
  headless: boolean;
  verbose: boolean;
  compressAt?: number;
  maxContext?: number;
}

export type ParsedArgs =
  | { kind: "run"; config: MonologueConfig }
  | { kind: "help" }
  | { kind: "version" };

export const DEFAULT_URL = "http://localhost:1234";

export function validateLimits(limits: ContextLimits): ContextLimits {
  const { compressAtChars, maxContextChars } = limits;
  if (!Number.isInteger(compressAtChars) || compressAtChars <= 0 ||
      !Number.isInteger(maxContextChars) || maxContextChars <= 0) {
    throw monologueError("config_error", `Limits must be positive integers (got ${compressAtChars} / ${maxContextChars})`);
  }
  if (compressAtChars >= maxContextChars) {
    throw monologueError("config_error", `Compress must be < Max (got ${compressAtChars} / ${maxContextChars})`);
  }
  return { compressAtChars, maxContextChars };
}

/** Read limits from `path`; missing or invalid files leave `fallback` in place. */
export function loadLimits(path: string, fallback: ContextLimits = DEFAULT_LIMITS): ContextLimits {
  if (!existsSync(path)) return fallback;
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (typeof parsed !== "object" || parsed === null) throw new Error("expected an object");
    const c = "compress_at_chars" in parsed ? parsed.compress_at_chars : fallback.compressAtChars;
    const m = "max_context_chars" in parsed ? parsed.max_context_chars : fallback.maxContextChars;
    const limits = validateLimits({
      compressAtChars: typeof c === "number" ? c : Number.NaN,
      maxContextChars: typeof m === "number" ? m : Number.NaN,
    });
    Logger.info(`[Config] compress:${limits.compressAtChars.toLocaleString("en-US")} max:${limits.maxContextChars.toLocaleString("en-US")}`);
    return limits;
  } catch (e: unknown) {
    const me = monologueError("config_error", `Config error in ${path}: ${asError(e).message}`, { cause: e });
    Logger.warn(me.message, errorLogFields(me));
    return fallback;
  }
}

export function saveLimits(path: string, limits: ContextLimits): void {
  const body = { compress_at_chars: limits.compressAtChars, max_context_chars: limits.maxContextChars };
  try {
    writeFileSync(path, JSON.stringify(body, null, 2) + "\n", "utf-8");
  } catch (e: unknown) {
    const me = monologueError("config_error", `Config save error: ${asError(e).message}`, { cause: e });
    Logger.warn(me.message, errorLogFields(me));
  }
}

function intFlag(name: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n)) {
    throw monologueError("config_error", `${name} expects an integer (got ${value ?? "nothing"})`);
  }
  return n;
}

function valueFlag(name: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw monologueError("config_error", `${name} expects a value`);
  }
  return value;
}

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedArgs {
  const config: MonologueConfig = {
    url: env.MONOLOGUE_URL ?? DEFAULT_URL,
    locale: "ja",
    logDir: "./logs",
    sessionsDir: "./sessions",
    seedsDir: "./seeds",
    configFile: "./monologue.config.json",
    searchCommand: "claude",
    searchArgs: ["-p"],
    search: true,
    headless: false,
    verbose: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") return { kind: "help" };
    if (arg === "-V" || arg === "--version") return { kind: "version" };

    if (arg === "--url") { config.url = valueFlag(arg, argv[++i]); }
    else if (arg === "--locale") {
      const v = valueFlag(arg, argv[++i]);
      if (!isLocale(v)) throw monologueError("config_error", `--locale must be ja or en (got ${v})`);
      config.locale = v;
    }
    else if (arg === "--log-dir") { config.logDir = valueFlag(arg, argv[++i]); }
    else if (arg === "--sessions-dir") { config.sessionsDir = valueFlag(arg, argv[++i]); }
    else if (arg === "--seeds-dir") { config.seedsDir = valueFlag(arg, argv[++i]); }
    else if (arg === "--config") { config.configFile = valueFlag(arg, argv[++i]); }
    else if (arg === "--seed-file") { config.seedFile = valueFlag(arg, argv[++i]); }
    else if (arg === "--revive") { config.revive = valueFlag(arg, argv[++i]); }
    else if (arg === "--experiment") { config.experiment = valueFlag(arg, argv[++i]); }
    else if (arg === "--search-command") {
      const parts = valueFlag(arg, argv[++i]).split(" ").filter(Boolean);
      const [command, ...rest] = parts;
      if (!command) throw monologueError("config_error", "--search-command expects a command");
      config.searchCommand = command;
      config.searchArgs = rest;
    }
    else if (arg === "--no-search") { config.search = false; }
    else if (arg === "--headless") { config.headless = true; }
    else if (arg === "-v" || arg === "--verbose") { config.verbose = true; }
    else if (arg === "--compress-at") { config.compressAt = intFlag(arg, argv[++i]); }
    else if (arg === "--max-context") { config.maxContext = intFlag(arg, argv[++i]); }
    else {
      throw monologueError("config_error", `Unknown argument: ${arg}`);
    }
  }

  return { kind: "run", config };
}

/** Limits from the file, overridden by flags, validated together. */
export function resolveLimits(config: MonologueConfig): ContextLimits {
  const fromFile = loadLimits(config.configFile);
  return validateLimits({
    compressAtChars: config.compressAt ?? fromFile.compressAtChars,
    maxContextChars: config.maxContext ?? fromFile.maxContextChars,
  });
}

export function helpText(): string {
  return `monologue ${getVersion()}: autonomous thought loop over an OpenAI-compatible backend

usage: monologue [options]

options:
  --url <url>              backend base URL (default ${DEFAULT_URL}, env MONOLOGUE_URL)
  --locale ja|en           prompt pack (default ja)
  --seed-file <path>       start from this text instead of the default seed
  --revive <name>          start from a saved session
  --experiment <path>      probe schedule { "probes": [{ "at": N, "text": "..." }] }
  --compress-at <chars>    compression threshold (overrides config file)
  --max-context <chars>    context ceiling (overrides config file)
  --config <path>          limits file (default ./monologue.config.json)
  --log-dir <dir>          event and dialog logs (default ./logs)
  --sessions-dir <dir>     saved sessions (default ./sessions)
  --seeds-dir <dir>        seed library (default ./seeds)
  --search-command <cmd>   search CLI and its flags (default "claude -p")
  --no-search              disable search
  --headless               line mode on stdin/stdout instead of the TUI
  -v, --verbose            verbose logging (debug needs MONOLOGUE_LOG_LEVEL=DEBUG)
  -V, --version            print version
  -h, --help               this text`;
}
