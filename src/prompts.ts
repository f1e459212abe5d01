/**
 * Prompt packs: every piece of natural language the loop writes into the
 * buffer or sends to a backend, one JSON file per locale under prompts/.
 */
import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { monologueError, asError } from "./errors.js";

export type Locale = "ja" | "en";

export interface PromptPack {
  locale: Locale;
  /** Default starting buffer. Ends inside an open search call for the model to complete. */
  seed: string;
  /** Tool-usage block appended after every compression and to saved sessions. */
  toolReminder: string;
  chatSystemPrompt: string;
  /** `{thoughts}` is replaced with the tail of the buffer. */
  compressionPrompt: string;
  /** `{query}` is replaced with the search argument. */
  searchPrompt: string;
  /** `{message}` is replaced with the human's text. */
  humanTurn: string;
  /** Appended in rotation after an empty generation. */
  fillers: [string, string, string];
}

export function isLocale(v: string): v is Locale {
  return v === "ja" || v === "en";
}

function promptsDir(): string {
  // In ESM, __dirname isn't available; derive from import.meta.url
  const selfDir = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    join(selfDir, "..", "prompts"),        // from src/
    join(selfDir, "..", "..", "prompts"),  // from dist/src/
  ];
  for (const p of candidates) {
    if (existsSync(p)) return p;
  }
  throw monologueError("config_error", `prompts directory not found next to ${selfDir}`);
}

function requireString(obj: Record<string, unknown>, key: string, file: string): string {
  const v = obj[key];
  if (typeof v !== "string") {
    throw monologueError("config_error", `${file}: "${key}" must be a string`);
  }
  return v;
}

export function parsePromptPack(raw: unknown, locale: Locale, file = `${locale}.json`): PromptPack {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw monologueError("config_error", `${file}: expected an object`);
  }
  const obj: Record<string, unknown> = { ...raw };
  const rawFillers: unknown[] = Array.isArray(obj.fillers) ? obj.fillers : [];
  const fillers = rawFillers.filter((f): f is string => typeof f === "string");
  if (rawFillers.length !== 3 || fillers.length !== 3) {
    throw monologueError("config_error", `${file}: "fillers" must be three strings`);
  }
  const [a = "", b = "", c = ""] = fillers;
  return {
    locale,
    seed: requireString(obj, "seed", file),
    toolReminder: requireString(obj, "toolReminder", file),
    chatSystemPrompt: requireString(obj, "chatSystemPrompt", file),
    compressionPrompt: requireString(obj, "compressionPrompt", file),
    searchPrompt: requireString(obj, "searchPrompt", file),
    humanTurn: requireString(obj, "humanTurn", file),
    fillers: [a, b, c],
  };
}

const cache = new Map<Locale, PromptPack>();

export function loadPromptPack(locale: Locale): PromptPack {
  const hit = cache.get(locale);
  if (hit) return hit;
  const file = join(promptsDir(), `${locale}.json`);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"));
  } catch (e: unknown) {
    throw monologueError("config_error", `Failed to read prompt pack ${file}: ${asError(e).message}`, { cause: e });
  }
  const pack = parsePromptPack(raw, locale, file);
  cache.set(locale, pack);
  return pack;
}

/** Replace `{name}` placeholders in a single pass; unknown names stay as-is. */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => vars[key] ?? match);
}
