/**
 * JSON repair for tool-call payloads.
 *
 * Models emit near-JSON: raw newlines inside strings, bare keys, Japanese
 * corner brackets instead of quotes, objects cut off before the closing
 * brace. repairJson runs a fixed pipeline of text-to-text stages and
 * returns the first one that parses to a plain object:
 *
 *   1. escape-controls   raw \n \r \t inside string values re-escaped
 *   2. quote-keys        bare `key:` quoted, doubled quotes collapsed
 *   3. fullwidth-quotes  「」『』 → ", then quote-keys again
 *   4. close-brackets    stage-2 text + `"}`, `"}}`, `}`, `}}`
 *
 * Stages never throw. A fragment no stage can fix yields { ok: false }.
 */

export type JsonObject = Record<string, unknown>;

export type RepairStage =
  | "escape-controls"
  | "quote-keys"
  | "fullwidth-quotes"
  | "close-brackets";

export type RepairResult =
  /** `text` is the repaired source that parsed; key order is read from it. */
  | { ok: true; value: JsonObject; text: string; stage: RepairStage }
  | { ok: false };

type ParseResult = { ok: true; value: JsonObject } | { ok: false };

const CLOSING_SUFFIXES = ['"}', '"}}', "}", "}}"] as const;

// Value opened by `": "` and closed by a quote followed by , } or whitespace.
const STRING_VALUE_RE = /(?<=": ")([\s\S]*?)(?="[,}\s])/g;
const BARE_KEY_RE = /(?<=[{,])\s*([\p{L}\p{N}_]+)\s*:/gu;
const FULLWIDTH_QUOTE_RE = /[「」『』]/g;

export function isJsonObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Strict parse that only accepts a JSON object. */
export function parseObject(text: string): ParseResult {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return { ok: false };
  }
  return isJsonObject(value) ? { ok: true, value } : { ok: false };
}

export function escapeControlChars(raw: string): string {
  return raw.replace(STRING_VALUE_RE, (value) =>
    value.replace(/\n/g, "\\n").replace(/\r/g, "\\r").replace(/\t/g, "\\t"),
  );
}

export function quoteBareKeys(text: string): string {
  return text.replace(BARE_KEY_RE, ' "$1":').replace(/""/g, '"');
}

export function replaceFullwidthQuotes(text: string): string {
  return text.replace(FULLWIDTH_QUOTE_RE, '"');
}

export function repairJson(raw: string): RepairResult {
  const escaped = escapeControlChars(raw);
  const first = parseObject(escaped);
  if (first.ok) return { ok: true, value: first.value, text: escaped, stage: "escape-controls" };

  const keyed = quoteBareKeys(escaped);
  const second = parseObject(keyed);
  if (second.ok) return { ok: true, value: second.value, text: keyed, stage: "quote-keys" };

  const unquoted = quoteBareKeys(replaceFullwidthQuotes(escaped));
  const third = parseObject(unquoted);
  if (third.ok) return { ok: true, value: third.value, text: unquoted, stage: "fullwidth-quotes" };

  for (const suffix of CLOSING_SUFFIXES) {
    const closed = parseObject(keyed + suffix);
    if (closed.ok) return { ok: true, value: closed.value, text: keyed + suffix, stage: "close-brackets" };
  }

  return { ok: false };
}

/**
 * Key and raw value text of each member of the outermost object in `text`,
 * in the order written (JSON.parse lists integer-like keys first). `text`
 * must be valid JSON.
 */
export function topLevelEntries(text: string): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  let depth = 0;
  let inString = false;
  let stringStart = -1;
  let lastString = "";
  let key: string | null = null;
  let valueStart = -1;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === "\\") {
        i++;
      } else if (ch === '"') {
        inString = false;
        if (depth === 1 && valueStart < 0) lastString = text.slice(stringStart, i + 1);
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
      stringStart = i;
    } else if (ch === "{" || ch === "[") {
      depth++;
    } else if (ch === ":" && depth === 1 && valueStart < 0) {
      const parsed: unknown = lastString ? JSON.parse(lastString) : null;
      key = typeof parsed === "string" ? parsed : null;
      valueStart = i + 1;
    } else if ((ch === "," && depth === 1) || ((ch === "}" || ch === "]") && depth-- === 1)) {
      if (key !== null && valueStart >= 0) entries.push([key, text.slice(valueStart, i).trim()]);
      key = null;
      valueStart = -1;
      if (depth === 0) break;
    }
  }
  return entries;
}

/** Raw text of the member `name` of the outermost object; the last one wins, as in JSON.parse. */
export function memberText(text: string, name: string): string | undefined {
  let found: string | undefined;
  for (const [key, value] of topLevelEntries(text)) {
    if (key === name) found = value;
  }
  return found;
}
