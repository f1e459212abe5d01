/**
 * Call matchers: one object per tool-call encoding seen in the wild.
 *
 *   tool-call-json         <tool_call>{...}</tool_call>
 *   tool-call-talk         <tool_call>{...}</talk>
 *   tool-call-xml          <tool_call>name<arg_key>k</arg_key><arg_value>v</arg_value></tool_call>
 *   function-calls-broken  <function_calls>{...}</tool>
 *   function-parameter     <function=name><parameter=k>v</parameter></function>
 *   fenced                 ```tool_call {...} ```
 *   bare-name              name\n{...}\n</tool_call>   (fallback only)
 *
 * Each matcher yields one outcome per regex match: a parsed call, or a
 * failure carrying the raw fragment so the caller can log it.
 */

import { isJsonObject, memberText, repairJson, topLevelEntries, type JsonObject } from "./json-repair.js";
import { normalizeToolName, toolNameSpellings } from "./tool-names.js";

export type MatcherName =
  | "tool-call-json"
  | "tool-call-talk"
  | "tool-call-xml"
  | "function-calls-broken"
  | "function-parameter"
  | "fenced"
  | "bare-name";

export interface ParsedCall {
  name: string;
  /** Tools are unary: every call carries exactly one string argument. */
  argument: string;
  matcher: MatcherName;
}

export type MatchOutcome =
  | { ok: true; call: ParsedCall }
  | { ok: false; matcher: MatcherName; raw: string };

export interface CallMatcher {
  readonly name: MatcherName;
  /** Runs only when no other matcher produced a parsed call. */
  readonly fallbackOnly: boolean;
  tryExtract(text: string): Generator<MatchOutcome>;
}

function stringifyArgument(v: unknown): string {
  if (v === undefined || v === null || v === false || v === 0 || v === "") return "";
  return typeof v === "string" ? v : JSON.stringify(v);
}

/**
 * Reduce a call's `arguments` to one string.
 *
 * A JSON-encoded string is decoded first (left as-is when it is not JSON).
 * For an object the value of its first key as written wins and the rest
 * are dropped: both tools take a single argument. `source` is the object's
 * JSON text; without it the parsed key order is used.
 */
export function reduceArguments(args: unknown, source?: string): string {
  let value = args;
  let text = source;
  if (typeof value === "string") {
    const raw = value;
    try {
      value = JSON.parse(raw);
    } catch {
      return raw;
    }
    text = raw;
  }
  if (!isJsonObject(value)) return stringifyArgument(value);

  const first = text === undefined ? undefined : topLevelEntries(text)[0];
  if (first) {
    const parsed: unknown = JSON.parse(first[1]);
    return stringifyArgument(parsed);
  }
  const values = Object.values(value);
  return values.length ? stringifyArgument(values[0]) : "";
}

/**
 * Build a call from a repaired `{name, arguments}` object. With
 * `impliedName`, an object lacking `name` is read as the arguments map of
 * that tool. `source` is the JSON text `obj` was parsed from.
 */
export function callFromObject(
  obj: JsonObject,
  matcher: MatcherName,
  impliedName?: string,
  source?: string,
): ParsedCall | null {
  const rawName = typeof obj.name === "string" ? obj.name.trim() : "";
  if (rawName) {
    const argsSource = source === undefined ? undefined : memberText(source, "arguments");
    return { name: normalizeToolName(rawName), argument: reduceArguments(obj.arguments ?? {}, argsSource), matcher };
  }
  if (impliedName) {
    return { name: normalizeToolName(impliedName), argument: reduceArguments(obj, source), matcher };
  }
  return null;
}

/** Matchers whose first capture group is a JSON payload. */
class JsonPayloadMatcher implements CallMatcher {
  readonly fallbackOnly: boolean;
  private readonly namedByPrefix: boolean;

  constructor(
    readonly name: MatcherName,
    private readonly pattern: RegExp,
    opts: { fallbackOnly?: boolean; namedByPrefix?: boolean } = {},
  ) {
    this.fallbackOnly = opts.fallbackOnly ?? false;
    this.namedByPrefix = opts.namedByPrefix ?? false;
  }

  *tryExtract(text: string): Generator<MatchOutcome> {
    for (const m of text.matchAll(this.pattern)) {
      // bare-name captures the leading tool word in group 1, JSON in group 2
      const payload = this.namedByPrefix ? m[2] : m[1];
      const implied = this.namedByPrefix ? m[1] : undefined;
      if (payload === undefined) continue;
      const repaired = repairJson(payload);
      const call = repaired.ok ? callFromObject(repaired.value, this.name, implied, repaired.text) : null;
      yield call ? { ok: true, call } : { ok: false, matcher: this.name, raw: payload };
    }
  }
}

/** Matchers that spell out name, key and value as markup. */
class KeyValueMatcher implements CallMatcher {
  readonly fallbackOnly = false;

  constructor(
    readonly name: MatcherName,
    private readonly pattern: RegExp,
  ) {}

  *tryExtract(text: string): Generator<MatchOutcome> {
    for (const m of text.matchAll(this.pattern)) {
      const [, name, , value] = m;
      if (name === undefined || value === undefined) continue;
      yield { ok: true, call: { name: normalizeToolName(name), argument: value.trim(), matcher: this.name } };
    }
  }
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Alternation of every spelling that names a known tool. */
export function toolNamePattern(): string {
  return toolNameSpellings().map(escapeRegExp).join("|");
}

export function defaultMatchers(): CallMatcher[] {
  const word = "[\\p{L}\\p{N}_]+";
  return [
    new JsonPayloadMatcher("tool-call-json", /<tool_call>\s*(\{.*?\})\s*<\/tool_call>/gs),
    new JsonPayloadMatcher("tool-call-talk", /<tool_call>\s*(\{.*?\})\s*<\/talk>/gs),
    new KeyValueMatcher(
      "tool-call-xml",
      new RegExp(
        `<tool_call>\\s*(${word})\\s*<arg_key>(${word})</arg_key>\\s*<arg_value>(.*?)</arg_value>\\s*</tool_call>`,
        "gsu",
      ),
    ),
    new JsonPayloadMatcher("function-calls-broken", /<function_calls>\s*(\{.*?\})\s*<\/tool>/gs),
    new KeyValueMatcher(
      "function-parameter",
      new RegExp(`<function=(${word})>\\s*<parameter=(${word})>(.*?)</parameter>\\s*</function>`, "gsu"),
    ),
    new JsonPayloadMatcher("fenced", /```tool_call\s*(\{.*?\})\s*```/gs),
    new JsonPayloadMatcher(
      "bare-name",
      new RegExp(`(${toolNamePattern()})\\s*\\n?\\s*(\\{[^}]*\\})\\s*\\n?\\s*</tool_call>`, "gsu"),
      { fallbackOnly: true, namedByPrefix: true },
    ),
  ];
}
