/**
 * Tool-call extraction over generated text.
 *
 * The extractor strips reasoning blocks, runs every matcher in priority
 * order and executes each parsed call as soon as it is found, so a second
 * `search` in the same thought already sees the cooldown set by the
 * first. The fallback matcher only runs when nothing else parsed.
 *
 * Alongside the executed calls it returns the sanitized text: the same
 * output with think blocks and every known call shape (complete or cut
 * off) removed, ready to append to the context buffer.
 */

import { Logger, C } from "../logger.js";
import { defaultMatchers, toolNamePattern, type CallMatcher, type MatchOutcome } from "./call-matchers.js";

export interface ExecutedCall {
  name: string;
  argument: string;
  result: string;
}

export interface ExtractionResult {
  calls: ExecutedCall[];
  sanitized: string;
  /** Candidate calls whose payload could not be repaired. */
  dropped: number;
}

export type ToolRunner = (name: string, argument: string) => Promise<string>;

export function stripThinkBlocks(text: string): string {
  return text
    .replace(/<think>[\s\S]*?<\/think>/g, "")
    .replace(/<think>[\s\S]*$/, "")
    .replaceAll("</think>", "");
}

function sanitizePatterns(): RegExp[] {
  return [
    /<tool_call>[\s\S]*?<\/tool_call>/g,
    /<tool_call>[\s\S]*?<\/talk>/g,
    /```tool_call\s*\{[\s\S]*?\}\s*```/g,
    /<function_calls>[\s\S]*?<\/tool>/g,
    /<function_calls>[\s\S]*?<\/function_calls>/g,
    /<function=[\p{L}\p{N}_]+>[\s\S]*?<\/function>/gu,
    new RegExp(`(?:${toolNamePattern()})\\s*\\n?\\s*\\{[^}]*\\}\\s*\\n?\\s*</tool_call>`, "gu"),
    // dangling shapes, cut off at the end of the text
    /```tool_call\s*\{[^}]*$/,
    /```tool_call\s*$/,
    /<function_calls>[\s\S]*$/,
    /<tool_call>(?![\s\S]*<\/tool_call>)[\s\S]*$/,
    // orphan fragments
    /<\/tool_call>/g,
    /<\/talk>/g,
    /<\/tool>/g,
    /<\/arg_value>/g,
    /<arg_key>.*?<\/arg_key>/g,
  ];
}

const SANITIZE_PATTERNS = sanitizePatterns();

/** Remove think blocks and call markup; collapse 3+ newlines to one blank line. */
export function sanitize(text: string): string {
  let s = stripThinkBlocks(text);
  for (const re of SANITIZE_PATTERNS) s = s.replace(re, "");
  return s.replace(/\n{3,}/g, "\n\n").trim();
}

export class ToolCallExtractor {
  constructor(private readonly matchers: CallMatcher[] = defaultMatchers()) {}

  /**
   * Yield match outcomes in priority order. Fallback matchers run only if
   * the primary pass produced no parsed call. Lazy: a consumer that
   * executes each call before pulling the next sees them in order.
   */
  *scan(text: string): Generator<MatchOutcome> {
    let parsed = 0;
    for (const matcher of this.matchers) {
      if (matcher.fallbackOnly) continue;
      for (const outcome of matcher.tryExtract(text)) {
        if (outcome.ok) parsed++;
        yield outcome;
      }
    }
    if (parsed > 0) return;
    for (const matcher of this.matchers) {
      if (!matcher.fallbackOnly) continue;
      yield* matcher.tryExtract(text);
    }
  }

  async extract(text: string, run: ToolRunner): Promise<ExtractionResult> {
    const clean = stripThinkBlocks(text);
    const calls: ExecutedCall[] = [];
    let dropped = 0;

    for (const outcome of this.scan(clean)) {
      if (!outcome.ok) {
        dropped++;
        Logger.warn(C.red(`  JSON parse failed (${outcome.matcher}): ${outcome.raw.slice(0, 100)}`));
        continue;
      }
      const { name, argument } = outcome.call;
      const result = await run(name, argument);
      calls.push({ name, argument, result });
    }

    return { calls, sanitized: sanitize(text), dropped };
  }
}
