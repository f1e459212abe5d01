/**
 * ContextBuffer: the narrative the model keeps extending.
 *
 * Append-only between resets, except for two operations: splicing off a
 * tail that held a half-written call (so the call can be re-read whole)
 * and wholesale replacement by compression.
 */
import type { Generation } from "../drivers/types.js";
import type { ExecutedCall } from "../tools/extractor.js";
import { hasOpenCall } from "../tools/open-call.js";

/** How far back into the buffer a truncated call is looked for. */
export const CONTINUATION_TAIL_CHARS = 200;
/** Cap on the tag-stripped raw text kept when extraction recovers nothing. */
export const FALLBACK_CHARS = 200;

/**
 * The chunk appended for one thought: sanitized text, then each non-empty
 * tool result on its own lines, then a newline. When nothing survives
 * sanitizing and no call was recognised, the raw text minus tags is kept
 * instead so the buffer never silently stalls.
 */
export function composeAppend(sanitized: string, calls: ExecutedCall[], raw: string): string {
  const results = calls
    .filter((c) => c.result)
    .map((c) => `\n${c.result}\n`)
    .join("");
  if (sanitized) return sanitized + results + "\n";
  if (results) return results + "\n";
  if (calls.length === 0) {
    const fallback = raw.replace(/<[^>]+>/g, "").trim();
    if (fallback) return fallback.slice(0, FALLBACK_CHARS) + "\n";
  }
  return "";
}

export type OpenCallResolution =
  /** The buffer tail held the opening of a call the new text closes. */
  | { kind: "merged"; text: string; tokens: number; tailLength: number }
  /** A call was left open; one more generation was requested. */
  | { kind: "continued"; text: string; tokens: number }
  | { kind: "none"; text: string; tokens: number };

export type ContinueFn = (prompt: string) => Promise<Generation>;

export class ContextBuffer {
  private content: string;

  constructor(seed: string) {
    this.content = seed;
  }

  get text(): string { return this.content; }
  get length(): number { return this.content.length; }

  append(chunk: string): void {
    this.content += chunk;
  }

  replace(text: string): void {
    this.content = text;
  }

  tail(n: number = CONTINUATION_TAIL_CHARS): string {
    return this.content.length > n ? this.content.slice(-n) : this.content;
  }

  /** Remove the last `n` characters. */
  dropTail(n: number): void {
    if (n <= 0) return;
    this.content = this.content.slice(0, Math.max(0, this.content.length - n));
  }

  /** Keep only the last `n` characters. */
  truncateTo(n: number): void {
    if (this.content.length > n) this.content = this.content.slice(-n);
  }

  exceeds(limit: number): boolean {
    return this.content.length > limit;
  }

  /**
   * Reconcile `text` with a call left open by truncation.
   *
   * If the buffer tail opens a call that `tail + text` closes, the tail is
   * spliced off and the merged string becomes the call source. If a call
   * is still open (in the tail or at the end of `text`), `next` is asked
   * once for a continuation of `buffer + text`.
   */
  async resolveOpenCall(text: string, tokens: number, next: ContinueFn): Promise<OpenCallResolution> {
    const tail = this.tail();
    if (hasOpenCall(tail)) {
      const combined = tail + text;
      if (!hasOpenCall(combined)) {
        this.dropTail(tail.length);
        return { kind: "merged", text: combined, tokens, tailLength: tail.length };
      }
      return this.continueCall(text, tokens, next);
    }
    if (hasOpenCall(text)) return this.continueCall(text, tokens, next);
    return { kind: "none", text, tokens };
  }

  private async continueCall(text: string, tokens: number, next: ContinueFn): Promise<OpenCallResolution> {
    const extra = await next(this.content + text);
    if (!extra.text) return { kind: "none", text, tokens };
    return { kind: "continued", text: text + extra.text, tokens: tokens + extra.tokens };
  }
}
