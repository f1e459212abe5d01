/**
 * Blessed-tagged text for the panels. Pure, so front-end output can be
 * checked without a terminal.
 */
import blessed from "blessed";
import type { PendingMessage } from "../../tools/executor.js";
import type { LoopStatus } from "../../runtime/thought-loop.js";
import type { ThoughtRecord } from "../../runtime/loop-state.js";

export const THOUGHT_PREVIEW_CHARS = 100;

const fmt = (n: number) => n.toLocaleString("en-US");

export function formatStatus(s: LoopStatus): string {
  const state = !s.alive
    ? "{red-fg}■ stopped{/red-fg}"
    : s.thinking
      ? "{yellow-fg}● thinking{/yellow-fg}"
      : "{green-fg}● running{/green-fg}";
  return [
    ` ${state}`,
    `#${s.thoughts}`,
    `up ${s.uptime}`,
    `ctx ${fmt(s.ctx)}`,
    `${fmt(s.tokens)} tok`,
    `${s.avgSec}s/thought`,
    `compress ×${s.compressions}`,
    blessed.escape(s.model),
  ].join("  │  ");
}

/** Oldest first, one entry per message; `[You]` lines highlighted. */
export function formatDialogue(messages: PendingMessage[]): string {
  return messages
    .map((m) => {
      const time = m.timestamp.slice(11, 19);
      const body = blessed.escape(m.content);
      const colored = m.content.startsWith("[You]") ? `{green-fg}${body}{/green-fg}` : body;
      return `{gray-fg}${time}{/gray-fg} ${colored}`;
    })
    .join("\n\n");
}

/** Newest first, each a one-line preview. */
export function formatThoughts(thoughts: ThoughtRecord[]): string {
  return [...thoughts]
    .reverse()
    .map((t) => {
      const preview = t.content.replace(/\s+/g, " ").trim().slice(0, THOUGHT_PREVIEW_CHARS);
      return `{cyan-fg}#${t.sequence}{/cyan-fg} ${blessed.escape(preview)}`;
    })
    .join("\n");
}
