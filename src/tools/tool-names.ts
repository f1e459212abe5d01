/**
 * Canonical tool names and the synonyms models use for them.
 *
 * Models running on a Japanese seed often name the tool in Japanese
 * ("検索", "伝える"); English seeds produce "web_search", "say" and so on.
 * Anything not in the table passes through untouched and is reported as
 * unknown by the executor.
 */

export type KnownToolName = "search" | "message";

export const KNOWN_TOOLS: readonly KnownToolName[] = ["search", "message"];

const TOOL_ALIASES: Record<string, KnownToolName> = {
  "検索": "search",
  "探す": "search",
  "調べる": "search",
  "サーチ": "search",
  "web_search": "search",
  "lookup": "search",
  "メッセージ": "message",
  "伝える": "message",
  "話す": "message",
  "送信": "message",
  "send_message": "message",
  "say": "message",
};

export function normalizeToolName(name: string): string {
  const trimmed = name.trim();
  return TOOL_ALIASES[trimmed] ?? trimmed;
}

/** Every spelling that resolves to a known tool, canonical names first. */
export function toolNameSpellings(): string[] {
  return [...KNOWN_TOOLS, ...Object.keys(TOOL_ALIASES)];
}
