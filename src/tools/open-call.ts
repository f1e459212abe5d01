/**
 * Open-call detection. Generation is cut at a token budget, so a call can
 * start in one generation and finish in the next. Any closing spelling
 * closes any opening spelling: models mix them freely.
 */

const OPEN_TAGS = ["<tool_call>", "<function_calls>", "<function="] as const;
const CLOSE_TAGS = ["</tool_call>", "</talk>", "</tool>", "</function_calls>", "</function>"] as const;
const FENCE_OPEN = "```tool_call";
const FENCE = "```";

export function hasOpenCall(text: string): boolean {
  let lastOpen = -1;
  for (const tag of OPEN_TAGS) {
    lastOpen = Math.max(lastOpen, text.lastIndexOf(tag));
  }

  if (lastOpen === -1) {
    const fenceAt = text.lastIndexOf(FENCE_OPEN);
    if (fenceAt === -1) return false;
    return !text.slice(fenceAt + FENCE_OPEN.length).includes(FENCE);
  }

  const after = text.slice(lastOpen);
  return !CLOSE_TAGS.some((tag) => after.includes(tag));
}
