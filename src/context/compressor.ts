/**
 * Buffer compression.
 *
 * Only the last COMPRESSION_WINDOW characters are summarised, and the
 * summary plus the tool reminder replaces the whole buffer. This is a hard
 * reset, not a sliding window: nothing of the old tail is kept verbatim.
 * If the summary call fails or comes back empty, the buffer is cut to its
 * last `compressAtChars` characters instead.
 */
import { Logger, C } from "../logger.js";
import { asError, errorLogFields, monologueError } from "../errors.js";
import { PROFILES, type GenerationDriver } from "../drivers/types.js";
import { fillTemplate, type PromptPack } from "../prompts.js";
import type { EventSink } from "../runtime/event-log.js";
import type { ContextBuffer } from "./context-buffer.js";

export const COMPRESSION_WINDOW = 2000;

export type CompressionOutcome =
  | { kind: "summarized"; before: number; after: number; summary: string }
  | { kind: "truncated"; before: number; after: number; error: string };

export interface CompressorDeps {
  driver: GenerationDriver;
  prompts: PromptPack;
  events: EventSink;
}

/** `summary + blank line + reminder + newline`. The reminder text is the same byte string every time. */
export function compressedBuffer(summary: string, reminder: string): string {
  return `${summary}\n\n${reminder}\n`;
}

export class Compressor {
  constructor(private readonly deps: CompressorDeps) {}

  async compress(buffer: ContextBuffer, compressAtChars: number, count: number): Promise<CompressionOutcome> {
    const { driver, prompts, events } = this.deps;
    const before = buffer.length;
    Logger.info(C.yellow(`[Compress #${count} ${before}→]`));

    const prompt = fillTemplate(prompts.compressionPrompt, {
      thoughts: buffer.text.slice(-COMPRESSION_WINDOW),
    });

    let summary = "";
    let failure: string | null = null;
    try {
      summary = (await driver.generate(prompt, PROFILES.compression)).text;
      if (!summary) failure = "empty summary";
    } catch (e: unknown) {
      const me = monologueError("generation_error", `Compression failed: ${asError(e).message}`, { cause: e });
      Logger.warn(me.message, errorLogFields(me));
      failure = me.message;
    }

    if (failure !== null) {
      buffer.truncateTo(compressAtChars);
      const after = buffer.length;
      events.log("compress_failed", failure, { before, after });
      return { kind: "truncated", before, after, error: failure };
    }

    buffer.replace(compressedBuffer(summary, prompts.toolReminder));
    const after = buffer.length;
    Logger.info(C.yellow(`${after} | ${((after / before) * 100).toFixed(1)}%`));
    events.log("compress", summary, { before, after });
    return { kind: "summarized", before, after, summary };
  }
}
