/**
 * OpenAI-compatible completion driver.
 * Works with LM Studio, llama.cpp server, Ollama, vLLM, etc.
 *
 * The primary request is a plain completion (`/v1/completions`) so the
 * model continues the buffer as raw text. Servers or models that only
 * speak chat get a single-turn `/v1/chat/completions` request instead,
 * with a fixed system instruction framing the buffer as text to continue.
 */
import { Logger } from "../logger.js";
import { asError, monologueError } from "../errors.js";
import { timedFetch } from "../utils/timed-fetch.js";
import type { Generation, GenerationDriver, GenerationOptions } from "./types.js";

export interface CompletionsDriverConfig {
  baseUrl: string;
  /** System instruction for the chat fallback. */
  chatSystemPrompt: string;
  model?: string;
  timeoutMs?: number;
}

const SAMPLING = { top_p: 0.9, repeat_penalty: 1.15, stream: false } as const;
const DEFAULT_TIMEOUT_MS = 300_000;
const MODELS_TIMEOUT_MS = 5_000;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function completionTokens(data: Record<string, unknown>): number {
  const usage = data.usage;
  if (!isRecord(usage)) return 0;
  return typeof usage.completion_tokens === "number" ? usage.completion_tokens : 0;
}

function firstChoice(data: unknown): Record<string, unknown> | null {
  if (!isRecord(data) || !Array.isArray(data.choices)) return null;
  const choice: unknown = data.choices[0];
  return isRecord(choice) ? choice : null;
}

/** `choices[0].text` from a completion response. */
export function parseCompletion(data: unknown): Generation {
  const choice = firstChoice(data);
  if (!choice || typeof choice.text !== "string" || !isRecord(data)) {
    throw new Error("completion response has no choices[0].text");
  }
  return { text: choice.text.trim(), tokens: completionTokens(data) };
}

/** `choices[0].message.content` from a chat response. */
export function parseChat(data: unknown): Generation {
  const choice = firstChoice(data);
  const message = choice?.message;
  if (!isRecord(message) || typeof message.content !== "string" || !isRecord(data)) {
    throw new Error("chat response has no choices[0].message.content");
  }
  return { text: message.content.trim(), tokens: completionTokens(data) };
}

export function makeCompletionsDriver(cfg: CompletionsDriverConfig): GenerationDriver {
  const base = cfg.baseUrl.replace(/\/+$/, "");
  const timeoutMs = cfg.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  let model: string | null = cfg.model ?? null;

  async function post(path: string, body: Record<string, unknown>): Promise<unknown> {
    const payload = model ? { ...body, model } : body;
    const res = await timedFetch(`${base}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      timeoutMs,
      where: "generate",
    });
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new Error(`${path} failed (${res.status}): ${text.slice(0, 200)}`);
    }
    return res.json();
  }

  async function complete(prompt: string, opts: GenerationOptions): Promise<Generation> {
    const data = await post("/v1/completions", {
      prompt,
      max_tokens: opts.maxTokens,
      temperature: opts.temperature,
      ...SAMPLING,
    });
    return parseCompletion(data);
  }

  async function chat(prompt: string, opts: GenerationOptions): Promise<Generation> {
    const data = await post("/v1/chat/completions", {
      messages: [
        { role: "system", content: cfg.chatSystemPrompt },
        { role: "user", content: prompt },
      ],
      max_tokens: opts.maxTokens,
      temperature: opts.temperature,
      ...SAMPLING,
    });
    return parseChat(data);
  }

  return {
    get model() { return model; },

    async generate(prompt: string, opts: GenerationOptions): Promise<Generation> {
      const t0 = Date.now();
      try {
        return await complete(prompt, opts);
      } catch (e: unknown) {
        Logger.debug(`completion failed, falling back to chat: ${asError(e).message}`);
      }
      try {
        return await chat(prompt, opts);
      } catch (e: unknown) {
        throw monologueError("generation_error", `Generation failed: ${asError(e).message}`, {
          endpoint: base,
          model: model ?? undefined,
          latency_ms: Date.now() - t0,
          cause: e,
        });
      }
    },

    async discoverModel(): Promise<string | null> {
      try {
        const res = await timedFetch(`${base}/v1/models`, { timeoutMs: MODELS_TIMEOUT_MS, where: "models" });
        const data: unknown = await res.json();
        const list = isRecord(data) && Array.isArray(data.data) ? data.data : [];
        const first: unknown = list[0];
        if (isRecord(first) && typeof first.id === "string") {
          model = first.id;
          Logger.info(`Connected: ${model}`);
          return model;
        }
        Logger.warn("No model loaded");
      } catch (e: unknown) {
        Logger.warn(`Connection error: ${asError(e).message}`);
      }
      return null;
    },
  };
}
