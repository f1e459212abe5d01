/**
 * ThoughtLoop: the process-wide control loop.
 *
 * One pass:
 *   1. a pending human request, if any, is answered first
 *   2. otherwise one autonomous thought:
 *        generate → open-call continuation → extract + execute tools →
 *        append → maybe compress → maybe fire a scheduled probe
 *   3. wait up to `yieldMs` for a wake (human message or stop)
 *
 * The loop is the only writer of LoopState. Front-ends read through
 * snapshot()/status() and talk through speak(); they never touch the
 * buffer directly. Generation calls are awaited one at a time, and stop()
 * does not cancel one in flight: the loop notices the flag at the top of
 * its next pass.
 */
import { Logger, C } from "../logger.js";
import { asError, errorLogFields, isMonologueError, monologueError } from "../errors.js";
import { PROFILES, type GenerationDriver } from "../drivers/types.js";
import { fillTemplate, type PromptPack } from "../prompts.js";
import { composeAppend } from "../context/context-buffer.js";
import { Compressor } from "../context/compressor.js";
import { ToolCallExtractor } from "../tools/extractor.js";
import { ToolExecutor, type PendingMessage, type ToolContext } from "../tools/executor.js";
import type { SearchProvider } from "../tools/cli-search.js";
import { validateLimits, type ContextLimits } from "../cli/config.js";
import { modelTag, revivalText, sessionName, type SessionStore } from "../session.js";
import { HumanChannel, NO_RESPONSE, DEFAULT_REPLY_TIMEOUT_MS } from "./human-channel.js";
import { LoopState, type LoopLog, type ThoughtRecord } from "./loop-state.js";
import { ProbeSchedule, type ProbeDefinition } from "./probes.js";
import { WakeSignal, sleep } from "./wake-signal.js";
import type { EventKind, EventSink } from "./event-log.js";

export const MAX_EMPTY_RETRIES = 3;
export const DEFAULT_YIELD_MS = 10;
export const DEFAULT_ERROR_PAUSE_MS = 2_000;

export interface ThoughtLoopOptions {
  driver: GenerationDriver;
  prompts: PromptPack;
  limits: ContextLimits;
  /** Builds the search collaborator; it logs through the loop's event sink. */
  search: (events: EventSink) => SearchProvider;
  /** Opens the event/dialog log for a fresh state (start and every reset). */
  openLog: (thoughtIndex: () => number) => LoopLog;
  sessions?: SessionStore;
  seed?: string;
  probes?: ProbeDefinition[];
  yieldMs?: number;
  errorPauseMs?: number;
  now?: () => Date;
}

export interface LoopStatus {
  uptime: string;
  thoughts: number;
  ctx: number;
  tokens: number;
  avgSec: number;
  model: string;
  compressions: number;
  alive: boolean;
  thinking: boolean;
}

export interface LoopSnapshot {
  status: LoopStatus;
  context: string;
  pendingMessages: PendingMessage[];
  /** Oldest first. */
  thoughts: ThoughtRecord[];
  cooldowns: Record<string, number>;
  firedProbes: number[];
  emptyRetries: number;
}

/** `H:MM:SS` */
export function formatUptime(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return `${h}:${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")}`;
}

export class ThoughtLoop {
  private state: LoopState;
  private limitsValue: ContextLimits;
  private isAlive = false;
  private busy = false;
  private running: Promise<void> | null = null;
  private lastSession: string | null = null;

  private readonly wakeSignal = new WakeSignal();
  private readonly channel = new HumanChannel(() => this.wakeSignal.wake());
  private readonly extractor = new ToolCallExtractor();
  private readonly executor: ToolExecutor;
  private readonly compressor: Compressor;
  private readonly probeTemplate: ProbeSchedule | null;
  private readonly now: () => Date;
  private readonly yieldMs: number;
  private readonly errorPauseMs: number;

  /** Forwards to whichever state is current, so collaborators survive resets. */
  readonly events: EventSink = {
    log: (kind: EventKind, content: string, meta?: Record<string, unknown>) =>
      this.state.log.log(kind, content, meta),
  };

  constructor(private readonly opts: ThoughtLoopOptions) {
    this.limitsValue = validateLimits(opts.limits);
    this.now = opts.now ?? (() => new Date());
    this.yieldMs = opts.yieldMs ?? DEFAULT_YIELD_MS;
    this.errorPauseMs = opts.errorPauseMs ?? DEFAULT_ERROR_PAUSE_MS;
    this.probeTemplate = opts.probes?.length ? new ProbeSchedule(opts.probes) : null;
    this.state = this.freshState(opts.seed ?? opts.prompts.seed);
    this.executor = new ToolExecutor({ search: opts.search(this.events), events: this.events, now: this.now });
    this.compressor = new Compressor({ driver: opts.driver, prompts: opts.prompts, events: this.events });
  }

  get alive(): boolean { return this.isAlive; }
  get thinking(): boolean { return this.busy; }
  get limits(): ContextLimits { return { ...this.limitsValue }; }
  get seed(): string { return this.state.seed; }
  /** Path of the session written by the last stop, if any. */
  get lastSessionPath(): string | null { return this.lastSession; }

  // ─── Lifecycle ───

  /** Discover the model and start the loop. Resolves false when the backend is unreachable. */
  async start(): Promise<boolean> {
    if (this.isAlive) return true;
    const model = await this.opts.driver.discoverModel();
    if (!model) return false;
    this.state.log.tagWithModel?.(modelTag(model));
    this.isAlive = true;
    this.running = this.run();
    return true;
  }

  /**
   * Stop after the current pass. Resolves once the loop has exited and the
   * session (if any thoughts were produced) is saved; returns its path.
   */
  async stop(): Promise<string | null> {
    this.isAlive = false;
    this.wakeSignal.wake();
    if (this.running) {
      await this.running;
      this.running = null;
    }
    return this.lastSession;
  }

  /** Post a human message and wait for the loop's reply. */
  speak(text: string, timeoutMs: number = DEFAULT_REPLY_TIMEOUT_MS): Promise<string> {
    return this.channel.request(text, timeoutMs);
  }

  /**
   * Replace the buffer with `seed` and zero every counter in one step.
   * Refused while the loop is alive.
   */
  reset(seed: string): boolean {
    if (this.isAlive || this.running) return false;
    this.state = this.freshState(seed);
    return true;
  }

  /** Reset from a saved session. */
  revive(name: string): { ok: true; chars: number } | { ok: false; reason: string } {
    if (this.isAlive || this.running) return { ok: false, reason: "Stop first" };
    const text = this.opts.sessions?.read(name) ?? null;
    if (text === null) return { ok: false, reason: "File not found" };
    this.reset(text);
    return { ok: true, chars: text.length };
  }

  setLimits(limits: ContextLimits): ContextLimits {
    this.limitsValue = validateLimits(limits);
    return this.limits;
  }

  // ─── Read-only views ───

  status(): LoopStatus {
    const s = this.state;
    return {
      uptime: formatUptime(this.now().getTime() - s.birth.getTime()),
      thoughts: s.thoughtIndex,
      ctx: s.buffer.length,
      tokens: s.tokens,
      avgSec: Math.round(s.averageSeconds() * 10) / 10,
      model: this.opts.driver.model ?? "unknown",
      compressions: s.compressions,
      alive: this.isAlive,
      thinking: this.busy,
    };
  }

  snapshot(): LoopSnapshot {
    const s = this.state;
    return {
      status: this.status(),
      context: s.buffer.text,
      pendingMessages: s.pendingMessages.map((m) => ({ ...m })),
      thoughts: s.thoughtLog.toArray().map((t) => ({ ...t })),
      cooldowns: s.cooldowns.snapshot(),
      firedProbes: s.probes?.firedIndices() ?? [],
      emptyRetries: s.emptyRetries,
    };
  }

  /** Record a line in the dialogue list without involving the model (front-end echo). */
  note(content: string): void {
    this.state.pendingMessages.push({ content, timestamp: this.now().toISOString() });
  }

  // ─── The loop ───

  private async run(): Promise<void> {
    const s = this.state;
    Logger.info(`\n[${this.clock()}] Thinking started.`);
    Logger.info(`${"=".repeat(60)}\n${C.magenta(s.seed.trim().slice(0, 200))}\n${"=".repeat(60)}`);
    s.log.log("start", s.seed, { model: this.opts.driver.model });

    while (this.isAlive) {
      await this.step();
      await this.wakeSignal.wait(this.yieldMs);
    }

    this.channel.drain();
    this.finish();
  }

  /**
   * One pass: answer a pending human request, or think once (and fire a
   * probe if one is due). Never throws.
   */
  async step(): Promise<void> {
    const req = this.channel.take();
    if (req) {
      const reply = await this.answer(req.text);
      req.respond(reply || NO_RESPONSE);
      return;
    }
    const before = this.state.thoughtIndex;
    await this.thinkOnce();
    if (this.state.thoughtIndex > before) await this.fireProbe();
  }

  private async thinkOnce(): Promise<void> {
    const s = this.state;
    const { driver } = this.opts;
    this.busy = true;
    const t0 = Date.now();

    try {
      const gen = await driver.generate(s.buffer.text, PROFILES.thought);

      if (!gen.text) {
        this.onEmptyResponse(s);
        return;
      }
      s.emptyRetries = 0;

      const resolved = await s.buffer.resolveOpenCall(gen.text, gen.tokens, (prompt) =>
        driver.generate(prompt, PROFILES.continuation),
      );
      if (resolved.kind === "merged") {
        Logger.info(C.yellow("  Merged buffer tail tool_call"));
        s.log.log("continuation", "", { mode: "merged", tail: resolved.tailLength });
      } else if (resolved.kind === "continued") {
        const extra = resolved.tokens - gen.tokens;
        Logger.info(C.yellow(`  tool_call completion (+${extra}tok)`));
        s.log.log("continuation", "", { mode: "continued", tok: extra });
      }
      const text = resolved.text;

      s.thoughtIndex += 1;
      s.tokens += resolved.tokens;
      const dt = (Date.now() - t0) / 1000;
      s.durations.push(dt);
      const tps = dt > 0 ? resolved.tokens / dt : 0;

      const ctx: ToolContext = {
        thoughtIndex: s.thoughtIndex,
        cooldowns: s.cooldowns,
        pendingMessages: s.pendingMessages,
      };
      const { calls, sanitized } = await this.extractor.extract(text, (name, argument) =>
        this.executor.execute(name, argument, ctx),
      );

      s.buffer.append(composeAppend(sanitized, calls, text));

      const display = sanitized || "(tool call only)";
      Logger.info(C.dim(`\n━━━ #${s.thoughtIndex} [${dt.toFixed(1)}s ${tps.toFixed(0)}tok/s ctx:${s.buffer.length}] ━━━`));
      Logger.info(C.cyan(display.slice(0, 300)));
      for (const call of calls) {
        Logger.info(`  Tool: ${call.name} → ${call.result.slice(0, 80)}`);
      }

      s.thoughtLog.push({ sequence: s.thoughtIndex, content: sanitized || text.slice(0, 200) });
      s.log.log("thought", text, {
        dt: Math.round(dt * 100) / 100,
        tok: resolved.tokens,
        tps: Math.round(tps * 10) / 10,
        tools: calls.map((c) => c.name),
        sanitized_len: sanitized.length,
      });

      await this.maybeCompress(s);
    } catch (e: unknown) {
      this.logFailure(s, "Thought failed", e);
      await sleep(this.errorPauseMs);
    } finally {
      this.busy = false;
    }
  }

  private onEmptyResponse(s: LoopState): void {
    s.emptyRetries += 1;
    if (s.emptyRetries <= MAX_EMPTY_RETRIES) {
      const fillers = this.opts.prompts.fillers;
      s.buffer.append(fillers[(s.emptyRetries - 1) % fillers.length] ?? "");
      Logger.info(C.yellow(`  Empty response ${s.emptyRetries}/${MAX_EMPTY_RETRIES}`));
      s.log.log("empty_response", "", { retry: s.emptyRetries });
    } else {
      s.emptyRetries = 0;
    }
  }

  /** The human-turn path, shared by real messages and probes. */
  private async answer(message: string): Promise<string> {
    const s = this.state;
    s.log.log("human_input", message);
    this.busy = true;
    try {
      const injected = s.buffer.text + fillTemplate(this.opts.prompts.humanTurn, { message });
      const gen = await this.opts.driver.generate(injected, PROFILES.reply);
      s.tokens += gen.tokens;
      s.buffer.replace(injected + gen.text + "\n");
      s.log.log("dialog", gen.text, { human: message });
      s.log.dialog(message, gen.text);
      await this.maybeCompress(s);
      return gen.text;
    } catch (e: unknown) {
      this.logFailure(s, "Reply failed", e);
      return NO_RESPONSE;
    } finally {
      this.busy = false;
    }
  }

  private async fireProbe(): Promise<void> {
    const s = this.state;
    const text = s.probes?.take(s.thoughtIndex) ?? null;
    if (text === null) return;
    Logger.info(C.magenta(`  Probe @${s.thoughtIndex}: ${text.slice(0, 80)}`));
    s.log.log("probe", text, { at: s.thoughtIndex });
    const reply = await this.answer(text);
    const timestamp = this.now().toISOString();
    s.pendingMessages.push({ content: `[Probe] ${text}`, timestamp });
    s.pendingMessages.push({ content: `[AI] ${reply || NO_RESPONSE}`, timestamp });
  }

  private async maybeCompress(s: LoopState): Promise<void> {
    if (!s.buffer.exceeds(this.limitsValue.compressAtChars)) return;
    s.compressions += 1;
    await this.compressor.compress(s.buffer, this.limitsValue.compressAtChars, s.compressions);
  }

  private finish(): void {
    const s = this.state;
    Logger.info(`\n[${this.clock()}] Stopped. Uptime:${this.status().uptime} Thoughts:${s.thoughtIndex}`);
    s.log.log("stop", "", { thoughts: s.thoughtIndex, tokens: s.tokens });
    this.lastSession = null;
    if (s.thoughtIndex === 0 || !this.opts.sessions) return;
    try {
      const name = sessionName(s.log.stamp, this.opts.driver.model, s.thoughtIndex);
      this.lastSession = this.opts.sessions.save(name, revivalText(s.buffer.text, this.opts.prompts.toolReminder));
    } catch (e: unknown) {
      this.logFailure(s, "Session save failed", e);
    }
  }

  private freshState(seed: string): LoopState {
    return new LoopState(seed, this.opts.openLog, this.probeTemplate?.fresh() ?? null, this.now());
  }

  private logFailure(s: LoopState, what: string, e: unknown): void {
    const me = isMonologueError(e) ? e : monologueError("generation_error", asError(e).message, { cause: e });
    Logger.error(C.red(`[Error] ${what}: ${me.message}`));
    Logger.debug(errorLogFields(me));
    s.log.log("error", me.message, { what, kind: me.kind });
  }

  private clock(): string {
    return this.now().toTimeString().slice(0, 8);
  }
}
