/**
 * Tool execution policy.
 *
 *   search   5-thought cooldown, then the search collaborator
 *   message  queued for the human, no cooldown
 *   other    logged as unknown
 *
 * execute() always resolves to a string; an empty string means "nothing
 * to feed back". The model is never told why a call produced nothing.
 */
import { Logger, C } from "../logger.js";
import { asError, errorLogFields, monologueError } from "../errors.js";
import type { EventSink } from "../runtime/event-log.js";
import type { SearchProvider } from "./cli-search.js";

export const SEARCH_COOLDOWN = 5;
/** Last-fired value for a tool that has never fired: the first call always passes. */
export const NEVER_FIRED = -10;

export interface PendingMessage {
  content: string;
  /** ISO-8601 */
  timestamp: string;
}

/** Thought index at which each rate-limited tool last fired. */
export class CooldownState {
  private readonly last = new Map<string, number>();

  lastFired(tool: string): number {
    return this.last.get(tool) ?? NEVER_FIRED;
  }

  /** Thoughts still to wait before `tool` may fire at `now`; 0 when free. */
  remaining(tool: string, now: number, cooldown: number): number {
    return Math.max(0, cooldown - (now - this.lastFired(tool)));
  }

  record(tool: string, now: number): void {
    this.last.set(tool, now);
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.last);
  }
}

export interface ToolContext {
  thoughtIndex: number;
  cooldowns: CooldownState;
  pendingMessages: PendingMessage[];
}

export interface ToolExecutorDeps {
  search: SearchProvider;
  events: EventSink;
  now?: () => Date;
}

export class ToolExecutor {
  private readonly now: () => Date;

  constructor(private readonly deps: ToolExecutorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async execute(name: string, argument: string, ctx: ToolContext): Promise<string> {
    try {
      switch (name) {
        case "search":
          return await this.search(argument, ctx);
        case "message":
          return this.message(argument, ctx);
        default:
          Logger.info(C.yellow(`  Unknown tool: ${name}`));
          this.deps.events.log("tool_unknown", argument, { tool: name });
          return "";
      }
    } catch (e: unknown) {
      const me = monologueError("tool_error", `Tool ${name} failed: ${asError(e).message}`, { cause: e });
      Logger.warn(me.message, errorLogFields(me));
      this.deps.events.log("tool_error", argument, { tool: name, error: me.message });
      return "";
    }
  }

  private async search(query: string, ctx: ToolContext): Promise<string> {
    const { events } = this.deps;
    const remaining = ctx.cooldowns.remaining("search", ctx.thoughtIndex, SEARCH_COOLDOWN);
    if (remaining > 0) {
      Logger.info(C.yellow(`  Search cooldown (${remaining} left)`));
      events.log("tool_blocked", query, { tool: "search", reason: "cooldown", remaining });
      return "";
    }
    ctx.cooldowns.record("search", ctx.thoughtIndex);
    events.log("search", query, { query });
    Logger.info(C.yellow(`  Search: ${query.slice(0, 60)}`));
    return this.deps.search.search(query);
  }

  private message(content: string, ctx: ToolContext): string {
    ctx.pendingMessages.push({ content, timestamp: this.now().toISOString() });
    Logger.info(C.magenta(`  Message: ${content.slice(0, 80)}`));
    ctx.cooldowns.record("message", ctx.thoughtIndex);
    this.deps.events.log("message_sent", content, { length: content.length });
    return "";
  }
}
