/**
 * Slash commands shared by the TUI and headless front-ends.
 *
 *   /start  /stop  /status  /sessions  /revive <name>
 *   /preview <name>  /delete-session <name>
 *   /seeds  /seed <name>  /save-seed <name> [text]  /delete-seed <name>
 *   /limits [<compress> <max>]  /help  /quit
 *
 * Anything that does not start with "/" is a message for the agent.
 */
import { asError, isMonologueError } from "../errors.js";
import type { ThoughtLoop } from "../runtime/thought-loop.js";
import type { SeedStore, SessionStore } from "../session.js";
import { saveLimits } from "./config.js";

export type Command =
  | { kind: "start" }
  | { kind: "stop" }
  | { kind: "status" }
  | { kind: "sessions" }
  | { kind: "revive"; name: string }
  | { kind: "preview"; name: string }
  | { kind: "delete-session"; name: string }
  | { kind: "seeds" }
  | { kind: "seed"; name: string }
  | { kind: "delete-seed"; name: string }
  | { kind: "save-seed"; name: string; text?: string }
  | { kind: "limits"; compressAtChars?: number; maxContextChars?: number }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "say"; text: string }
  | { kind: "invalid"; reason: string };

export const COMMAND_HELP = [
  "/start                     start thinking",
  "/stop                      stop and save the session",
  "/status                    loop statistics",
  "/sessions                  list saved sessions",
  "/revive <name>             reset from a saved session (stopped only)",
  "/preview <name>            show the start of a saved session",
  "/delete-session <name>     delete a saved session",
  "/seeds                     list saved seeds",
  "/seed <name>               reset from a saved seed (stopped only)",
  "/save-seed <name> [text]   save text (default: the current seed) as a seed",
  "/delete-seed <name>        delete a saved seed",
  "/limits [<compress> <max>] show or set the compression limits",
  "/quit                      stop and exit",
  "anything else              message the agent",
];

/** null for a blank line. */
export function parseCommand(line: string): Command | null {
  const text = line.trim();
  if (!text) return null;
  if (!text.startsWith("/")) return { kind: "say", text };

  const [head = "", ...rest] = text.slice(1).split(/\s+/);
  const arg = rest.join(" ");
  const needName = (kind: "revive" | "preview" | "delete-session" | "seed" | "delete-seed"): Command =>
    arg ? { kind, name: arg } : { kind: "invalid", reason: `/${kind} needs a name` };

  switch (head.toLowerCase()) {
    case "start": return { kind: "start" };
    case "stop": return { kind: "stop" };
    case "status": return { kind: "status" };
    case "sessions": return { kind: "sessions" };
    case "revive": return needName("revive");
    case "preview": return needName("preview");
    case "delete-session": return needName("delete-session");
    case "seeds": return { kind: "seeds" };
    case "seed": return needName("seed");
    case "delete-seed": return needName("delete-seed");
    case "save-seed": {
      const [name, ...words] = rest;
      if (!name) return { kind: "invalid", reason: "/save-seed needs a name" };
      return words.length ? { kind: "save-seed", name, text: words.join(" ") } : { kind: "save-seed", name };
    }
    case "limits": {
      if (rest.length === 0) return { kind: "limits" };
      const [c, m] = rest.map(Number);
      if (rest.length !== 2 || c === undefined || m === undefined || !Number.isInteger(c) || !Number.isInteger(m)) {
        return { kind: "invalid", reason: "usage: /limits <compress> <max>" };
      }
      return { kind: "limits", compressAtChars: c, maxContextChars: m };
    }
    case "help": return { kind: "help" };
    case "quit":
    case "exit": return { kind: "quit" };
    default: return { kind: "invalid", reason: `Unknown command: /${head}` };
  }
}

export interface CommandRunnerDeps {
  loop: ThoughtLoop;
  sessions: SessionStore;
  seeds: SeedStore;
  /** Where changed limits are persisted. */
  configFile: string;
}

export interface CommandResult {
  lines: string[];
  quit?: boolean;
}

const fmt = (n: number) => n.toLocaleString("en-US");

export class CommandRunner {
  constructor(private readonly deps: CommandRunnerDeps) {}

  /** Send a message to the running loop; the exchange is also noted in the dialogue list. */
  async say(text: string): Promise<string | null> {
    const { loop } = this.deps;
    if (!loop.alive) return null;
    loop.note(`[You] ${text}`);
    const reply = await loop.speak(text);
    loop.note(`[AI] ${reply}`);
    return reply;
  }

  async run(cmd: Command): Promise<CommandResult> {
    try {
      return await this.dispatch(cmd);
    } catch (e: unknown) {
      const msg = isMonologueError(e) ? e.message : asError(e).message;
      return { lines: [`Error: ${msg}`] };
    }
  }

  private async dispatch(cmd: Command): Promise<CommandResult> {
    const { loop, sessions, seeds } = this.deps;
    switch (cmd.kind) {
      case "start": {
        if (loop.alive) return { lines: ["Already running"] };
        const ok = await loop.start();
        return { lines: [ok ? `Started (${loop.status().model})` : "Backend unreachable or no model loaded"] };
      }
      case "stop": {
        if (!loop.alive) return { lines: ["Not running"] };
        const path = await loop.stop();
        return { lines: path ? ["Stopped", `Session saved: ${path}`] : ["Stopped"] };
      }
      case "status": {
        const s = loop.status();
        return {
          lines: [
            `${s.alive ? (s.thinking ? "thinking" : "running") : "stopped"} | up ${s.uptime} | #${s.thoughts} | ctx ${fmt(s.ctx)}`,
            `tokens ${fmt(s.tokens)} | avg ${s.avgSec}s | compressions ${s.compressions} | model ${s.model}`,
          ],
        };
      }
      case "sessions": {
        const names = sessions.list();
        return { lines: names.length ? names : ["(no sessions)"] };
      }
      case "revive": {
        const r = loop.revive(cmd.name);
        return { lines: [r.ok ? `Revived ${cmd.name} (${fmt(r.chars)} chars)` : r.reason] };
      }
      case "preview": {
        const text = sessions.preview(cmd.name);
        return { lines: text ? text.split("\n") : [`Session not found: ${cmd.name}`] };
      }
      case "delete-session":
        return {
          lines: [sessions.remove(cmd.name) ? `Session deleted: ${cmd.name}` : `Session not found: ${cmd.name}`],
        };
      case "seeds": {
        const names = seeds.list();
        return { lines: names.length ? names : ["(no seeds)"] };
      }
      case "seed": {
        if (loop.alive) return { lines: ["Stop first"] };
        const text = seeds.load(cmd.name);
        if (text === null) return { lines: [`Seed not found: ${cmd.name}`] };
        if (!loop.reset(text)) return { lines: ["Stop first"] };
        return { lines: [`Seed applied: ${cmd.name} (${fmt(text.length)} chars)`] };
      }
      case "delete-seed":
        return { lines: [seeds.remove(cmd.name) ? `Seed deleted: ${cmd.name}` : `Seed not found: ${cmd.name}`] };
      case "save-seed": {
        const path = seeds.save(cmd.name, cmd.text ?? loop.seed);
        return { lines: [`Seed saved: ${path}`] };
      }
      case "limits": {
        if (cmd.compressAtChars === undefined || cmd.maxContextChars === undefined) {
          const l = loop.limits;
          return { lines: [`compress:${fmt(l.compressAtChars)} max:${fmt(l.maxContextChars)}`] };
        }
        const l = loop.setLimits({ compressAtChars: cmd.compressAtChars, maxContextChars: cmd.maxContextChars });
        saveLimits(this.deps.configFile, l);
        return { lines: [`Limits set: compress:${fmt(l.compressAtChars)} max:${fmt(l.maxContextChars)}`] };
      }
      case "help":
        return { lines: COMMAND_HELP };
      case "quit": {
        const lines: string[] = [];
        if (loop.alive) {
          const path = await loop.stop();
          if (path) lines.push(`Session saved: ${path}`);
        }
        return { lines, quit: true };
      }
      case "say": {
        const reply = await this.say(cmd.text);
        return { lines: reply === null ? ["Start first (/start)"] : [`[AI] ${reply}`] };
      }
      case "invalid":
        return { lines: [cmd.reason] };
    }
  }
}
