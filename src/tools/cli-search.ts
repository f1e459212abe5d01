/**
 * Search collaborator backed by an external CLI (default: `claude -p`).
 *
 * The prompt goes in on stdin and the trimmed stdout is the answer. If the
 * executable is not on PATH at construction time, search is disabled for
 * the life of the process; every failure mode ends in an empty answer with
 * its own log status.
 */
import { spawn } from "node:child_process";
import { accessSync, constants } from "node:fs";
import { delimiter, join } from "node:path";
import { Logger, C } from "../logger.js";
import { asError } from "../errors.js";
import type { EventSink } from "../runtime/event-log.js";

export interface SearchProvider {
  readonly available: boolean;
  search(query: string): Promise<string>;
}

export interface CliSearchConfig {
  command: string;
  args: string[];
  timeoutMs: number;
  /** Turns the query into the natural-language instruction sent to the CLI. */
  prompt: (query: string) => string;
  events: EventSink;
}

export const DEFAULT_SEARCH_TIMEOUT_MS = 30_000;

/** Resolve `command` against PATH (and PATHEXT on Windows). */
export function findExecutable(command: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const exts = process.platform === "win32"
    ? (env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";")
    : [""];
  const dirs = command.includes("/") ? [""] : (env.PATH ?? "").split(delimiter).filter(Boolean);
  for (const dir of dirs) {
    for (const ext of exts) {
      const candidate = dir ? join(dir, command + ext) : command + ext;
      try {
        accessSync(candidate, constants.X_OK);
        return candidate;
      } catch {
        // not here
      }
    }
  }
  return null;
}

export class CliSearch implements SearchProvider {
  readonly available: boolean;

  constructor(private readonly cfg: CliSearchConfig) {
    this.available = findExecutable(cfg.command) !== null;
    if (this.available) {
      Logger.info(`${cfg.command} detected, search enabled`);
    } else {
      Logger.info(`${cfg.command} not found, search disabled (message tool still works)`);
    }
  }

  async search(query: string): Promise<string> {
    const { events } = this.cfg;
    if (!this.available) {
      Logger.info(C.yellow(`  Search skipped (no CLI): ${query.slice(0, 60)}`));
      events.log("search_result", "", { query, length: 0, status: "disabled" });
      return "";
    }

    const answer = await this.run(this.cfg.prompt(query));
    if (answer) {
      Logger.info(C.yellow(`  Search result: ${answer.length} chars`));
      events.log("search_result", answer, { query, length: answer.length, status: "ok" });
      return answer;
    }
    Logger.info(C.red(`  Search failed: ${query.slice(0, 60)}`));
    events.log("search_result", "", { query, length: 0, status: "empty" });
    return "";
  }

  private run(prompt: string): Promise<string> {
    const { command, args, timeoutMs, events } = this.cfg;
    return new Promise<string>((resolve) => {
      let stdout = "";
      let stderr = "";
      let settled = false;
      const finish = (value: string) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(value);
      };

      const proc = spawn(command, args, { stdio: ["pipe", "pipe", "pipe"], env: { ...process.env } });

      const timer = setTimeout(() => {
        Logger.warn(C.red(`  CLI timeout (${timeoutMs / 1000}s)`));
        events.log("cli_error", "timeout", { timeout: timeoutMs, prompt: prompt.slice(0, 100) });
        proc.kill("SIGTERM");
        finish("");
      }, timeoutMs);

      proc.stdout.on("data", (chunk: Buffer) => { stdout += chunk.toString("utf-8"); });
      proc.stderr.on("data", (chunk: Buffer) => { stderr += chunk.toString("utf-8"); });

      proc.on("error", (err) => {
        Logger.warn(C.red(`  CLI error: ${err.message}`));
        events.log("cli_error", err.message, { prompt: prompt.slice(0, 100) });
        finish("");
      });

      proc.on("close", () => {
        const errText = stderr.trim();
        if (errText) {
          Logger.warn(C.red(`  CLI stderr: ${errText.slice(0, 100)}`));
          events.log("cli_stderr", errText.slice(0, 300), { prompt: prompt.slice(0, 100) });
        }
        finish(stdout.trim());
      });

      proc.stdin.on("error", (err) => {
        Logger.debug(`search stdin closed early: ${asError(err).message}`);
      });
      proc.stdin.end(prompt, "utf-8");
    });
  }
}
