/**
 * Append-only JSONL logs.
 *
 * Layout:
 *   <logDir>/
 *     full_<stamp>[_<model>].jsonl    one {n, k, c, ...meta} per event
 *     dialog_<stamp>[_<model>].jsonl  one {n, h, a} per human exchange
 */
import { appendFileSync, existsSync, mkdirSync, renameSync } from "node:fs";
import { join } from "node:path";
import { Logger } from "../logger.js";
import { asError, errorLogFields, monologueError } from "../errors.js";

export type EventKind =
  | "start"
  | "thought"
  | "search"
  | "search_result"
  | "tool_blocked"
  | "tool_unknown"
  | "tool_error"
  | "message_sent"
  | "cli_stderr"
  | "cli_error"
  | "compress"
  | "compress_failed"
  | "continuation"
  | "empty_response"
  | "human_input"
  | "dialog"
  | "probe"
  | "error"
  | "stop";

export interface EventSink {
  log(kind: EventKind, content: string, meta?: Record<string, unknown>): void;
}

export interface DialogSink {
  dialog(human: string, agent: string): void;
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function logStamp(d: Date = new Date()): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}${p(d.getMonth() + 1)}${p(d.getDate())}_${p(d.getHours())}${p(d.getMinutes())}${p(d.getSeconds())}`;
}

export class EventLog implements EventSink, DialogSink {
  private fullPath: string;
  private dialogPath: string;

  constructor(
    private readonly logDir: string,
    readonly stamp: string,
    private readonly thoughtIndex: () => number,
  ) {
    mkdirSync(logDir, { recursive: true });
    this.fullPath = join(logDir, `full_${stamp}.jsonl`);
    this.dialogPath = join(logDir, `dialog_${stamp}.jsonl`);
  }

  get eventFile(): string { return this.fullPath; }
  get dialogFile(): string { return this.dialogPath; }

  log(kind: EventKind, content: string, meta: Record<string, unknown> = {}): void {
    this.append(this.fullPath, { n: this.thoughtIndex(), k: kind, c: content, ...meta });
  }

  dialog(human: string, agent: string): void {
    this.append(this.dialogPath, { n: this.thoughtIndex(), h: human, a: agent });
  }

  /** Rename both files to carry the model tag once the model is known. */
  tagWithModel(modelTag: string): void {
    const nextFull = join(this.logDir, `full_${this.stamp}_${modelTag}.jsonl`);
    const nextDialog = join(this.logDir, `dialog_${this.stamp}_${modelTag}.jsonl`);
    try {
      if (existsSync(this.fullPath)) renameSync(this.fullPath, nextFull);
      this.fullPath = nextFull;
      if (existsSync(this.dialogPath)) renameSync(this.dialogPath, nextDialog);
      this.dialogPath = nextDialog;
      Logger.info(`Log: ${nextFull}`);
    } catch (e: unknown) {
      Logger.warn(`Log rename failed: ${asError(e).message}`);
    }
  }

  private append(path: string, record: Record<string, unknown>): void {
    try {
      appendFileSync(path, JSON.stringify(record) + "\n", "utf-8");
    } catch (e: unknown) {
      const me = monologueError("session_error", `Failed to append to ${path}`, { cause: e });
      Logger.warn(me.message, errorLogFields(me));
    }
  }
}
