/**
 * Everything a reset throws away, in one object.
 *
 * Seed apply and session revival build a new LoopState and swap it in with
 * a single assignment, so the buffer, counters, cooldowns, fired probes and
 * thought log can never be observed half-reset.
 */
import { ContextBuffer } from "../context/context-buffer.js";
import { CooldownState, type PendingMessage } from "../tools/executor.js";
import { RingBuffer } from "../utils/ring-buffer.js";
import type { DialogSink, EventSink } from "./event-log.js";
import type { ProbeSchedule } from "./probes.js";

export const THOUGHT_LOG_CAPACITY = 100;

export interface ThoughtRecord {
  sequence: number;
  content: string;
}

/** Event + dialog logging for one lifetime of the state. */
export interface LoopLog extends EventSink, DialogSink {
  /** Rename log files with the model name once it is known. */
  tagWithModel?(modelTag: string): void;
  readonly stamp: string;
}

export class LoopState {
  readonly buffer: ContextBuffer;
  readonly birth: Date;
  readonly log: LoopLog;
  readonly cooldowns = new CooldownState();
  readonly thoughtLog = new RingBuffer<ThoughtRecord>(THOUGHT_LOG_CAPACITY);
  readonly pendingMessages: PendingMessage[] = [];

  thoughtIndex = 0;
  compressions = 0;
  tokens = 0;
  emptyRetries = 0;
  /** Seconds per completed thought. */
  readonly durations: number[] = [];

  constructor(
    readonly seed: string,
    openLog: (thoughtIndex: () => number) => LoopLog,
    readonly probes: ProbeSchedule | null,
    now: Date = new Date(),
  ) {
    this.buffer = new ContextBuffer(seed);
    this.birth = now;
    this.log = openLog(() => this.thoughtIndex);
  }

  averageSeconds(): number {
    if (this.durations.length === 0) return 0;
    return this.durations.reduce((a, b) => a + b, 0) / this.durations.length;
  }
}
