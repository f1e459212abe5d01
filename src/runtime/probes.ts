/**
 * Experiment protocol: scripted messages injected at fixed thought indices
 * so an agent's behaviour can be observed without a human steering it.
 *
 * File format:
 *   { "probes": [{ "at": 20, "text": "..." }, ...] }
 */
import { readFileSync } from "node:fs";
import { asError, monologueError } from "../errors.js";

export interface ProbeDefinition {
  at: number;
  text: string;
}

export class ProbeSchedule {
  private readonly probes = new Map<number, string>();
  private readonly fired = new Set<number>();

  constructor(definitions: ProbeDefinition[] = []) {
    for (const d of definitions) this.probes.set(d.at, d.text);
  }

  /**
   * Probe text due at `thoughtIndex`, marking it fired. Each index fires at
   * most once per schedule.
   */
  take(thoughtIndex: number): string | null {
    const text = this.probes.get(thoughtIndex);
    if (text === undefined || this.fired.has(thoughtIndex)) return null;
    this.fired.add(thoughtIndex);
    return text;
  }

  firedIndices(): number[] {
    return [...this.fired].sort((a, b) => a - b);
  }

  /** Same probes, nothing fired. */
  fresh(): ProbeSchedule {
    return new ProbeSchedule([...this.probes].map(([at, text]) => ({ at, text })));
  }
}

export function parseProbeFile(raw: unknown, file = "experiment"): ProbeDefinition[] {
  if (typeof raw !== "object" || raw === null || !("probes" in raw) || !Array.isArray(raw.probes)) {
    throw monologueError("config_error", `${file}: expected { "probes": [...] }`);
  }
  const list: unknown[] = raw.probes;
  return list.map((entry, i) => {
    if (typeof entry !== "object" || entry === null || !("at" in entry) || !("text" in entry)) {
      throw monologueError("config_error", `${file}: probes[${i}] needs "at" and "text"`);
    }
    const { at, text } = entry;
    if (typeof at !== "number" || !Number.isInteger(at) || at < 1 || typeof text !== "string") {
      throw monologueError("config_error", `${file}: probes[${i}] has an invalid "at" or "text"`);
    }
    return { at, text };
  });
}

export function loadProbeFile(path: string): ProbeDefinition[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e: unknown) {
    throw monologueError("config_error", `Failed to read experiment file ${path}: ${asError(e).message}`, { cause: e });
  }
  return parseProbeFile(raw, path);
}
