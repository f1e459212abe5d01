import { mkdirSync, writeFileSync, readFileSync, existsSync, readdirSync, rmSync } from "node:fs";
import { join, basename } from "node:path";
import { Logger } from "./logger.js";
import { monologueError, asError, errorLogFields } from "./errors.js";

/**
 * Session and seed persistence.
 *
 * Layout:
 *   sessions/
 *     <stamp>_<model>_n<thoughts>.txt   revival text, read back verbatim as a seed
 *   seeds/
 *     <name>.json                        { name, seed }
 */

const PREVIEW_CHARS = 300;

/** Buffer trimmed at the end, a blank line, then the tool reminder. */
export function revivalText(buffer: string, reminder: string): string {
  return buffer.trimEnd() + "\n\n" + reminder;
}

/** Filesystem-safe model tag: separators and spaces to `_`, last 50 characters. */
export function modelTag(model: string | null): string {
  if (!model) return "unknown";
  const tag = model.replace(/[/\\ ]/g, "_");
  return tag.length > 50 ? tag.slice(-50) : tag;
}

export function sessionName(stamp: string, model: string | null, thoughts: number): string {
  return `${stamp}_${modelTag(model)}_n${thoughts}`;
}

function checkName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed || basename(trimmed) !== trimmed || trimmed.startsWith(".")) {
    throw monologueError("session_error", `Invalid name: "${name}"`);
  }
  return trimmed;
}

function listStems(dir: string, ext: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((f) => f.endsWith(ext))
    .map((f) => f.slice(0, -ext.length));
}

export class SessionStore {
  constructor(readonly dir: string) {}

  /** Write `text` as `<name>.txt`; returns the path. */
  save(name: string, text: string): string {
    const path = join(this.dir, `${checkName(name)}.txt`);
    try {
      mkdirSync(this.dir, { recursive: true });
      writeFileSync(path, text, "utf-8");
    } catch (e: unknown) {
      throw monologueError("session_error", `Failed to save session ${path}: ${asError(e).message}`, { cause: e });
    }
    Logger.info(`Session saved: ${path} (${text.length.toLocaleString("en-US")} chars)`);
    return path;
  }

  /** Session names, newest first. */
  list(): string[] {
    return listStems(this.dir, ".txt").sort().reverse();
  }

  read(name: string): string | null {
    const path = join(this.dir, `${checkName(name)}.txt`);
    if (!existsSync(path)) return null;
    return readFileSync(path, "utf-8");
  }

  preview(name: string): string {
    const text = this.read(name);
    if (text === null) return "";
    return `[${text.length.toLocaleString("en-US")} chars]\n\n${text.slice(0, PREVIEW_CHARS)}...`;
  }

  remove(name: string): boolean {
    const path = join(this.dir, `${checkName(name)}.txt`);
    if (!existsSync(path)) return false;
    rmSync(path);
    return true;
  }
}

export class SeedStore {
  constructor(readonly dir: string) {}

  list(): string[] {
    return listStems(this.dir, ".json").sort();
  }

  save(name: string, seed: string): string {
    const clean = checkName(name);
    const path = join(this.dir, `${clean}.json`);
    try {
      mkdirSync(this.dir, { recursive: true });
      writeFileSync(path, JSON.stringify({ name: clean, seed }, null, 2), "utf-8");
    } catch (e: unknown) {
      throw monologueError("session_error", `Failed to save seed ${path}: ${asError(e).message}`, { cause: e });
    }
    return path;
  }

  load(name: string): string | null {
    const path = join(this.dir, `${checkName(name)}.json`);
    if (!existsSync(path)) return null;
    try {
      const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
      if (typeof parsed === "object" && parsed !== null && "seed" in parsed && typeof parsed.seed === "string") {
        return parsed.seed;
      }
      return "";
    } catch (e: unknown) {
      const me = monologueError("session_error", `Failed to parse seed ${path}`, { cause: e });
      Logger.warn(me.message, errorLogFields(me));
      return null;
    }
  }

  remove(name: string): boolean {
    const path = join(this.dir, `${checkName(name)}.json`);
    if (!existsSync(path)) return false;
    rmSync(path);
    return true;
  }
}
