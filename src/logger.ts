export const C = {
  reset: "\x1b[0m",
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
  dim: (s: string) => `\x1b[2m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  blue: (s: string) => `\x1b[34m${s}\x1b[0m`,
  magenta: (s: string) => `\x1b[35m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
};

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Receives formatted log lines instead of the console (used by the TUI). */
export type LogSink = (level: LogLevel, line: string) => void;

function format(args: unknown[]): string {
  return args
    .map((a) => (typeof a === "string" ? a : a instanceof Error ? a.message : JSON.stringify(a)))
    .join(" ");
}

export class Logger {
  private static _verbose = false;
  private static _sink: LogSink | null = null;

  static setVerbose(v: boolean) { Logger._verbose = v; }
  static isVerbose() { return Logger._verbose; }

  /** Route all output to `sink`; pass null to restore the console. */
  static redirect(sink: LogSink | null) { Logger._sink = sink; }

  static info(...args: unknown[]) {
    if (Logger._sink) { Logger._sink("info", format(args)); return; }
    console.log(...args);
  }

  static warn(...args: unknown[]) {
    if (Logger._sink) { Logger._sink("warn", format(args)); return; }
    console.warn(...args);
  }

  static error(...args: unknown[]) {
    if (Logger._sink) { Logger._sink("error", format(args)); return; }
    console.error(...args);
  }

  static debug(...args: unknown[]) {
    // Debug requires BOTH verbose mode AND MONOLOGUE_LOG_LEVEL=DEBUG
    const debugLevel = (process.env.MONOLOGUE_LOG_LEVEL ?? "").toUpperCase() === "DEBUG";
    if (!Logger._verbose || !debugLevel) return;
    if (Logger._sink) { Logger._sink("debug", format(args)); return; }
    console.log(...args);
  }
}
