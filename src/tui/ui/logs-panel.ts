import blessed from "blessed";
import type { LogLevel } from "../../logger.js";

const ANSI = /\x1b\[[0-9;]*m/g;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "gray",
  info: "blue",
  warn: "yellow",
  error: "red",
};

export class LogsPanel {
  constructor(
    private logWidget: blessed.Widgets.Log,
    private screen: blessed.Widgets.Screen,
  ) {}

  /** Each line of `text` gets its own entry; terminal colour codes are dropped. */
  appendLog(text: string, level?: LogLevel): void {
    const prefix = level ? `{${LEVEL_COLORS[level]}-fg}[${level}]{/${LEVEL_COLORS[level]}-fg} ` : "";
    for (const line of text.replace(ANSI, "").split("\n")) {
      if (!line.trim()) continue;
      this.logWidget.log(prefix + blessed.escape(line));
    }
    this.screen.render();
  }
}
