import { Logger } from "../logger.js";
import { CommandRunner, parseCommand } from "../cli/commands.js";
import type { ThoughtLoop } from "../runtime/thought-loop.js";
import { createScreen, setupGlobalKeys } from "./ui/screen.js";
import { createLayout } from "./ui/layout.js";
import { formatDialogue, formatStatus, formatThoughts } from "./ui/format.js";

export const REFRESH_MS = 2_000;

export interface TuiOptions {
  loop: ThoughtLoop;
  commands: CommandRunner;
  /** Start the loop as soon as the screen is up. */
  autoStart: boolean;
}

/** Resolves once the user quits and the loop has stopped. */
export function runTui({ loop, commands, autoStart }: TuiOptions): Promise<void> {
  const screen = createScreen();
  const { statusBar, dialoguePanel, thoughtsPanel, logsPanel, inputBox, focusables } = createLayout(screen);

  Logger.redirect((level, line) => logsPanel.appendLog(line, level));

  const refresh = () => {
    const snap = loop.snapshot();
    statusBar.setContent(formatStatus(snap.status));
    dialoguePanel.update(formatDialogue(snap.pendingMessages));
    thoughtsPanel.update(formatThoughts(snap.thoughts));
    screen.render();
  };
  const timer = setInterval(refresh, REFRESH_MS);

  let quitting = false;
  let resolveDone: () => void = () => {};
  const done = new Promise<void>((resolve) => { resolveDone = resolve; });

  const quit = async () => {
    if (quitting) return;
    quitting = true;
    const result = await commands.run({ kind: "quit" });
    clearInterval(timer);
    screen.destroy();
    Logger.redirect(null);
    for (const line of result.lines) Logger.info(line);
    resolveDone();
  };

  const setWaiting = (waiting: boolean) => {
    inputBox.style.border = { fg: waiting ? "yellow" : "green" };
    inputBox.setLabel(waiting ? " Waiting... " : " Type here > ");
    screen.render();
  };

  const handleEnter = async () => {
    const cmd = parseCommand(inputBox.getValue());
    inputBox.clearValue();
    screen.render();
    if (!cmd) return;
    if (cmd.kind === "quit") {
      await quit();
      return;
    }
    setWaiting(true);
    if (cmd.kind === "say") {
      // the exchange shows up in the dialogue panel through the loop's notes
      refresh();
      const reply = await commands.say(cmd.text);
      if (reply === null) logsPanel.appendLog("Start first (/start)", "warn");
    } else {
      const result = await commands.run(cmd);
      for (const line of result.lines) logsPanel.appendLog(line, "info");
    }
    setWaiting(false);
    refresh();
    inputBox.focus();
    inputBox.readInput();
  };

  inputBox.key("enter", () => { void handleEnter(); });

  // Re-activate textarea after submit/cancel
  inputBox.on("submit", () => { inputBox.readInput(); });
  inputBox.on("cancel", () => { inputBox.readInput(); });

  // Click to focus input
  inputBox.on("click", () => {
    inputBox.focus();
    inputBox.readInput();
  });

  setupGlobalKeys(screen, focusables, inputBox, () => { void quit(); });

  // Start with input active
  inputBox.focus();
  inputBox.readInput();

  logsPanel.appendLog("Type /help for commands, /start to begin", "info");
  refresh();

  if (autoStart) {
    void commands.run({ kind: "start" }).then((r) => {
      for (const line of r.lines) logsPanel.appendLog(line, "info");
      refresh();
    });
  }

  return done;
}
