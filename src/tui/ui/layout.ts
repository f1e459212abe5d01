import blessed from "blessed";
import { TextPanel } from "./text-panel.js";
import { LogsPanel } from "./logs-panel.js";

export interface Layout {
  statusBar: blessed.Widgets.BoxElement;
  dialoguePanel: TextPanel;
  thoughtsPanel: TextPanel;
  logsPanel: LogsPanel;
  inputBox: blessed.Widgets.TextareaElement;
  helpBar: blessed.Widgets.BoxElement;
  focusables: blessed.Widgets.BlessedElement[];
}

export const HELP_TEXT =
  " {bold}Enter{/bold}: Send  {bold}/help{/bold}: Commands  {bold}Tab{/bold}: Focus  {bold}Esc{/bold}: Input" +
  "  {bold}↑↓/jk{/bold}: Scroll  {bold}Ctrl+C{/bold}: Quit";

// ─── Arrow-key scroll helper ──────────────────────────────────────────────────
// Each scrollable box gets arrow-key + vim bindings when focused.
// The input box keeps its own arrow-key behaviour (cursor movement) so we
// only attach to the read-only panels.
function bindScrollKeys(
  el: blessed.Widgets.ScrollableBoxElement,
  screen: blessed.Widgets.Screen,
  scrollLines = 3,
): void {
  const page = () => (typeof el.height === "number" ? el.height : 10);

  el.key(["up", "k"], () => { el.scroll(-scrollLines); screen.render(); });
  el.key(["down", "j"], () => { el.scroll(scrollLines); screen.render(); });
  el.key(["pageup", "b"], () => { el.scroll(-page()); screen.render(); });
  el.key(["pagedown", "f"], () => { el.scroll(page()); screen.render(); });
  el.key(["g"], () => { el.setScrollPerc(0); screen.render(); }); // top
  el.key(["G", "S-g"], () => { el.setScrollPerc(100); screen.render(); }); // bottom
}

function scrollBox(
  screen: blessed.Widgets.Screen,
  label: string,
  color: string,
  pos: { left: string; top: string | number; width: string; height: string },
): blessed.Widgets.BoxElement {
  const box = blessed.box({
    parent: screen,
    label: ` ${label} `,
    ...pos,
    border: { type: "line" },
    scrollable: true,
    alwaysScroll: true,
    scrollbar: { ch: "│", style: { fg: color } },
    keys: true,
    vi: true,
    mouse: true,
    tags: true,
    wrap: true,
    style: {
      border: { fg: color },
      label: { fg: color, bold: true },
    },
  });
  bindScrollKeys(box, screen);
  return box;
}

// ─── Layout factory ───────────────────────────────────────────────────────────
//
//   ┌ status ───────────────────────────────────────────────┐
//   ├ Dialogue ──────────────┬ Thoughts ─────────────────────┤
//   │                        │                               │
//   ├ input ─────────────────┼ Logs ─────────────────────────┤
//   └ help ──────────────────┴───────────────────────────────┘
export function createLayout(screen: blessed.Widgets.Screen): Layout {
  const statusBar = blessed.box({
    parent: screen,
    top: 0,
    left: 0,
    width: "100%",
    height: 1,
    tags: true,
    style: { bg: "black", fg: "white" },
  });

  const helpBar = blessed.box({
    parent: screen,
    bottom: 0,
    left: 0,
    width: "100%",
    height: 1,
    tags: true,
    style: { bg: "blue", fg: "white" },
    content: HELP_TEXT,
  });

  const dialogueBox = scrollBox(screen, "Dialogue", "cyan", { left: "0", top: 1, width: "50%", height: "100%-5" });
  const thoughtsBox = scrollBox(screen, "Thoughts", "yellow", { left: "50%", top: 1, width: "50%", height: "60%-1" });

  const logsBox = blessed.log({
    parent: screen,
    label: " Logs ",
    left: "50%",
    top: "60%",
    width: "50%",
    height: "40%-1",
    border: { type: "line" },
    scrollable: true,
    alwaysScroll: true,
    scrollbar: { ch: "│", style: { fg: "magenta" } },
    keys: true,
    vi: true,
    mouse: true,
    tags: true,
    style: {
      border: { fg: "magenta" },
      label: { fg: "magenta", bold: true },
    },
  });
  bindScrollKeys(logsBox, screen);

  const inputBox = blessed.textarea({
    parent: screen,
    label: " Type here > ",
    left: 0,
    bottom: 1,
    width: "50%",
    height: 3,
    border: { type: "line" },
    inputOnFocus: true,
    mouse: true,
    keys: true,
    style: {
      border: { fg: "green" },
      label: { fg: "green", bold: true },
      focus: {
        border: { fg: "white" },
      },
    },
  });

  return {
    statusBar,
    dialoguePanel: new TextPanel(dialogueBox, screen, "bottom"),
    thoughtsPanel: new TextPanel(thoughtsBox, screen, "top"),
    logsPanel: new LogsPanel(logsBox, screen),
    inputBox,
    helpBar,
    focusables: [inputBox, dialogueBox, thoughtsBox, logsBox],
  };
}
