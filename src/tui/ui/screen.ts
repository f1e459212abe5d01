import blessed from "blessed";

// ─── Screen factory ───────────────────────────────────────────────────────────
export function createScreen(): blessed.Widgets.Screen {
  return blessed.screen({
    smartCSR: true,
    title: "monologue",
    fullUnicode: true,
  });
}

// ─── Global key bindings ──────────────────────────────────────────────────────
export function setupGlobalKeys(
  screen: blessed.Widgets.Screen,
  focusables: blessed.Widgets.BlessedElement[],
  inputBox: blessed.Widgets.TextareaElement,
  onQuit: () => void,
): void {
  let focusIndex = 0;

  const focusAt = (i: number) => {
    focusIndex = (i + focusables.length) % focusables.length;
    focusables[focusIndex]?.focus();
    screen.render();
  };

  // Quit
  screen.key(["C-c"], () => { onQuit(); });

  // ── Tab / Shift+Tab: cycle focus ──────────────────────────────────────────
  screen.key(["tab"], () => { focusAt(focusIndex + 1); });
  screen.key(["S-tab"], () => { focusAt(focusIndex - 1); });

  // ── Escape: return focus to input ─────────────────────────────────────────
  screen.key(["escape"], () => {
    focusIndex = 0;
    inputBox.focus();
    inputBox.readInput();
    screen.render();
  });
}
