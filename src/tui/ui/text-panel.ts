import blessed from "blessed";

/** A box whose whole content is replaced on each refresh. */
export class TextPanel {
  private last = "";

  constructor(
    private box: blessed.Widgets.BoxElement,
    private screen: blessed.Widgets.Screen,
    /** Keep the view pinned to the bottom (newest last) or the top (newest first). */
    private pin: "top" | "bottom",
  ) {}

  update(content: string): void {
    if (content === this.last) return;
    this.last = content;
    this.box.setContent(content);
    this.box.setScrollPerc(this.pin === "bottom" ? 100 : 0);
    this.screen.render();
  }
}
