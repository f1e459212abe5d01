/**
 * Line mode: each stdin line is a slash command or a message for the
 * agent; replies and command output go to stdout. EOF quits.
 */
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { CommandRunner, parseCommand } from "./cli/commands.js";

export interface HeadlessOptions {
  commands: CommandRunner;
  input?: Readable;
  output?: Writable;
  autoStart: boolean;
}

export async function runHeadless({
  commands,
  input = process.stdin,
  output = process.stdout,
  autoStart,
}: HeadlessOptions): Promise<void> {
  const print = (lines: string[]) => {
    for (const line of lines) output.write(line + "\n");
  };

  if (autoStart) print((await commands.run({ kind: "start" })).lines);

  const rl = createInterface({ input, terminal: false });
  for await (const line of rl) {
    const cmd = parseCommand(line);
    if (!cmd) continue;
    const result = await commands.run(cmd);
    print(result.lines);
    if (result.quit) {
      rl.close();
      return;
    }
  }
  print((await commands.run({ kind: "quit" })).lines);
}
