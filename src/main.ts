#!/usr/bin/env node
/**
 * monologue: an autonomous thought loop over an OpenAI-compatible
 * completion backend, with search and message tools, human interrupts
 * and buffer compression.
 */

import { readFileSync } from "node:fs";
import { Logger, C } from "./logger.js";
import { asError, errorLogFields, isMonologueError, monologueError } from "./errors.js";
import { helpText, parseArgs, resolveLimits, type MonologueConfig } from "./cli/config.js";
import { CommandRunner } from "./cli/commands.js";
import { fillTemplate, loadPromptPack, type PromptPack } from "./prompts.js";
import { makeCompletionsDriver } from "./drivers/completions.js";
import { CliSearch, DEFAULT_SEARCH_TIMEOUT_MS } from "./tools/cli-search.js";
import type { SearchProvider } from "./tools/cli-search.js";
import { SeedStore, SessionStore } from "./session.js";
import { EventLog, logStamp, type EventSink } from "./runtime/event-log.js";
import { loadProbeFile, type ProbeDefinition } from "./runtime/probes.js";
import { ThoughtLoop } from "./runtime/thought-loop.js";
import { runHeadless } from "./headless.js";
import { runTui } from "./tui/main.js";
import { getVersion } from "./version.js";

/** Stand-in for --no-search: every call resolves empty and is logged as disabled. */
function disabledSearch(events: EventSink): SearchProvider {
  return {
    available: false,
    search: async (query) => {
      events.log("search_result", "", { query, length: 0, status: "disabled" });
      return "";
    },
  };
}

/** Starting buffer: a revived session, a seed file, or the locale's default seed. */
function initialSeed(config: MonologueConfig, prompts: PromptPack, sessions: SessionStore): string {
  if (config.revive) {
    const text = sessions.read(config.revive);
    if (text === null) throw monologueError("session_error", `Session not found: ${config.revive}`);
    Logger.info(`Revived ${config.revive} (${text.length.toLocaleString("en-US")} chars)`);
    return text;
  }
  if (config.seedFile) {
    try {
      return readFileSync(config.seedFile, "utf-8");
    } catch (e: unknown) {
      throw monologueError("config_error", `Failed to read seed file ${config.seedFile}: ${asError(e).message}`, { cause: e });
    }
  }
  return prompts.seed;
}

function buildLoop(config: MonologueConfig): { loop: ThoughtLoop; commands: CommandRunner } {
  const prompts = loadPromptPack(config.locale);
  const limits = resolveLimits(config);
  const sessions = new SessionStore(config.sessionsDir);
  const seeds = new SeedStore(config.seedsDir);
  const probes: ProbeDefinition[] = config.experiment ? loadProbeFile(config.experiment) : [];
  if (probes.length) Logger.info(C.magenta(`Experiment: ${probes.length} probes from ${config.experiment}`));

  const driver = makeCompletionsDriver({ baseUrl: config.url, chatSystemPrompt: prompts.chatSystemPrompt });

  const loop = new ThoughtLoop({
    driver,
    prompts,
    limits,
    sessions,
    probes,
    seed: initialSeed(config, prompts, sessions),
    search: (events) =>
      config.search
        ? new CliSearch({
            command: config.searchCommand,
            args: config.searchArgs,
            timeoutMs: DEFAULT_SEARCH_TIMEOUT_MS,
            prompt: (query) => fillTemplate(prompts.searchPrompt, { query }),
            events,
          })
        : disabledSearch(events),
    openLog: (thoughtIndex) => new EventLog(config.logDir, logStamp(), thoughtIndex),
  });

  return { loop, commands: new CommandRunner({ loop, sessions, seeds, configFile: config.configFile }) };
}

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const parsed = parseArgs(argv);
  if (parsed.kind === "help") {
    console.log(helpText());
    return;
  }
  if (parsed.kind === "version") {
    console.log(`monologue ${getVersion()}`);
    return;
  }

  const { config } = parsed;
  Logger.setVerbose(config.verbose);
  const { loop, commands } = buildLoop(config);

  // Signals stop the loop, which saves the session
  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.on(sig, () => {
      Logger.info(C.gray(`\nreceived ${sig}, saving session and shutting down...`));
      loop.stop().then(
        () => process.exit(0),
        (e: unknown) => {
          Logger.error(C.red(`shutdown failed: ${asError(e).message}`));
          process.exit(1);
        },
      );
    });
  }

  if (config.headless) {
    await runHeadless({ commands, autoStart: true });
  } else {
    await runTui({ loop, commands, autoStart: false });
  }
  process.exit(0);
}

main().catch((e: unknown) => {
  const err = asError(e);
  Logger.error(C.red(`monologue: ${err.message}`));
  if (isMonologueError(e)) Logger.debug(errorLogFields(e));
  process.exit(1);
});
