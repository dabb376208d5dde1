#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { Command } from "commander";
import { z } from "zod";
import { loadSettings, type LoadedSettings } from "./config.js";
import { errorMessage } from "./errors.js";
import { setLang, t } from "./i18n.js";
import { createRuntime, probeCapabilities } from "./runtime.js";
import { NlShell, printReport } from "./shell.js";
import { loadPatternLibrary } from "./translator/patterns.js";
import { Translator } from "./translator/translator.js";
import { CONFIG_DIR } from "./types.js";

const red = (s: string) => `\x1b[31m${s}\x1b[0m`;

interface CliOptions {
  command?: string;
  translate?: string;
  configDir: string;
  history: boolean;
}

function readVersion(): string {
  const pkg = z
    .object({ version: z.string() })
    .parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));
  return pkg.version;
}

function fatal(err: unknown): number {
  console.error(red("✗"), t("fatal_startup"), errorMessage(err));
  return 1;
}

// `nlsh -t <phrase>`: translation only, nothing runs
function printTranslation(loaded: LoadedSettings, phrase: string): number {
  const translator = new Translator(loadPatternLibrary(), { suggestionLimit: loaded.settings.suggestionLimit });
  const outcome = translator.translate(phrase);
  switch (outcome.type) {
    case "resolved":
      console.log(outcome.commandLine);
      return 0;
    case "ambiguous":
      console.error(t("ai_ambiguous", { phrase }));
      for (const [i, s] of outcome.suggestions.entries()) console.error(`  ${i + 1}. ${s}`);
      return 1;
    case "unrecognized":
      console.error(t("ai_unrecognized", { phrase }));
      return 1;
  }
}

// Resolves with an exit code, or null while the interactive shell runs
async function run(options: CliOptions): Promise<number | null> {
  let loaded: LoadedSettings;
  try {
    loaded = loadSettings(options.configDir);
  } catch (err) {
    return fatal(err);
  }
  setLang(loaded.settings.lang);

  if (options.translate !== undefined) return printTranslation(loaded, options.translate);

  const runtime = createRuntime({ ...loaded, history: options.history });
  try {
    await probeCapabilities(runtime);
  } catch (err) {
    runtime.logger.fatal({ err: errorMessage(err) }, "capability probe failed");
    return fatal(err);
  }

  if (options.command !== undefined) {
    const report = await runtime.loop.runCycle(options.command);
    printReport(report);
    return report.result && !report.result.succeeded ? 1 : 0;
  }

  new NlShell(runtime).start();
  return null;
}

const program = new Command();

program
  .name("nlsh")
  .description("Shell with built-in commands and natural-language phrases (ai <phrase>)")
  .version(readVersion(), "-V, --version")
  .option("-c, --command <line>", "run one command line and exit")
  .option("-t, --translate <phrase>", "print the command a phrase translates to and exit")
  .option("--config-dir <dir>", "configuration directory", CONFIG_DIR)
  .option("--no-history", "keep history in memory only")
  .action(async (options: CliOptions) => {
    const code = await run(options);
    if (code !== null) process.exitCode = code;
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(red("✗ Fatal:"), errorMessage(err));
  process.exit(1);
});
