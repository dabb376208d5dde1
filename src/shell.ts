// ── Interactive Shell: built-in verbs + natural-language phrases in one REPL ──

import * as readline from "node:readline";
import { ErrorKind, errorMessage } from "./errors.js";
import { t } from "./i18n.js";
import type { Runtime } from "./runtime.js";
import type { CycleReport } from "./session/loop.js";

// ── ANSI colors ──
const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;
const cyan = (s: string) => `\x1b[36m${s}\x1b[0m`;
const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
const bold = (s: string) => `\x1b[1m${s}\x1b[0m`;
const magenta = (s: string) => `\x1b[35m${s}\x1b[0m`;

const CLEAR_SCREEN = "\x1b[2J\x1b[3J\x1b[H";

// ── Reporting (shared with `nlsh -c`) ──
export function printReport(
  report: CycleReport,
  out: NodeJS.WritableStream = process.stdout,
  err: NodeJS.WritableStream = process.stderr
): void {
  const { result, translation } = report;
  if (!result) return;

  if (translation) {
    out.write(magenta(t("shell_translated")) + dim(translation.commandLine) + "\n");
  }

  if (result.succeeded) {
    if (result.control === "clear") out.write(CLEAR_SCREEN);
    if (result.output) out.write(`${result.output}\n`);
    return;
  }

  if (result.errorKind === ErrorKind.Interrupted) {
    err.write(dim(t("shell_interrupted")) + "\n");
    return;
  }
  err.write(`${red("✗")} ${result.output}\n`);
}

type Completion = [string[], string];

export interface ShellIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  errorOutput: NodeJS.WritableStream;
  /** readline line editing, arrow-key history and completion */
  terminal: boolean;
  exit: (code: number) => void;
}

function processIO(): ShellIO {
  return {
    input: process.stdin,
    output: process.stdout,
    errorOutput: process.stderr,
    terminal: process.stdin.isTTY === true,
    exit: (code) => process.exit(code),
  };
}

// ── NlShell Class ──
export class NlShell {
  private rl: readline.Interface | null = null;
  private activeCycle: AbortController | null = null;
  private cmdQueue: Array<() => Promise<void>> = [];
  private isProcessing = false;
  private isClosing = false;
  private exitRequested = false;

  constructor(
    private readonly runtime: Runtime,
    private readonly io: ShellIO = processIO()
  ) {}

  start(): void {
    this.printWelcome();

    // Arrow-key history starts from the persisted one; readline wants newest first
    const previous = this.runtime.session.entries().map((e) => e.rawInput).reverse();

    const rl = readline.createInterface({
      input: this.io.input,
      output: this.io.output,
      prompt: this.buildPrompt(),
      terminal: this.io.terminal,
      history: previous,
      historySize: this.runtime.settings.historyLimit,
      completer: (line: string, callback: (err: Error | null, result: Completion) => void) => {
        this.complete(line).then(
          (result) => callback(null, result),
          () => callback(null, [[], line])
        );
      },
    });
    this.rl = rl;

    // Ctrl+C: abort the running cycle, or drop the half-typed line
    rl.on("SIGINT", () => {
      if (this.activeCycle) {
        this.activeCycle.abort();
        return;
      }
      rl.write(null, { ctrl: true, name: "e" });
      rl.write(null, { ctrl: true, name: "u" });
      this.io.output.write("\n");
      rl.prompt();
    });

    rl.on("line", (line) => {
      if (!line.trim()) {
        if (!this.isProcessing) rl.prompt();
        return;
      }
      this.enqueue(() => this.runLine(line));
    });

    rl.on("close", () => {
      if (this.isClosing) return; // already handled (e.g. "exit")
      this.isClosing = true;
      if (!this.isProcessing) {
        // Ctrl+D with an empty queue
        this.shutdown(dim(`\n${t("shell_bye")}\n`));
      }
      // Otherwise processQueue runs the pending lines, then exits
    });

    rl.prompt();
  }

  // ── Command Queue (ensures sequential execution) ──
  private enqueue(fn: () => Promise<void>): void {
    this.cmdQueue.push(fn);
    if (!this.isProcessing) void this.processQueue();
  }

  private async processQueue(): Promise<void> {
    this.isProcessing = true;
    let next = this.cmdQueue.shift();
    while (next) {
      await next();
      if (!this.isClosing && this.rl) {
        this.rl.setPrompt(this.buildPrompt());
        this.rl.prompt();
      }
      // End of input still runs what was already read; only exit drops the rest
      next = this.exitRequested ? undefined : this.cmdQueue.shift();
    }
    this.isProcessing = false;
    if (this.isClosing) this.shutdown(this.exitRequested ? "" : dim(`${t("shell_bye")}\n`));
  }

  // ── One cycle ──
  private async runLine(line: string): Promise<void> {
    const controller = new AbortController();
    this.activeCycle = controller;
    try {
      const report = await this.runtime.loop.runCycle(line, controller.signal);
      printReport(report, this.io.output, this.io.errorOutput);
      if (report.state === "Terminated") {
        const inputClosed = this.isClosing;
        this.exitRequested = true;
        this.isClosing = true;
        if (!inputClosed) this.rl?.close();
      }
    } catch (err) {
      this.io.errorOutput.write(`${red("✗")} ${errorMessage(err)}\n`);
    } finally {
      this.activeCycle = null;
    }
  }

  // ── Completion: verbs for the first word, then paths, then past lines ──
  private async complete(line: string): Promise<Completion> {
    const { session, fs } = this.runtime;
    if (!/\s/.test(line.trimStart())) return [session.complete(line), line];

    const word = line.slice(line.search(/\S*$/));
    const slash = word.lastIndexOf("/");
    const dirPart = slash >= 0 ? word.slice(0, slash + 1) : "";
    const base = word.slice(dirPart.length);

    try {
      const entries = await fs.list(dirPart ? dirPart : ".");
      const paths = entries
        .filter((e) => e.name.startsWith(base))
        .map((e) => `${dirPart}${e.name}${e.isDirectory ? "/" : ""}`);
      if (paths.length > 0) return [paths, word];
    } catch (err) {
      // unreadable or missing directory: fall through to history
      this.runtime.logger.debug({ dir: dirPart, err: errorMessage(err) }, "path completion failed");
    }
    return [session.complete(line), line];
  }

  // ── Prompt ──
  private buildPrompt(): string {
    const { user, host } = this.runtime.dispatcher.currentIdentity();
    const home = this.runtime.fs.home();
    const cwd = this.runtime.fs.cwd();
    const shortCwd = cwd === home || cwd.startsWith(`${home}/`) ? `~${cwd.slice(home.length)}` : cwd;
    return `${green(`${user}@${host}`)}:${cyan(shortCwd)}$ `;
  }

  // ── Welcome ──
  private printWelcome(): void {
    this.io.output.write(`${bold("nlsh")}${dim(t("welcome_subtitle"))}\n`);
    this.io.output.write(`${dim(t("welcome_hint"))}\n\n`);
  }

  private shutdown(message: string): void {
    this.runtime.session.persist();
    this.runtime.logger.info("session closed");
    this.io.output.write(message);
    this.io.exit(0);
  }
}
