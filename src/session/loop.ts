// ── Session loop: one input line per cycle ──
//
//   Idle → Reading → (Translating) → Dispatching → Reporting → Idle | Terminated
//
// A cycle always ends in Reporting, whatever went wrong along the way, and
// only Reporting may move the loop to Terminated.

import type { Dispatcher } from "../dispatcher/dispatcher.js";
import { EmptyInputError, ErrorKind } from "../errors.js";
import { t } from "../i18n.js";
import { createChildLogger, silentLogger, type Logger } from "../logger.js";
import { restAfterVerb, tokenize } from "../tokenizer.js";
import type { Translator } from "../translator/translator.js";
import { TRANSLATOR_VERB, type CommandResult, type HistoryEntry, type Token } from "../types.js";
import type { SessionState } from "./state.js";

export type LoopState = "Idle" | "Reading" | "Translating" | "Dispatching" | "Reporting" | "Terminated";

export interface CycleReport {
  input: string;
  /** null for blank input, which is neither run nor recorded */
  result: CommandResult | null;
  /** Set when a phrase resolved to a command line */
  translation?: { commandLine: string; ruleId: string; description: string };
  recorded: HistoryEntry | null;
  state: LoopState;
}

export interface SessionLoopDeps {
  translator: Translator;
  dispatcher: Dispatcher;
  session: SessionState;
  translatorVerb?: string;
  logger?: Logger;
}

export class SessionLoop {
  private current: LoopState = "Idle";
  private readonly translator: Translator;
  private readonly dispatcher: Dispatcher;
  private readonly session: SessionState;
  private readonly translatorVerb: string;
  private readonly log: Logger;

  constructor(deps: SessionLoopDeps) {
    this.translator = deps.translator;
    this.dispatcher = deps.dispatcher;
    this.session = deps.session;
    this.translatorVerb = deps.translatorVerb ?? TRANSLATOR_VERB;
    this.log = createChildLogger(deps.logger ?? silentLogger(), "session");
  }

  get state(): LoopState {
    return this.current;
  }

  get terminated(): boolean {
    return this.current === "Terminated";
  }

  async runCycle(line: string, signal?: AbortSignal): Promise<CycleReport> {
    if (this.current === "Terminated") throw new Error("session has terminated");
    this.current = "Reading";

    let token: Token;
    try {
      token = tokenize(line);
    } catch (err) {
      if (!(err instanceof EmptyInputError)) throw err;
      this.current = "Idle";
      return { input: line, result: null, recorded: null, state: this.current };
    }

    let result: CommandResult;
    let translation: CycleReport["translation"];

    if (token.verb.toLowerCase() === this.translatorVerb) {
      this.current = "Translating";
      const phrase = restAfterVerb(line);
      const outcome = await this.translateAndRun(phrase, signal);
      result = outcome.result;
      translation = outcome.translation;
    } else {
      this.current = "Dispatching";
      result = await this.dispatcher.dispatch(token, signal);
    }

    this.current = "Reporting";
    const recorded = this.session.record(line.trim());
    this.log.debug(
      { seq: recorded.sequenceNumber, ok: result.succeeded, kind: result.succeeded ? undefined : result.errorKind },
      "cycle complete"
    );

    this.current = result.succeeded && result.control === "exit" ? "Terminated" : "Idle";
    return { input: line, result, translation, recorded, state: this.current };
  }

  private async translateAndRun(
    phrase: string,
    signal?: AbortSignal
  ): Promise<{ result: CommandResult; translation?: CycleReport["translation"] }> {
    if (!phrase) return { result: { succeeded: true, output: this.translatorHelp() } };

    const outcome = this.translator.translate(phrase);
    switch (outcome.type) {
      case "resolved": {
        this.log.info({ rule: outcome.ruleId, command: outcome.commandLine }, "phrase translated");
        this.current = "Dispatching";
        const result = await this.dispatcher.dispatch(tokenize(outcome.commandLine), signal);
        const { commandLine, ruleId, description } = outcome;
        return { result, translation: { commandLine, ruleId, description } };
      }

      case "ambiguous": {
        this.log.info({ suggestions: outcome.suggestions.length }, "phrase ambiguous");
        const lines = [
          t("ai_ambiguous", { phrase }),
          ...outcome.suggestions.map((s, i) => `  ${i + 1}. ${s}`),
          t("ai_ambiguous_end"),
        ];
        return { result: { succeeded: false, output: lines.join("\n"), errorKind: ErrorKind.TranslationAmbiguous } };
      }

      case "unrecognized":
        this.log.info("phrase unrecognized");
        return {
          result: {
            succeeded: false,
            output: t("ai_unrecognized", { phrase }),
            errorKind: ErrorKind.TranslationUnrecognized,
          },
        };
    }
  }

  // Bare translator verb: every rule's example and what it becomes
  translatorHelp(): string {
    const examples = this.translator.examples();
    const width = Math.max(0, ...examples.map((e) => e.phrase.length));
    return [
      t("ai_help_header"),
      "",
      ...examples.map((e) => `  ${this.translatorVerb} ${e.phrase.padEnd(width)}  → ${e.commandLine}`),
      "",
      t("ai_help_usage"),
    ].join("\n");
  }
}
