// ── Dispatcher: Token → CommandResult ──
//
// dispatch() never throws. Every failure, including ones the handlers did
// not anticipate, comes back as a CommandResult with an ErrorKind.

import { hostname, userInfo } from "node:os";
import type { FileSystem } from "../capabilities/filesystem.js";
import type { MetricsProvider } from "../capabilities/metrics.js";
import {
  ArityError,
  CapabilityError,
  type CapabilityErrorKind,
  ErrorKind,
  errorMessage,
  InterruptedError,
  ShellError,
} from "../errors.js";
import { t, type MessageKey } from "../i18n.js";
import { createChildLogger, silentLogger, type Logger } from "../logger.js";
import {
  DEFAULT_LINE_COUNT,
  DEFAULT_PROCESS_LIMIT,
  TRANSLATOR_VERB,
  type CommandResult,
  type Identity,
  type Token,
} from "../types.js";
import { findVerb, VERBS, type HistoryAccess, type VerbContext, type VerbSettings } from "./verbs.js";

const CAPABILITY_MESSAGES: Record<CapabilityErrorKind, MessageKey> = {
  NotFound: "err_NotFound",
  PermissionDenied: "err_PermissionDenied",
  AlreadyExists: "err_AlreadyExists",
  NotEmpty: "err_NotEmpty",
  IsDirectory: "err_IsDirectory",
  NotDirectory: "err_NotDirectory",
  Unsupported: "err_Unsupported",
  Failed: "err_Failed",
};

export function systemIdentity(): Identity {
  let user: string;
  try {
    user = userInfo().username;
  } catch {
    // No passwd entry for the uid (containers)
    user = process.env.USER ?? process.env.USERNAME ?? "user";
  }
  return { user, host: hostname() };
}

/** Verb names and aliases, for completion */
export function verbNames(): string[] {
  return VERBS.flatMap((v) => [v.name, ...v.aliases]);
}

export interface DispatcherDeps {
  fs: FileSystem;
  metrics: MetricsProvider;
  history: HistoryAccess;
  identity?: Identity;
  now?: () => Date;
  settings?: Partial<VerbSettings>;
  logger?: Logger;
}

function failure(errorKind: ErrorKind, output: string): CommandResult {
  return { succeeded: false, output, errorKind };
}

// Rejects with InterruptedError as soon as the signal fires, whatever the work is doing
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolveWork, rejectWork) => {
    const onAbort = () => rejectWork(new InterruptedError());
    signal.addEventListener("abort", onAbort, { once: true });
    void work.then(resolveWork, rejectWork).finally(() => signal.removeEventListener("abort", onAbort));
  });
}

export class Dispatcher {
  private readonly fs: FileSystem;
  private readonly metrics: MetricsProvider;
  private readonly history: HistoryAccess;
  private readonly identity: Identity;
  private readonly now: () => Date;
  private readonly settings: VerbSettings;
  private readonly log: Logger;

  constructor(deps: DispatcherDeps) {
    this.fs = deps.fs;
    this.metrics = deps.metrics;
    this.history = deps.history;
    this.identity = deps.identity ?? systemIdentity();
    this.now = deps.now ?? (() => new Date());
    this.settings = {
      defaultLineCount: deps.settings?.defaultLineCount ?? DEFAULT_LINE_COUNT,
      processLimit: deps.settings?.processLimit ?? DEFAULT_PROCESS_LIMIT,
      translatorVerb: deps.settings?.translatorVerb ?? TRANSLATOR_VERB,
    };
    this.log = createChildLogger(deps.logger ?? silentLogger(), "dispatcher");
  }

  currentIdentity(): Identity {
    return this.identity;
  }

  async dispatch(token: Token, signal: AbortSignal = new AbortController().signal): Promise<CommandResult> {
    const verb = findVerb(token.verb.toLowerCase());
    if (!verb) {
      this.log.debug({ verb: token.verb }, "unknown verb");
      return failure(ErrorKind.UnknownCommand, t("err_command_not_found", { verb: token.verb }));
    }

    const { args } = token;
    if (args.length < verb.minArgs || args.length > verb.maxArgs) {
      return failure(ErrorKind.Arity, t("err_usage", { usage: verb.usage }));
    }

    if (signal.aborted) return failure(ErrorKind.Interrupted, t("err_Interrupted"));

    const ctx: VerbContext = {
      fs: this.fs,
      metrics: this.metrics,
      history: this.history,
      identity: this.identity,
      now: this.now,
      signal,
      settings: this.settings,
    };

    try {
      const out = await untilAborted(verb.run(args, ctx), signal);
      this.log.debug({ verb: verb.name, args: args.length }, "dispatched");
      return typeof out === "string"
        ? { succeeded: true, output: out }
        : { succeeded: true, output: out.output, control: out.control };
    } catch (err) {
      return this.toFailure(verb.name, err);
    }
  }

  private toFailure(verb: string, err: unknown): CommandResult {
    if (err instanceof CapabilityError) {
      const parts = [verb, err.path === verb ? "" : err.path, err.detail ?? t(CAPABILITY_MESSAGES[err.kind])];
      this.log.info({ verb, kind: err.kind, path: err.path }, "capability failure");
      return failure(err.kind, parts.filter(Boolean).join(": "));
    }
    if (err instanceof ArityError) {
      return failure(err.kind, t("err_usage", { usage: err.usage }));
    }
    if (err instanceof InterruptedError) {
      this.log.info({ verb }, "interrupted");
      return failure(err.kind, t("err_Interrupted"));
    }
    if (err instanceof ShellError) {
      return failure(err.kind, err.message);
    }
    this.log.error({ verb, err }, "unexpected failure");
    return failure(ErrorKind.Failed, `${verb}: ${errorMessage(err)}`);
  }
}
