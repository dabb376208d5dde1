// ── Runtime wiring: settings → capabilities → translator/dispatcher → loop ──

import { NodeFileSystem, type FileSystem } from "./capabilities/filesystem.js";
import { NodeMetricsProvider, type MetricsProvider } from "./capabilities/metrics.js";
import type { Settings } from "./config.js";
import { Dispatcher, verbNames } from "./dispatcher/dispatcher.js";
import { setLang } from "./i18n.js";
import { createLogger, type Logger } from "./logger.js";
import { SessionLoop } from "./session/loop.js";
import { SessionState } from "./session/state.js";
import { FileHistoryStore, MemoryHistoryStore, type HistoryStore } from "./session/store.js";
import { loadPatternLibrary } from "./translator/patterns.js";
import { Translator } from "./translator/translator.js";
import type { ConfigPaths } from "./types.js";

export interface RuntimeOptions {
  settings: Settings;
  paths: ConfigPaths;
  /** false for --no-history */
  history?: boolean;
  cwd?: string;
  logger?: Logger;
  fs?: FileSystem;
  metrics?: MetricsProvider;
  store?: HistoryStore;
}

export interface Runtime {
  settings: Settings;
  logger: Logger;
  fs: FileSystem;
  metrics: MetricsProvider;
  translator: Translator;
  dispatcher: Dispatcher;
  session: SessionState;
  loop: SessionLoop;
}

export function createRuntime(options: RuntimeOptions): Runtime {
  const { settings, paths } = options;
  setLang(settings.lang);

  const logger = options.logger ?? createLogger({ level: settings.logLevel, file: settings.logFile ?? paths.log });
  const fs = options.fs ?? new NodeFileSystem(options.cwd);
  const metrics = options.metrics ?? new NodeMetricsProvider({ cpuSampleMs: settings.cpuSampleMs });

  const persist = settings.persistHistory && options.history !== false;
  const store =
    options.store ??
    (persist ? new FileHistoryStore(settings.historyFile ?? paths.history, logger) : new MemoryHistoryStore());

  const translator = new Translator(loadPatternLibrary(), { suggestionLimit: settings.suggestionLimit });

  const session = SessionState.restore(store, [...verbNames(), settings.translatorVerb], settings.historyLimit);

  const dispatcher = new Dispatcher({
    fs,
    metrics,
    history: session,
    settings: {
      defaultLineCount: settings.defaultLineCount,
      processLimit: settings.processLimit,
      translatorVerb: settings.translatorVerb,
    },
    logger,
  });

  const loop = new SessionLoop({
    translator,
    dispatcher,
    session,
    translatorVerb: settings.translatorVerb,
    logger,
  });

  logger.info({ cwd: fs.cwd(), persist, rules: translator.rules.length }, "runtime ready");
  return { settings, logger, fs, metrics, translator, dispatcher, session, loop };
}

// Both capabilities must answer before the first prompt
export async function probeCapabilities(runtime: Runtime): Promise<void> {
  await runtime.fs.probe();
  await runtime.metrics.probe();
}
