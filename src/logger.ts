// ── Logging ──
//
// The REPL owns stdout/stderr, so log lines go to a file as JSON.

import pino, { type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: string;
  /** Destination file; omitted means no output at all */
  file?: string;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  if (!options.file) {
    return pino({ name: options.name ?? "nlsh", level: "silent" });
  }

  return pino(
    {
      name: options.name ?? "nlsh",
      level: options.level ?? process.env.NLSH_LOG_LEVEL ?? "info",
      base: { pid: process.pid },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: options.file, mkdir: true, sync: true })
  );
}

export function createChildLogger(parent: Logger, module: string): Logger {
  return parent.child({ module });
}

export function silentLogger(): Logger {
  return createLogger();
}
