// ── Shared Types ──

import { homedir } from "node:os";
import { join } from "node:path";
import type { ErrorKind } from "./errors.js";

export interface Token {
  verb: string;
  args: string[];
}

export type TranslationResult =
  | { type: "resolved"; commandLine: string; ruleId: string; description: string }
  | { type: "ambiguous"; suggestions: string[] }
  | { type: "unrecognized" };

export type ControlSignal = "exit" | "clear";

export type CommandResult =
  | { succeeded: true; output: string; control?: ControlSignal }
  | { succeeded: false; output: string; errorKind: ErrorKind };

export interface HistoryEntry {
  rawInput: string;
  sequenceNumber: number;
}

export interface Identity {
  user: string;
  host: string;
}

export const CONFIG_DIR =
  process.env.NLSH_CONFIG_DIR ||
  `${homedir()}/.config/nlsh`;

export interface ConfigPaths {
  dir: string;
  config: string;
  history: string;
  log: string;
}

export function configPaths(dir: string = CONFIG_DIR): ConfigPaths {
  return {
    dir,
    config: join(dir, "config.json"),
    history: join(dir, "history"),
    log: join(dir, "nlsh.log"),
  };
}

export const DEFAULT_HISTORY_LIMIT = 1000;
export const DEFAULT_SUGGESTION_LIMIT = 3;
export const DEFAULT_LINE_COUNT = 10;
export const DEFAULT_PROCESS_LIMIT = 20;
export const DEFAULT_CPU_SAMPLE_MS = 500;
export const TRANSLATOR_VERB = "ai";
