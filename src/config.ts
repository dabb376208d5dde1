import { readFileSync, existsSync } from "node:fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { SUPPORTED_LANGS } from "./locales/index.js";
import {
  configPaths,
  type ConfigPaths,
  DEFAULT_CPU_SAMPLE_MS,
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_LINE_COUNT,
  DEFAULT_PROCESS_LIMIT,
  DEFAULT_SUGGESTION_LIMIT,
  TRANSLATOR_VERB,
} from "./types.js";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export const SettingsSchema = z.object({
  /** Retained history entries; older ones are evicted first */
  historyLimit: z.number().int().positive().default(DEFAULT_HISTORY_LIMIT),
  persistHistory: z.boolean().default(true),
  /** Suggestions offered for a phrase that matches no rule */
  suggestionLimit: z.number().int().positive().default(DEFAULT_SUGGESTION_LIMIT),
  /** head/tail line count when none is given */
  defaultLineCount: z.number().int().positive().default(DEFAULT_LINE_COUNT),
  processLimit: z.number().int().positive().default(DEFAULT_PROCESS_LIMIT),
  cpuSampleMs: z.number().int().nonnegative().default(DEFAULT_CPU_SAMPLE_MS),
  translatorVerb: z
    .string()
    .regex(/^[a-z][a-z0-9-]*$/, "must be a lowercase word")
    .default(TRANSLATOR_VERB),
  lang: z.enum(SUPPORTED_LANGS).default("en"),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  logFile: z.string().min(1).optional(),
  historyFile: z.string().min(1).optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

// NLSH_* variables win over config.json
const ENV_OVERRIDES = {
  NLSH_HISTORY_LIMIT: (v: string) => ({ historyLimit: Number(v) }),
  NLSH_LOG_LEVEL: (v: string) => ({ logLevel: v.toLowerCase() }),
  NLSH_LANG: (v: string) => ({ lang: v }),
} satisfies Record<string, (v: string) => Record<string, unknown>>;

export function envOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  let merged: Record<string, unknown> = {};
  for (const [name, apply] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name];
    if (value !== undefined && value !== "") merged = { ...merged, ...apply(value) };
  }
  return merged;
}

export interface LoadedSettings {
  settings: Settings;
  paths: ConfigPaths;
}

export function loadSettings(
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env
): LoadedSettings {
  const paths = configPaths(configDir);
  let fromFile: Record<string, unknown> = {};

  if (existsSync(paths.config)) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(paths.config, "utf-8"));
    } catch (err) {
      throw new ConfigError(`invalid JSON (${errorMessage(err)})`, paths.config);
    }
    const object = z.record(z.unknown()).safeParse(raw);
    if (!object.success) {
      throw new ConfigError("expected a JSON object", paths.config);
    }
    fromFile = object.data;
  }

  const parsed = SettingsSchema.safeParse({ ...fromFile, ...envOverrides(env) });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(issues, paths.config);
  }

  return { settings: parsed.data, paths };
}
