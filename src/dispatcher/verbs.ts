// ── Verb table ──
//
// One entry per built-in verb: arity bounds, usage line, help category and
// the handler. Handlers throw ShellError subclasses; the Dispatcher turns
// those into CommandResults.

import { basename, relative } from "node:path";
import type { FileSystem } from "../capabilities/filesystem.js";
import type { MetricsProvider } from "../capabilities/metrics.js";
import { ArityError, ErrorKind, InterruptedError, InvalidArgumentError, ShellError } from "../errors.js";
import { t, type MessageKey } from "../i18n.js";
import type { ControlSignal, HistoryEntry, Identity } from "../types.js";
import {
  formatBytes,
  formatDate,
  formatHistory,
  formatListing,
  formatPercent,
  formatProcessTable,
  splitLines,
  splitUptime,
} from "./format.js";

export type VerbCategory = "file" | "search" | "monitor" | "utility";

export interface HistoryAccess {
  entries(): readonly HistoryEntry[];
  clear(): void;
}

export interface VerbSettings {
  defaultLineCount: number;
  processLimit: number;
  translatorVerb: string;
}

export interface VerbContext {
  fs: FileSystem;
  metrics: MetricsProvider;
  history: HistoryAccess;
  identity: Identity;
  now: () => Date;
  signal: AbortSignal;
  settings: VerbSettings;
}

export type VerbOutput = string | { output: string; control: ControlSignal };

export interface VerbSpec {
  name: string;
  aliases: readonly string[];
  minArgs: number;
  maxArgs: number;
  usage: string;
  category: VerbCategory;
  summary: MessageKey;
  run(args: string[], ctx: VerbContext): Promise<VerbOutput>;
}

// ── Argument helpers ──

interface ParsedFlags {
  flags: Set<string>;
  operands: string[];
}

// Leading -x / -xyz clusters; "--" ends them, "-" alone is an operand
function parseFlags(verb: string, args: readonly string[], allowed: string): ParsedFlags {
  const flags = new Set<string>();
  let i = 0;
  for (; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--") {
      i++;
      break;
    }
    if (!arg.startsWith("-") || arg.length === 1) break;
    for (const option of arg.slice(1)) {
      if (!allowed.includes(option)) {
        throw new InvalidArgumentError(t("err_invalid_option", { verb, option }));
      }
      flags.add(option);
    }
  }
  return { flags, operands: args.slice(i) };
}

function parseCount(verb: string, value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError(t("err_invalid_count", { verb, value }));
  return Number(value);
}

// head/tail: `<file> [n]` or `-n <n> <file>`
function parseLineArgs(verb: "head" | "tail", args: readonly string[], fallback: number): { file: string; count: number } {
  const usage = `${verb} <file> [n] | ${verb} -n <n> <file>`;
  if (args[0] === "-n") {
    if (args.length !== 3) throw new ArityError(verb, usage);
    return { file: args[2], count: parseCount(verb, args[1]) };
  }
  if (args.length > 2) throw new ArityError(verb, usage);
  return { file: args[0], count: args[1] === undefined ? fallback : parseCount(verb, args[1]) };
}

function withoutTrailingNewline(text: string): string {
  return text.endsWith("\n") ? text.slice(0, -1) : text;
}

// One capability call per operand, in order; the first failure or an abort stops the rest
async function eachOperand(
  operands: readonly string[],
  signal: AbortSignal,
  action: (operand: string) => Promise<void>
): Promise<void> {
  for (const operand of operands) {
    if (signal.aborted) throw new InterruptedError();
    await action(operand);
  }
}

// ── Verbs ──

const fileVerbs: VerbSpec[] = [
  {
    name: "ls",
    aliases: ["dir"],
    minArgs: 0,
    maxArgs: 2,
    usage: "ls [-l] [path]",
    category: "file",
    summary: "help_ls",
    async run(args, { fs }) {
      const { flags, operands } = parseFlags("ls", args, "l");
      if (operands.length > 1) throw new ArityError("ls", "ls [-l] [path]");
      const entries = await fs.list(operands[0] ?? ".");
      return formatListing(entries, flags.has("l"));
    },
  },
  {
    name: "cd",
    aliases: [],
    minArgs: 0,
    maxArgs: 1,
    usage: "cd [path]",
    category: "file",
    summary: "help_cd",
    async run(args, { fs }) {
      if (args[0] === "-") throw new InvalidArgumentError(t("err_cd_dash"));
      await fs.changeDir(args[0] ?? "~");
      return "";
    },
  },
  {
    name: "pwd",
    aliases: [],
    minArgs: 0,
    maxArgs: 0,
    usage: "pwd",
    category: "file",
    summary: "help_pwd",
    async run(_args, { fs }) {
      return fs.cwd();
    },
  },
  {
    name: "mkdir",
    aliases: [],
    minArgs: 1,
    maxArgs: Infinity,
    usage: "mkdir [-p] <directory...>",
    category: "file",
    summary: "help_mkdir",
    async run(args, { fs, signal }) {
      const { flags, operands } = parseFlags("mkdir", args, "p");
      if (operands.length === 0) throw new ArityError("mkdir", "mkdir [-p] <directory...>");
      await eachOperand(operands, signal, (dir) => fs.makeDir(dir, { parents: flags.has("p") }));
      return "";
    },
  },
  {
    name: "rm",
    aliases: [],
    minArgs: 1,
    maxArgs: Infinity,
    usage: "rm [-r] [-f] <path...>",
    category: "file",
    summary: "help_rm",
    async run(args, { fs, signal }) {
      const { flags, operands } = parseFlags("rm", args, "rRf");
      if (operands.length === 0) throw new ArityError("rm", "rm [-r] [-f] <path...>");
      const recursive = flags.has("r") || flags.has("R");
      await eachOperand(operands, signal, async (path) => {
        try {
          await fs.remove(path, { recursive });
        } catch (err) {
          // -f: missing operands are not an error
          if (!(flags.has("f") && err instanceof ShellError && err.kind === ErrorKind.NotFound)) throw err;
        }
      });
      return "";
    },
  },
  {
    name: "cp",
    aliases: ["copy"],
    minArgs: 2,
    maxArgs: 2,
    usage: "cp <source> <destination>",
    category: "file",
    summary: "help_cp",
    async run([source, destination], { fs }) {
      await fs.copy(source, destination);
      return "";
    },
  },
  {
    name: "mv",
    aliases: ["move"],
    minArgs: 2,
    maxArgs: 2,
    usage: "mv <source> <destination>",
    category: "file",
    summary: "help_mv",
    async run([source, destination], { fs }) {
      await fs.move(source, destination);
      return "";
    },
  },
  {
    name: "cat",
    aliases: ["read"],
    minArgs: 1,
    maxArgs: Infinity,
    usage: "cat <file...>",
    category: "file",
    summary: "help_cat",
    async run(args, { fs, signal }) {
      const parts: string[] = [];
      await eachOperand(args, signal, async (file) => {
        parts.push(withoutTrailingNewline(await fs.read(file)));
      });
      return parts.join("\n");
    },
  },
  {
    name: "touch",
    aliases: [],
    minArgs: 1,
    maxArgs: Infinity,
    usage: "touch <file...>",
    category: "file",
    summary: "help_touch",
    async run(args, { fs, signal }) {
      await eachOperand(args, signal, (file) => fs.createEmpty(file));
      return "";
    },
  },
  {
    name: "write",
    aliases: [],
    minArgs: 2,
    maxArgs: Infinity,
    usage: "write <file> <text...>",
    category: "file",
    summary: "help_write",
    async run([file, ...words], { fs }) {
      await fs.writeText(file, `${words.join(" ")}\n`);
      return "";
    },
  },
  {
    name: "echo",
    aliases: [],
    minArgs: 0,
    maxArgs: Infinity,
    usage: "echo [text...]",
    category: "file",
    summary: "help_echo",
    async run(args) {
      return args.join(" ");
    },
  },
];

const searchVerbs: VerbSpec[] = [
  {
    name: "find",
    aliases: [],
    minArgs: 1,
    maxArgs: 2,
    usage: "find <pattern> [path]",
    category: "search",
    summary: "help_find",
    async run([pattern, path], { fs, signal }) {
      const cwd = fs.cwd();
      const matches = (await fs.walk(path ?? ".", signal))
        .filter((file) => basename(file).includes(pattern))
        .map((file) => relative(cwd, file));
      return matches.length > 0 ? matches.join("\n") : t("out_find_none", { pattern });
    },
  },
  {
    name: "grep",
    aliases: [],
    minArgs: 2,
    maxArgs: 4,
    usage: "grep [-i] [-E] <pattern> <file>",
    category: "search",
    summary: "help_grep",
    async run(args, { fs }) {
      const { flags, operands } = parseFlags("grep", args, "iE");
      if (operands.length !== 2) throw new ArityError("grep", "grep [-i] [-E] <pattern> <file>");
      const [pattern, file] = operands;
      const ignoreCase = flags.has("i");

      let test: (line: string) => boolean;
      if (flags.has("E")) {
        let regex: RegExp;
        try {
          regex = new RegExp(pattern, ignoreCase ? "i" : "");
        } catch {
          throw new InvalidArgumentError(t("err_invalid_regex", { pattern }));
        }
        test = (line) => regex.test(line);
      } else {
        const needle = ignoreCase ? pattern.toLowerCase() : pattern;
        test = (line) => (ignoreCase ? line.toLowerCase() : line).includes(needle);
      }

      const matches = splitLines(await fs.read(file))
        .map((line, i) => ({ line, number: i + 1 }))
        .filter(({ line }) => test(line))
        .map(({ line, number }) => `${file}:${number}:${line}`);
      return matches.length > 0 ? matches.join("\n") : t("out_grep_none", { pattern });
    },
  },
  {
    name: "head",
    aliases: [],
    minArgs: 1,
    maxArgs: 3,
    usage: "head <file> [n] | head -n <n> <file>",
    category: "search",
    summary: "help_head",
    async run(args, { fs, settings }) {
      const { file, count } = parseLineArgs("head", args, settings.defaultLineCount);
      return splitLines(await fs.read(file)).slice(0, count).join("\n");
    },
  },
  {
    name: "tail",
    aliases: [],
    minArgs: 1,
    maxArgs: 3,
    usage: "tail <file> [n] | tail -n <n> <file>",
    category: "search",
    summary: "help_tail",
    async run(args, { fs, settings }) {
      const { file, count } = parseLineArgs("tail", args, settings.defaultLineCount);
      if (count === 0) return "";
      return splitLines(await fs.read(file)).slice(-count).join("\n");
    },
  },
];

const monitorVerbs: VerbSpec[] = [
  {
    name: "cpu",
    aliases: [],
    minArgs: 0,
    maxArgs: 0,
    usage: "cpu",
    category: "monitor",
    summary: "help_cpu",
    async run(_args, { metrics, signal }) {
      return t("out_cpu", { percent: formatPercent(await metrics.cpuPercent(signal)) });
    },
  },
  {
    name: "memory",
    aliases: ["mem"],
    minArgs: 0,
    maxArgs: 0,
    usage: "memory",
    category: "monitor",
    summary: "help_memory",
    async run(_args, { metrics }) {
      const mem = await metrics.memoryStats();
      return [
        t("out_memory", { percent: formatPercent(mem.percent) }),
        t("out_used", { value: formatBytes(mem.usedBytes) }),
        t("out_total", { value: formatBytes(mem.totalBytes) }),
      ].join("\n");
    },
  },
  {
    name: "ps",
    aliases: ["processes"],
    minArgs: 0,
    maxArgs: 0,
    usage: "ps",
    category: "monitor",
    summary: "help_ps",
    async run(_args, { metrics, signal, settings }) {
      return formatProcessTable(await metrics.processList(signal), settings.processLimit);
    },
  },
  {
    name: "uptime",
    aliases: [],
    minArgs: 0,
    maxArgs: 0,
    usage: "uptime",
    category: "monitor",
    summary: "help_uptime",
    async run(_args, { metrics }) {
      return t("out_uptime", splitUptime(await metrics.uptime()));
    },
  },
  {
    name: "df",
    aliases: [],
    minArgs: 0,
    maxArgs: 1,
    usage: "df [path]",
    category: "monitor",
    summary: "help_df",
    async run([path], { fs, metrics }) {
      const target = fs.resolve(path ?? ".");
      const disk = await metrics.diskUsage(target);
      return [
        t("out_disk", { path: target, percent: formatPercent(disk.percent) }),
        t("out_used", { value: formatBytes(disk.usedBytes) }),
        t("out_total", { value: formatBytes(disk.totalBytes) }),
      ].join("\n");
    },
  },
  {
    name: "du",
    aliases: [],
    minArgs: 0,
    maxArgs: 1,
    usage: "du [path]",
    category: "monitor",
    summary: "help_du",
    async run([path], { fs, metrics, signal }) {
      const shown = path ?? ".";
      const size = await metrics.directorySize(fs.resolve(shown), signal);
      return `${formatBytes(size)}\t${shown}`;
    },
  },
];

const utilityVerbs: VerbSpec[] = [
  {
    name: "clear",
    aliases: ["cls"],
    minArgs: 0,
    maxArgs: 0,
    usage: "clear",
    category: "utility",
    summary: "help_clear",
    async run() {
      return { output: "", control: "clear" };
    },
  },
  {
    name: "history",
    aliases: [],
    minArgs: 0,
    maxArgs: 1,
    usage: "history [n | -c]",
    category: "utility",
    summary: "help_history",
    async run([arg], { history }) {
      if (arg === "-c") {
        history.clear();
        return t("out_history_clear");
      }
      if (arg !== undefined && !/^\d+$/.test(arg)) {
        throw new InvalidArgumentError(t("err_history_count", { value: arg }));
      }
      const all = history.entries();
      if (all.length === 0) return t("out_history_empty");
      const shown = arg === undefined ? all : all.slice(Math.max(0, all.length - Number(arg)));
      return formatHistory(shown);
    },
  },
  {
    name: "whoami",
    aliases: [],
    minArgs: 0,
    maxArgs: 0,
    usage: "whoami",
    category: "utility",
    summary: "help_whoami",
    async run(_args, { identity }) {
      return identity.user;
    },
  },
  {
    name: "date",
    aliases: [],
    minArgs: 0,
    maxArgs: 0,
    usage: "date",
    category: "utility",
    summary: "help_date",
    async run(_args, { now }) {
      return formatDate(now());
    },
  },
  {
    name: "help",
    aliases: [],
    minArgs: 0,
    maxArgs: 1,
    usage: "help [command]",
    category: "utility",
    summary: "help_help",
    async run([verb], { settings }) {
      return verb === undefined ? renderHelp(settings.translatorVerb) : renderVerbHelp(verb, settings.translatorVerb);
    },
  },
  {
    name: "exit",
    aliases: ["quit"],
    minArgs: 0,
    maxArgs: 0,
    usage: "exit",
    category: "utility",
    summary: "help_exit",
    async run() {
      return { output: t("out_goodbye"), control: "exit" };
    },
  },
];

export const VERBS: readonly VerbSpec[] = [...fileVerbs, ...searchVerbs, ...monitorVerbs, ...utilityVerbs];

export function findVerb(name: string): VerbSpec | undefined {
  return VERBS.find((v) => v.name === name || v.aliases.includes(name));
}

// ── Help ──

const SECTIONS: ReadonlyArray<[VerbCategory, MessageKey]> = [
  ["file", "help_section_file"],
  ["search", "help_section_search"],
  ["monitor", "help_section_monitor"],
  ["utility", "help_section_utility"],
];

const USAGE_WIDTH = 40;

function helpLine(usage: string, summary: MessageKey): string {
  return `  ${usage.padEnd(USAGE_WIDTH)}${t(summary)}`;
}

export function renderHelp(translatorVerb: string): string {
  const lines = [t("help_header"), ""];
  for (const [category, title] of SECTIONS) {
    lines.push(t(title));
    for (const verb of VERBS.filter((v) => v.category === category)) {
      lines.push(helpLine(verb.usage, verb.summary));
    }
    lines.push("");
  }
  lines.push(t("help_section_ai"), helpLine(`${translatorVerb} <phrase>`, "help_ai"), "", t("help_usage_hint"));
  return lines.join("\n");
}

function renderVerbHelp(name: string, translatorVerb: string): string {
  const lower = name.toLowerCase();
  if (lower === translatorVerb) {
    return [t("err_usage", { usage: `${translatorVerb} <phrase>` }), t("help_ai")].join("\n");
  }
  const verb = findVerb(lower);
  if (!verb) throw new InvalidArgumentError(t("err_help_unknown", { verb: name }));
  const lines = [t("err_usage", { usage: verb.usage }), t(verb.summary)];
  if (verb.aliases.length > 0) lines.push(t("help_aliases", { aliases: verb.aliases.join(", ") }));
  return lines.join("\n");
}
