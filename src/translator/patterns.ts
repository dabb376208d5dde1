// ── Pattern Library: ordered, immutable (trigger → command) rules ──

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "../errors.js";
import { quoteArg } from "../tokenizer.js";
import { cleanCapture, segmentTail, type Lexicon } from "./capture.js";

export const DEFAULT_PATTERNS_PATH = new URL("../../data/patterns.json", import.meta.url);

const RuleDefinitionSchema = z.object({
  id: z.string().min(1),
  priority: z.number().int(),
  trigger: z.string().min(1),
  lead: z.boolean().default(false),
  anchors: z.array(z.string()).default([]),
  params: z.array(z.string().regex(/^\w+\??$/)).default([]),
  template: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
  description: z.string(),
  example: z.string().min(1),
});

export const PatternFileSchema = z.object({
  stopWords: z.array(z.string()),
  noiseWords: z.array(z.string()),
  anchors: z.array(z.string()),
  aliases: z.record(z.string()),
  rules: z.array(RuleDefinitionSchema).min(1),
});

export type PatternFile = z.input<typeof PatternFileSchema>;

export interface Phrase {
  /** Trimmed, whitespace-collapsed, original casing */
  text: string;
  /** `text` lowercased; what triggers are tested against */
  normalized: string;
  words: ReadonlySet<string>;
}

export type Captures = Readonly<Record<string, string>>;

export interface Param {
  name: string;
  optional: boolean;
}

export interface PatternRule {
  readonly id: string;
  readonly priority: number;
  readonly keywords: ReadonlySet<string>;
  readonly params: readonly Param[];
  readonly example: string;
  /** Captures when the rule applies, null otherwise */
  match(phrase: Phrase): Captures | null;
  template(captures: Captures): string;
  describe(captures: Captures): string;
  /** Template with `<param>` stand-ins, for suggestions */
  placeholder(): string;
}

export interface PatternLibrary {
  readonly rules: readonly PatternRule[];
  readonly lexicon: Lexicon;
}

export function normalizePhrase(input: string): Phrase {
  const text = input.trim().replace(/\s+/g, " ");
  const normalized = text.toLowerCase();
  const words = new Set(normalized.split(/[^\p{L}\p{N}_]+/u).filter(Boolean));
  return { text, normalized, words };
}

function fill(template: string, value: (param: string) => string | undefined): string {
  return template
    .replace(/\{(\w+)\??\}/g, (_whole, name: string) => value(name) ?? "")
    .replace(/\s+/g, " ")
    .trim();
}

function compileRule(def: z.output<typeof RuleDefinitionSchema>, lexicon: Lexicon): PatternRule {
  let trigger: RegExp;
  try {
    trigger = new RegExp(def.trigger);
  } catch (err) {
    throw new ConfigError(`rule ${def.id}: invalid trigger (${errorMessage(err)})`);
  }

  const params: Param[] = def.params.map((p) => ({
    name: p.replace(/\?$/, ""),
    optional: p.endsWith("?"),
  }));
  const ruleAnchors: ReadonlySet<string> = new Set(def.anchors);
  // Named groups are filled by the trigger alone, never from the tail
  const triggerGroups: ReadonlySet<string> = new Set(Array.from(def.trigger.matchAll(/\(\?<(\w+)>/g), (g) => g[1]));
  const keywords: ReadonlySet<string> = new Set(def.keywords);

  const match = (phrase: Phrase): Captures | null => {
    const m = trigger.exec(phrase.normalized);
    if (!m) return null;

    const captures: Record<string, string> = {};
    for (const [name, value] of Object.entries(m.groups ?? {})) {
      if (value) captures[name] = value;
    }

    // Lowercasing can change length outside ASCII; fall back to the lowercased tail then
    const end = m.index + m[0].length;
    const source = phrase.text.length === phrase.normalized.length ? phrase.text : phrase.normalized;
    const { lead, anchored } = segmentTail(source.slice(end), ruleAnchors, lexicon);
    const positional = (def.lead ? [lead, ...anchored] : anchored)
      .map((segment) => cleanCapture(segment, lexicon))
      .filter(Boolean);

    for (const param of params) {
      if (captures[param.name] !== undefined) continue;
      if (triggerGroups.has(param.name)) {
        if (!param.optional) return null;
        continue;
      }
      const next = positional.shift();
      if (next !== undefined) captures[param.name] = next;
      else if (!param.optional) return null;
    }
    return captures;
  };

  return Object.freeze({
    id: def.id,
    priority: def.priority,
    keywords,
    params: Object.freeze(params),
    example: def.example,
    match,
    template: (captures: Captures) =>
      fill(def.template, (name) => (captures[name] === undefined ? undefined : quoteArg(captures[name]))),
    describe: (captures: Captures) => fill(def.description, (name) => captures[name]),
    placeholder: () =>
      fill(def.template, (name) => {
        const param = params.find((p) => p.name === name);
        return param && !param.optional ? `<${name}>` : "";
      }),
  });
}

export function compileLibrary(raw: unknown): PatternLibrary {
  const parsed = PatternFileSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ConfigError(`invalid pattern file: ${first.path.join(".")}: ${first.message}`);
  }
  const file = parsed.data;

  const lexicon: Lexicon = {
    stopWords: new Set(file.stopWords),
    noiseWords: new Set(file.noiseWords),
    anchors: new Set(file.anchors),
    aliases: new Map(Object.entries(file.aliases)),
  };

  const seen = new Set<string>();
  for (const def of file.rules) {
    if (seen.has(def.id)) throw new ConfigError(`duplicate rule id: ${def.id}`);
    seen.add(def.id);
  }

  // Array.prototype.sort is stable, so equal priorities keep declaration order
  const rules = file.rules
    .map((def) => compileRule(def, lexicon))
    .sort((a, b) => a.priority - b.priority);

  return Object.freeze({ rules: Object.freeze(rules), lexicon });
}

export function loadPatternLibrary(path: string | URL = DEFAULT_PATTERNS_PATH): PatternLibrary {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`cannot read pattern file: ${errorMessage(err)}`, String(path));
  }
  return compileLibrary(raw);
}
