// ── Natural-Language Translator ──
//
// Pure: phrase in, TranslationResult out. Nothing here touches the
// filesystem or runs anything; the session loop decides what to execute.

import type { TranslationResult } from "../types.js";
import { DEFAULT_SUGGESTION_LIMIT } from "../types.js";
import { normalizePhrase, type PatternLibrary, type PatternRule } from "./patterns.js";

export interface TranslatorOptions {
  suggestionLimit?: number;
}

export interface TranslationExample {
  phrase: string;
  commandLine: string;
}

export class Translator {
  private readonly suggestionLimit: number;

  constructor(
    private readonly library: PatternLibrary,
    options: TranslatorOptions = {}
  ) {
    this.suggestionLimit = options.suggestionLimit ?? DEFAULT_SUGGESTION_LIMIT;
  }

  get rules(): readonly PatternRule[] {
    return this.library.rules;
  }

  translate(input: string): TranslationResult {
    const phrase = normalizePhrase(input);
    if (!phrase.text) return { type: "unrecognized" };

    for (const rule of this.library.rules) {
      const captures = rule.match(phrase);
      if (captures) {
        return {
          type: "resolved",
          commandLine: rule.template(captures),
          ruleId: rule.id,
          description: rule.describe(captures),
        };
      }
    }

    // Near matches: rules sharing at least one keyword, best overlap first.
    // The rule list is already in priority order and the sort is stable.
    const near = this.library.rules
      .map((rule) => ({ rule, overlap: countShared(rule.keywords, phrase.words) }))
      .filter((c) => c.overlap > 0)
      .sort((a, b) => b.overlap - a.overlap);

    if (near.length === 0) return { type: "unrecognized" };

    const suggestions: string[] = [];
    for (const { rule } of near) {
      const line = rule.placeholder();
      if (!suggestions.includes(line)) suggestions.push(line);
      if (suggestions.length >= this.suggestionLimit) break;
    }
    return { type: "ambiguous", suggestions };
  }

  // Every rule's example paired with what it translates to; shown by a bare `ai`
  examples(): TranslationExample[] {
    return this.library.rules.flatMap((rule) => {
      const result = this.translate(rule.example);
      return result.type === "resolved" ? [{ phrase: rule.example, commandLine: result.commandLine }] : [];
    });
  }
}

function countShared(keywords: ReadonlySet<string>, words: ReadonlySet<string>): number {
  let count = 0;
  for (const word of words) if (keywords.has(word)) count++;
  return count;
}
