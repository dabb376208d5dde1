// ── Tokenizer: raw line → verb + args ──
//
// Whitespace separates words outside quotes. "…" honours \" and \\ escapes,
// '…' is literal. An unterminated quote runs to end of line.

import { EmptyInputError } from "./errors.js";
import type { Token } from "./types.js";

export function splitWords(line: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (quote === '"' && ch === "\\" && (line[i + 1] === '"' || line[i + 1] === "\\")) {
        current += line[++i];
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (inWord) words.push(current);
  return words;
}

export function tokenize(line: string): Token {
  const trimmed = line.trim();
  if (!trimmed) throw new EmptyInputError();

  // `"" foo` keeps its empty verb and fails later as an unknown command
  const [verb = "", ...args] = splitWords(trimmed);
  return { verb, args };
}

// Text after the verb, as typed, minus one pair of enclosing quotes
export function restAfterVerb(line: string): string {
  const trimmed = line.trim();
  const match = /^\S+\s*/.exec(trimmed);
  const rest = match ? trimmed.slice(match[0].length).trim() : "";
  const quoted = /^"([^"]*)"$|^'([^']*)'$/.exec(rest);
  return quoted ? (quoted[1] ?? quoted[2]).trim() : rest;
}

export function quoteArg(arg: string): string {
  if (arg !== "" && !/[\s"'\\]/.test(arg)) return arg;
  return `"${arg.replace(/["\\]/g, (ch) => `\\${ch}`)}"`;
}
