// ── Capture extraction ──
//
// The text after a rule's trigger is cut into segments at anchor words
// ("named X", "to Y", "in Z"). The fragment before the first anchor is the
// lead. Segments that follow an anchor the rule does not use are dropped.

export interface Lexicon {
  stopWords: ReadonlySet<string>;
  noiseWords: ReadonlySet<string>;
  anchors: ReadonlySet<string>;
  aliases: ReadonlyMap<string, string>;
}

export interface Segments {
  lead: string[];
  anchored: string[][];
}

// A quoted word is only a quote when the quote opens the word, so "what's" stays one word
const WORD_RE = /"[^"]*"|'[^']*'(?=\s|$)|\S+/g;
const TRAILING_PUNCT_RE = /[.,!?;:]+$/;

export function isQuoted(word: string): boolean {
  return word.length >= 2 && /^(["']).*\1$/s.test(word);
}

function bare(word: string): string {
  return word.toLowerCase().replace(TRAILING_PUNCT_RE, "");
}

export function segmentTail(tail: string, ruleAnchors: ReadonlySet<string>, lexicon: Lexicon): Segments {
  const lead: string[] = [];
  const anchored: string[][] = [];
  // null while skipping words after an anchor this rule ignores
  let current: string[] | null = lead;

  for (const word of tail.match(WORD_RE) ?? []) {
    const key = isQuoted(word) ? "" : bare(word);
    if (ruleAnchors.has(key)) {
      current = [];
      anchored.push(current);
    } else if (lexicon.anchors.has(key)) {
      current = null;
    } else if (current) {
      current.push(word);
    }
  }

  return { lead, anchored };
}

function stripEdges(words: string[], drop: ReadonlySet<string>): string[] {
  let start = 0;
  let end = words.length;
  while (start < end && !isQuoted(words[start]) && drop.has(words[start].toLowerCase())) start++;
  while (end > start && !isQuoted(words[end - 1]) && drop.has(words[end - 1].toLowerCase())) end--;
  return words.slice(start, end);
}

function lookupAlias(words: string[], lexicon: Lexicon): string | undefined {
  return lexicon.aliases.get(words.join(" ").toLowerCase());
}

// "." and ".." are paths, not punctuation
function trimPunctuation(words: readonly string[]): string[] {
  if (words.length === 0) return [];
  const last = words[words.length - 1];
  if (isQuoted(last) || /^\.+$/.test(last)) return [...words];
  const trimmed = last.replace(TRAILING_PUNCT_RE, "");
  return trimmed ? [...words.slice(0, -1), trimmed] : trimPunctuation(words.slice(0, -1));
}

function unquote(word: string): string {
  return isQuoted(word) ? word.slice(1, -1) : word;
}

// Returns "" when nothing meaningful is left
export function cleanCapture(segment: readonly string[], lexicon: Lexicon): string {
  if (segment.length === 0) return "";
  if (segment.length === 1 && isQuoted(segment[0])) return unquote(segment[0]);

  let words = trimPunctuation(segment);

  let alias = lookupAlias(words, lexicon);
  if (alias !== undefined) return alias;

  words = trimPunctuation(stripEdges(words, lexicon.stopWords));
  if (words.length === 0) return "";
  alias = lookupAlias(words, lexicon);
  if (alias !== undefined) return alias;

  words = trimPunctuation(stripEdges(words, lexicon.noiseWords));
  if (words.length === 0) return "";
  alias = lookupAlias(words, lexicon);
  if (alias !== undefined) return alias;

  return words.length === 1 ? unquote(words[0]) : words.join(" ");
}
