import type { HistoryEntry } from "../types.js";
import { DEFAULT_HISTORY_LIMIT } from "../types.js";

export class History {
  private items: HistoryEntry[] = [];
  private readonly maxEntries: number;
  // Keeps counting across clear(), so numbers are never reused in a session
  private nextSequence = 1;

  constructor(maxEntries: number = DEFAULT_HISTORY_LIMIT) {
    this.maxEntries = maxEntries;
  }

  append(rawInput: string): HistoryEntry {
    const entry: HistoryEntry = { rawInput, sequenceNumber: this.nextSequence++ };
    this.items.push(entry);
    this.trimIfNeeded();
    return entry;
  }

  // Oldest entries go first once the cap is reached
  private trimIfNeeded(): void {
    const overflow = this.items.length - this.maxEntries;
    if (overflow > 0) this.items.splice(0, overflow);
  }

  entries(): readonly HistoryEntry[] {
    return [...this.items];
  }

  rawInputs(): string[] {
    return this.items.map((e) => e.rawInput);
  }

  count(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}
