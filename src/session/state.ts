import type { HistoryEntry } from "../types.js";
import { History } from "./history.js";
import type { HistoryStore } from "./store.js";

export class SessionState {
  private readonly history: History;
  private readonly store: HistoryStore;
  private readonly verbs: readonly string[];

  constructor(store: HistoryStore, verbs: readonly string[], historyLimit?: number) {
    this.store = store;
    this.verbs = [...new Set(verbs.map((v) => v.toLowerCase()))].sort();
    this.history = new History(historyLimit);
  }

  // Replays the persisted history; sequence numbers restart at 1 for the new process
  static restore(store: HistoryStore, verbs: readonly string[], historyLimit: number): SessionState {
    const state = new SessionState(store, verbs, historyLimit);
    for (const raw of store.load(historyLimit)) state.history.append(raw);
    return state;
  }

  record(rawInput: string): HistoryEntry {
    const entry = this.history.append(rawInput);
    this.store.append(rawInput);
    return entry;
  }

  entries(): readonly HistoryEntry[] {
    return this.history.entries();
  }

  clear(): void {
    this.history.clear();
    this.store.rewrite([]);
  }

  /** Compact the store down to what is still retained */
  persist(): void {
    this.store.rewrite(this.history.rawInputs());
  }

  complete(partial: string): string[] {
    const text = partial.trimStart();
    if (!/\s/.test(text)) {
      const prefix = text.toLowerCase();
      return this.verbs.filter((v) => v.startsWith(prefix));
    }

    const seen = new Set<string>();
    const matches: string[] = [];
    const inputs = this.history.rawInputs();
    for (let i = inputs.length - 1; i >= 0; i--) {
      const raw = inputs[i];
      if (raw.startsWith(text) && !seen.has(raw)) {
        seen.add(raw);
        matches.push(raw);
      }
    }
    return matches;
  }
}
