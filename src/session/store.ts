// ── History file: one raw input per line ──
//
// Storage failures are logged; the session carries on with in-memory history.

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { errorMessage } from "../errors.js";
import { createChildLogger, silentLogger, type Logger } from "../logger.js";

export interface HistoryStore {
  load(limit: number): string[];
  append(rawInput: string): void;
  rewrite(rawInputs: readonly string[]): void;
}

// Multi-line input never reaches the store, but a stray newline would split an entry
function oneLine(rawInput: string): string {
  return rawInput.replace(/[\r\n]+/g, " ");
}

export class FileHistoryStore implements HistoryStore {
  private readonly path: string;
  private readonly log: Logger;

  constructor(path: string, logger: Logger = silentLogger()) {
    this.path = path;
    this.log = createChildLogger(logger, "history");
  }

  load(limit: number): string[] {
    try {
      if (!existsSync(this.path)) return [];
      const lines = readFileSync(this.path, "utf-8")
        .split("\n")
        .filter((line) => line.trim() !== "");
      return lines.slice(Math.max(0, lines.length - limit));
    } catch (err) {
      this.log.warn({ path: this.path, err: errorMessage(err) }, "cannot read history file");
      return [];
    }
  }

  append(rawInput: string): void {
    try {
      this.ensureDir();
      appendFileSync(this.path, `${oneLine(rawInput)}\n`);
    } catch (err) {
      this.log.warn({ path: this.path, err: errorMessage(err) }, "cannot append to history file");
    }
  }

  rewrite(rawInputs: readonly string[]): void {
    try {
      this.ensureDir();
      const body = rawInputs.map(oneLine).join("\n");
      writeFileSync(this.path, body ? `${body}\n` : "");
    } catch (err) {
      this.log.warn({ path: this.path, err: errorMessage(err) }, "cannot rewrite history file");
    }
  }

  private ensureDir(): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  }
}

// --no-history / persistHistory: false
export class MemoryHistoryStore implements HistoryStore {
  private lines: string[];

  constructor(initial: readonly string[] = []) {
    this.lines = [...initial];
  }

  load(limit: number): string[] {
    return this.lines.slice(Math.max(0, this.lines.length - limit));
  }

  append(rawInput: string): void {
    this.lines.push(oneLine(rawInput));
  }

  rewrite(rawInputs: readonly string[]): void {
    this.lines = rawInputs.map(oneLine);
  }

  snapshot(): string[] {
    return [...this.lines];
  }
}
