// ── Output formatting ──

import type { DirEntry } from "../capabilities/filesystem.js";
import type { ProcessInfo } from "../capabilities/metrics.js";
import type { HistoryEntry } from "../types.js";

const BYTE_UNITS = ["KB", "MB", "GB", "TB", "PB"] as const;
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"] as const;

const pad2 = (n: number) => String(n).padStart(2, "0");

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

export function splitUptime(seconds: number): { days: number; hours: number; minutes: number } {
  const whole = Math.floor(seconds);
  return {
    days: Math.floor(whole / 86_400),
    hours: Math.floor((whole % 86_400) / 3_600),
    minutes: Math.floor((whole % 3_600) / 60),
  };
}

// "Mar 07 14:05", local time
export function formatTimestamp(date: Date): string {
  return `${MONTHS[date.getMonth()]} ${pad2(date.getDate())} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

// "2024-03-07 14:05:09", local time
export function formatDate(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatListing(entries: readonly DirEntry[], long: boolean): string {
  return entries
    .map((entry) => {
      const name = entry.isDirectory ? `${entry.name}/` : entry.name;
      if (!long) return name;
      const mode = entry.isDirectory ? "drwxr-xr-x" : "-rw-r--r--";
      return `${mode} ${String(entry.size).padStart(8)} ${formatTimestamp(entry.modified)} ${name}`;
    })
    .join("\n");
}

export const PROCESS_HEADER = `${"PID".padStart(6)} ${"NAME".padEnd(20)} ${"CPU%".padStart(6)} ${"MEM%".padStart(6)}`;

export function formatProcessTable(rows: readonly ProcessInfo[], limit: number): string {
  const lines = [...rows]
    .sort((a, b) => b.cpuPercent - a.cpuPercent)
    .slice(0, limit)
    .map(
      (p) =>
        `${String(p.pid).padStart(6)} ${p.name.slice(0, 20).padEnd(20)} ` +
        `${p.cpuPercent.toFixed(1).padStart(5)}% ${p.memPercent.toFixed(1).padStart(5)}%`
    );
  return [PROCESS_HEADER, ...lines].join("\n");
}

export function formatHistory(entries: readonly HistoryEntry[]): string {
  return entries.map((e) => `${String(e.sequenceNumber).padStart(4)}  ${e.rawInput}`).join("\n");
}

// Lines of a file, without the empty element a trailing newline leaves
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}
