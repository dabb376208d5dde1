// ── System metrics capability ──

import { spawn } from "node:child_process";
import { lstat, readdir, statfs } from "node:fs/promises";
import { cpus, freemem, platform, totalmem, uptime } from "node:os";
import { basename, join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { CapabilityError, ErrorKind, fromErrno, InterruptedError } from "../errors.js";
import { DEFAULT_CPU_SAMPLE_MS } from "../types.js";

export interface UsageStats {
  usedBytes: number;
  totalBytes: number;
  percent: number;
}

export interface ProcessInfo {
  pid: number;
  name: string;
  cpuPercent: number;
  memPercent: number;
}

export interface MetricsProvider {
  probe(): Promise<void>;
  cpuPercent(signal?: AbortSignal): Promise<number>;
  memoryStats(): Promise<UsageStats>;
  processList(signal?: AbortSignal): Promise<ProcessInfo[]>;
  /** Seconds since boot */
  uptime(): Promise<number>;
  diskUsage(path: string): Promise<UsageStats>;
  /** Sum of regular file sizes below `path` */
  directorySize(path: string, signal?: AbortSignal): Promise<number>;
}

interface CpuSample {
  idle: number;
  total: number;
}

function sampleCpu(): CpuSample {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus()) {
    const { user, nice, sys, irq } = cpu.times;
    idle += cpu.times.idle;
    total += user + nice + sys + irq + cpu.times.idle;
  }
  return { idle, total };
}

function percentOf(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

// `ps -eo pid=,pcpu=,pmem=,comm=` rows; comm may contain spaces
export function parseProcessTable(stdout: string): ProcessInfo[] {
  const rows: ProcessInfo[] = [];
  for (const line of stdout.split("\n")) {
    const match = /^\s*(\d+)\s+([\d.]+)\s+([\d.]+)\s+(.+?)\s*$/.exec(line);
    if (!match) continue;
    rows.push({
      pid: Number(match[1]),
      cpuPercent: Number(match[2]),
      memPercent: Number(match[3]),
      name: basename(match[4]),
    });
  }
  return rows;
}

export interface NodeMetricsOptions {
  cpuSampleMs?: number;
}

export class NodeMetricsProvider implements MetricsProvider {
  private readonly cpuSampleMs: number;

  constructor(options: NodeMetricsOptions = {}) {
    this.cpuSampleMs = options.cpuSampleMs ?? DEFAULT_CPU_SAMPLE_MS;
  }

  async probe(): Promise<void> {
    if (cpus().length === 0 || totalmem() === 0) {
      throw new CapabilityError(ErrorKind.Unsupported, "metrics", "no CPU or memory information");
    }
  }

  async cpuPercent(signal?: AbortSignal): Promise<number> {
    const before = sampleCpu();
    try {
      await sleep(this.cpuSampleMs, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) throw new InterruptedError();
      throw err;
    }
    const after = sampleCpu();
    const total = after.total - before.total;
    const idle = after.idle - before.idle;
    return total > 0 ? 100 - percentOf(idle, total) : 0;
  }

  async memoryStats(): Promise<UsageStats> {
    const totalBytes = totalmem();
    const usedBytes = totalBytes - freemem();
    return { usedBytes, totalBytes, percent: percentOf(usedBytes, totalBytes) };
  }

  processList(signal?: AbortSignal): Promise<ProcessInfo[]> {
    if (platform() === "win32") {
      return Promise.reject(new CapabilityError(ErrorKind.Unsupported, "ps"));
    }

    return new Promise((resolveList, rejectList) => {
      let stdout = "";
      let stderr = "";

      const child = spawn("ps", ["-eo", "pid=,pcpu=,pmem=,comm="], {
        stdio: ["ignore", "pipe", "pipe"],
        signal,
      });

      child.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      child.on("close", (code) => {
        if (signal?.aborted) rejectList(new InterruptedError());
        else if (code === 0) resolveList(parseProcessTable(stdout));
        else rejectList(new CapabilityError(ErrorKind.Failed, "ps", stderr.trim() || `exit code ${code}`));
      });

      child.on("error", (err) => {
        if (signal?.aborted) rejectList(new InterruptedError());
        else rejectList(fromErrno(err, "ps"));
      });
    });
  }

  async uptime(): Promise<number> {
    return uptime();
  }

  async diskUsage(path: string): Promise<UsageStats> {
    try {
      const fs = await statfs(path);
      const totalBytes = fs.blocks * fs.bsize;
      const usedBytes = (fs.blocks - fs.bfree) * fs.bsize;
      return { usedBytes, totalBytes, percent: percentOf(usedBytes, totalBytes) };
    } catch (err) {
      throw fromErrno(err, path);
    }
  }

  async directorySize(path: string, signal?: AbortSignal): Promise<number> {
    const root = await lstat(path).catch((err: unknown) => {
      throw fromErrno(err, path);
    });
    if (!root.isDirectory()) return root.size;

    let total = 0;
    const pending = [path];
    while (pending.length > 0) {
      if (signal?.aborted) throw new InterruptedError();
      const dir = pending.pop();
      if (dir === undefined) break;

      let names: string[];
      try {
        names = await readdir(dir);
      } catch (err) {
        if (dir === path) throw fromErrno(err, path);
        continue;
      }
      for (const name of names) {
        const full = join(dir, name);
        const info = await lstat(full).catch(() => null);
        if (!info) continue;
        if (info.isDirectory()) pending.push(full);
        else if (info.isFile()) total += info.size;
      }
    }
    return total;
  }
}
