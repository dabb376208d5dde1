// In-memory stand-ins for the capability interfaces

import { posix } from "node:path";
import type { DirEntry, FileSystem } from "../src/capabilities/filesystem.js";
import type { MetricsProvider, ProcessInfo, UsageStats } from "../src/capabilities/metrics.js";
import { CapabilityError, ErrorKind, InterruptedError } from "../src/errors.js";

type FakeNode = { type: "file"; content: string; modified: Date } | { type: "dir"; modified: Date };

export const FIXED_DATE = new Date(2024, 2, 7, 14, 5, 9);

export class FakeFileSystem implements FileSystem {
  readonly calls: string[] = [];
  private readonly nodes = new Map<string, FakeNode>();
  private current: string;

  constructor(files: Record<string, string> = {}, private readonly homeDir = "/home/tester") {
    this.nodes.set("/", { type: "dir", modified: FIXED_DATE });
    this.ensureDirs(homeDir);
    this.current = homeDir;
    for (const [path, content] of Object.entries(files)) {
      const full = this.resolve(path);
      this.ensureDirs(posix.dirname(full));
      if (path.endsWith("/")) this.ensureDirs(full);
      else this.nodes.set(full, { type: "file", content, modified: FIXED_DATE });
    }
  }

  private ensureDirs(dir: string): void {
    let path = "/";
    for (const part of dir.split("/").filter(Boolean)) {
      path = posix.join(path, part);
      if (!this.nodes.has(path)) this.nodes.set(path, { type: "dir", modified: FIXED_DATE });
    }
  }

  private children(dir: string): string[] {
    const prefix = dir === "/" ? "/" : `${dir}/`;
    return [...this.nodes.keys()].filter(
      (p) => p !== dir && p.startsWith(prefix) && !p.slice(prefix.length).includes("/")
    );
  }

  private node(path: string): FakeNode {
    const node = this.nodes.get(this.resolve(path));
    if (!node) throw new CapabilityError(ErrorKind.NotFound, path);
    return node;
  }

  private requireParent(full: string, shown: string): void {
    const parent = this.nodes.get(posix.dirname(full));
    if (!parent) throw new CapabilityError(ErrorKind.NotFound, shown);
    if (parent.type !== "dir") throw new CapabilityError(ErrorKind.NotDirectory, shown);
  }

  // Test helpers
  exists(path: string): boolean {
    return this.nodes.has(this.resolve(path));
  }

  contentOf(path: string): string | undefined {
    const node = this.nodes.get(this.resolve(path));
    return node?.type === "file" ? node.content : undefined;
  }

  async probe(): Promise<void> {}

  cwd(): string {
    return this.current;
  }

  home(): string {
    return this.homeDir;
  }

  resolve(path: string): string {
    if (path === "~") return this.homeDir;
    if (path.startsWith("~/")) return posix.join(this.homeDir, path.slice(2));
    return posix.resolve(this.current, path);
  }

  async list(path: string): Promise<DirEntry[]> {
    this.calls.push(`list ${path}`);
    const node = this.node(path);
    if (node.type === "file") {
      return [{ name: path, isDirectory: false, size: node.content.length, modified: node.modified }];
    }
    return this.children(this.resolve(path))
      .sort()
      .map((full) => {
        const child = this.nodes.get(full);
        return {
          name: posix.basename(full),
          isDirectory: child?.type === "dir",
          size: child?.type === "file" ? child.content.length : 4096,
          modified: child?.modified ?? FIXED_DATE,
        };
      });
  }

  async changeDir(path: string): Promise<string> {
    this.calls.push(`changeDir ${path}`);
    const node = this.node(path);
    if (node.type !== "dir") throw new CapabilityError(ErrorKind.NotDirectory, path);
    this.current = this.resolve(path);
    return this.current;
  }

  async makeDir(path: string, options: { parents?: boolean } = {}): Promise<void> {
    this.calls.push(`makeDir ${path}${options.parents ? " -p" : ""}`);
    const full = this.resolve(path);
    const existing = this.nodes.get(full);
    if (existing) {
      if (options.parents && existing.type === "dir") return;
      throw new CapabilityError(ErrorKind.AlreadyExists, path);
    }
    if (options.parents) this.ensureDirs(full);
    else {
      this.requireParent(full, path);
      this.nodes.set(full, { type: "dir", modified: FIXED_DATE });
    }
  }

  async remove(path: string, options: { recursive?: boolean } = {}): Promise<void> {
    this.calls.push(`remove ${path}`);
    const full = this.resolve(path);
    const node = this.node(path);
    if (node.type === "dir" && !options.recursive) throw new CapabilityError(ErrorKind.IsDirectory, path);
    for (const key of [...this.nodes.keys()]) {
      if (key === full || key.startsWith(`${full}/`)) this.nodes.delete(key);
    }
  }

  private target(source: string, destination: string): string {
    const to = this.resolve(destination);
    return this.nodes.get(to)?.type === "dir" ? posix.join(to, posix.basename(this.resolve(source))) : to;
  }

  async copy(source: string, destination: string): Promise<void> {
    this.calls.push(`copy ${source} ${destination}`);
    const node = this.node(source);
    const to = this.target(source, destination);
    this.requireParent(to, destination);
    if (node.type === "dir") throw new CapabilityError(ErrorKind.Unsupported, source);
    this.nodes.set(to, { ...node });
  }

  async move(source: string, destination: string): Promise<void> {
    this.calls.push(`move ${source} ${destination}`);
    const from = this.resolve(source);
    this.node(source);
    const to = this.target(source, destination);
    this.requireParent(to, destination);
    for (const key of [...this.nodes.keys()]) {
      if (key === from || key.startsWith(`${from}/`)) {
        const moved = this.nodes.get(key);
        this.nodes.delete(key);
        if (moved) this.nodes.set(to + key.slice(from.length), moved);
      }
    }
  }

  async read(path: string): Promise<string> {
    this.calls.push(`read ${path}`);
    const node = this.node(path);
    if (node.type === "dir") throw new CapabilityError(ErrorKind.IsDirectory, path);
    return node.content;
  }

  async createEmpty(path: string): Promise<void> {
    this.calls.push(`createEmpty ${path}`);
    const full = this.resolve(path);
    const node = this.nodes.get(full);
    if (node) {
      node.modified = new Date();
      return;
    }
    this.requireParent(full, path);
    this.nodes.set(full, { type: "file", content: "", modified: new Date() });
  }

  async writeText(path: string, text: string): Promise<void> {
    this.calls.push(`writeText ${path}`);
    const full = this.resolve(path);
    if (this.nodes.get(full)?.type === "dir") throw new CapabilityError(ErrorKind.IsDirectory, path);
    this.requireParent(full, path);
    this.nodes.set(full, { type: "file", content: text, modified: new Date() });
  }

  async walk(path: string, signal?: AbortSignal): Promise<string[]> {
    this.calls.push(`walk ${path}`);
    if (signal?.aborted) throw new InterruptedError();
    const node = this.node(path);
    if (node.type !== "dir") throw new CapabilityError(ErrorKind.NotDirectory, path);
    const root = this.resolve(path);
    const prefix = root === "/" ? "/" : `${root}/`;
    return [...this.nodes.entries()]
      .filter(([p, n]) => n.type === "file" && p.startsWith(prefix))
      .map(([p]) => p)
      .sort();
  }
}

export interface FakeMetricsValues {
  cpu?: number;
  memory?: UsageStats;
  processes?: ProcessInfo[];
  uptimeSeconds?: number;
  disk?: UsageStats;
  sizes?: Record<string, number>;
  /** cpuPercent never settles on its own */
  hangCpu?: boolean;
}

export class FakeMetrics implements MetricsProvider {
  readonly calls: string[] = [];

  constructor(private readonly values: FakeMetricsValues = {}) {}

  async probe(): Promise<void> {}

  cpuPercent(): Promise<number> {
    this.calls.push("cpuPercent");
    if (this.values.hangCpu) return new Promise<number>(() => {});
    return Promise.resolve(this.values.cpu ?? 0);
  }

  async memoryStats(): Promise<UsageStats> {
    this.calls.push("memoryStats");
    return this.values.memory ?? { usedBytes: 0, totalBytes: 0, percent: 0 };
  }

  async processList(): Promise<ProcessInfo[]> {
    this.calls.push("processList");
    return this.values.processes ?? [];
  }

  async uptime(): Promise<number> {
    this.calls.push("uptime");
    return this.values.uptimeSeconds ?? 0;
  }

  async diskUsage(path: string): Promise<UsageStats> {
    this.calls.push(`diskUsage ${path}`);
    return this.values.disk ?? { usedBytes: 0, totalBytes: 0, percent: 0 };
  }

  async directorySize(path: string): Promise<number> {
    this.calls.push(`directorySize ${path}`);
    const size = this.values.sizes?.[path];
    if (size === undefined) throw new CapabilityError(ErrorKind.NotFound, path);
    return size;
  }
}
