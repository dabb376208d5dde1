// ── Filesystem capability ──
//
// The only place file verbs touch the disk. Paths are resolved against the
// shell's own working directory, never process.cwd(), so `cd` inside the
// session does not move the host process.

import {
  access,
  copyFile,
  cp,
  lstat,
  mkdir,
  open,
  readFile,
  readdir,
  rename,
  rm,
  stat,
  utimes,
  writeFile,
} from "node:fs/promises";
import { constants, type Dirent } from "node:fs";
import { homedir } from "node:os";
import { basename, join, resolve } from "node:path";
import { CapabilityError, ErrorKind, fromErrno, InterruptedError, isErrnoException } from "../errors.js";

export interface DirEntry {
  name: string;
  isDirectory: boolean;
  size: number;
  modified: Date;
}

export interface FileSystem {
  /** Fails when the starting directory is unusable */
  probe(): Promise<void>;
  cwd(): string;
  home(): string;
  resolve(path: string): string;
  list(path: string): Promise<DirEntry[]>;
  changeDir(path: string): Promise<string>;
  makeDir(path: string, options?: { parents?: boolean }): Promise<void>;
  remove(path: string, options?: { recursive?: boolean }): Promise<void>;
  copy(source: string, destination: string): Promise<void>;
  move(source: string, destination: string): Promise<void>;
  read(path: string): Promise<string>;
  /** touch: create when missing, bump mtime otherwise */
  createEmpty(path: string): Promise<void>;
  writeText(path: string, text: string): Promise<void>;
  /** Absolute paths of every regular file below `path`, sorted. Checks `signal` between directories. */
  walk(path: string, signal?: AbortSignal): Promise<string[]>;
}

export class NodeFileSystem implements FileSystem {
  private current: string;
  private readonly homeDir: string;

  constructor(initialCwd: string = process.cwd(), homeDir: string = homedir()) {
    this.homeDir = homeDir;
    this.current = resolve(initialCwd);
  }

  async probe(): Promise<void> {
    try {
      await access(this.current, constants.R_OK);
    } catch (err) {
      throw fromErrno(err, this.current);
    }
  }

  cwd(): string {
    return this.current;
  }

  home(): string {
    return this.homeDir;
  }

  resolve(path: string): string {
    if (path === "~") return this.homeDir;
    if (path.startsWith("~/")) return join(this.homeDir, path.slice(2));
    return resolve(this.current, path);
  }

  async list(path: string): Promise<DirEntry[]> {
    const target = this.resolve(path);
    try {
      const info = await stat(target);
      if (!info.isDirectory()) {
        return [{ name: path, isDirectory: false, size: info.size, modified: info.mtime }];
      }

      const names = await readdir(target);
      const entries: DirEntry[] = [];
      for (const name of names) {
        // Dangling symlinks still get listed
        const entryInfo = await stat(join(target, name)).catch(() => lstat(join(target, name)));
        entries.push({
          name,
          isDirectory: entryInfo.isDirectory(),
          size: entryInfo.size,
          modified: entryInfo.mtime,
        });
      }
      return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    } catch (err) {
      throw fromErrno(err, path);
    }
  }

  async changeDir(path: string): Promise<string> {
    const target = this.resolve(path);
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(target)).isDirectory();
    } catch (err) {
      throw fromErrno(err, path);
    }
    if (!isDirectory) throw new CapabilityError(ErrorKind.NotDirectory, path);
    this.current = target;
    return target;
  }

  async makeDir(path: string, options: { parents?: boolean } = {}): Promise<void> {
    const target = this.resolve(path);
    try {
      if (options.parents) {
        await mkdir(target, { recursive: true });
        // recursive mkdir is silent when a file sits at the target
        if (!(await stat(target)).isDirectory()) throw new CapabilityError(ErrorKind.AlreadyExists, path);
      } else {
        await mkdir(target);
      }
    } catch (err) {
      throw fromErrno(err, path);
    }
  }

  async remove(path: string, options: { recursive?: boolean } = {}): Promise<void> {
    const target = this.resolve(path);
    try {
      const info = await lstat(target);
      if (info.isDirectory() && !options.recursive) {
        throw new CapabilityError(ErrorKind.IsDirectory, path);
      }
      await rm(target, { recursive: info.isDirectory() });
    } catch (err) {
      throw fromErrno(err, path);
    }
  }

  async copy(source: string, destination: string): Promise<void> {
    const from = this.resolve(source);
    try {
      const to = await this.intoDirectory(from, this.resolve(destination));
      const info = await stat(from);
      if (info.isDirectory()) {
        await cp(from, to, { recursive: true });
      } else {
        await copyFile(from, to);
      }
    } catch (err) {
      throw fromErrno(err, source);
    }
  }

  async move(source: string, destination: string): Promise<void> {
    const from = this.resolve(source);
    try {
      const to = await this.intoDirectory(from, this.resolve(destination));
      try {
        await rename(from, to);
      } catch (err) {
        if (!isErrnoException(err) || err.code !== "EXDEV") throw err;
        // Different device: copy, then drop the original
        await cp(from, to, { recursive: true });
        await rm(from, { recursive: true });
      }
    } catch (err) {
      throw fromErrno(err, source);
    }
  }

  async read(path: string): Promise<string> {
    const target = this.resolve(path);
    try {
      return await readFile(target, "utf-8");
    } catch (err) {
      throw fromErrno(err, path);
    }
  }

  async createEmpty(path: string): Promise<void> {
    const target = this.resolve(path);
    try {
      const handle = await open(target, "a");
      await handle.close();
      const now = new Date();
      await utimes(target, now, now);
    } catch (err) {
      throw fromErrno(err, path);
    }
  }

  async writeText(path: string, text: string): Promise<void> {
    const target = this.resolve(path);
    try {
      await writeFile(target, text, "utf-8");
    } catch (err) {
      throw fromErrno(err, path);
    }
  }

  async walk(path: string, signal?: AbortSignal): Promise<string[]> {
    const root = this.resolve(path);
    const info = await stat(root).catch((err: unknown) => {
      throw fromErrno(err, path);
    });
    if (!info.isDirectory()) throw new CapabilityError(ErrorKind.NotDirectory, path);

    const files: string[] = [];
    const pending = [root];
    while (pending.length > 0) {
      if (signal?.aborted) throw new InterruptedError();
      const dir = pending.pop();
      if (dir === undefined) break;
      let entries: Dirent[];
      try {
        entries = await readdir(dir, { withFileTypes: true });
      } catch (err) {
        // Unreadable subdirectories are skipped; only the root must be readable
        if (dir === root) throw fromErrno(err, path);
        continue;
      }
      for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) pending.push(full);
        else if (entry.isFile()) files.push(full);
      }
    }
    return files.sort();
  }

  // cp/mv into an existing directory land at dir/basename(source)
  private async intoDirectory(source: string, destination: string): Promise<string> {
    try {
      if ((await stat(destination)).isDirectory()) return join(destination, basename(source));
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "ENOENT") throw err;
    }
    return destination;
  }
}
