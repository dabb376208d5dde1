import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, realpath, rm, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NodeFileSystem } from "../src/capabilities/filesystem.js";
import { CapabilityError, ErrorKind, InterruptedError } from "../src/errors.js";

describe("NodeFileSystem", () => {
  let root: string;
  let fs: NodeFileSystem;

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), "nlsh-fs-")));
    fs = new NodeFileSystem(root, "/home/tester");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("resolves paths against its own working directory", () => {
    expect(fs.cwd()).toBe(root);
    expect(fs.resolve("a/../b")).toBe(join(root, "b"));
    expect(fs.resolve("~")).toBe("/home/tester");
    expect(fs.resolve("~/notes")).toBe("/home/tester/notes");
    expect(fs.resolve("/etc")).toBe("/etc");
  });

  it("probes the starting directory", async () => {
    await expect(fs.probe()).resolves.toBeUndefined();
    await expect(new NodeFileSystem(join(root, "gone")).probe()).rejects.toMatchObject({
      kind: ErrorKind.NotFound,
    });
  });

  it("creates an empty file that then lists once", async () => {
    await fs.createEmpty("test.txt");
    const entries = await fs.list(".");
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ name: "test.txt", isDirectory: false, size: 0 });
  });

  it("keeps content when touching an existing file", async () => {
    await fs.writeText("a.txt", "hi\n");
    await fs.createEmpty("a.txt");
    expect(await fs.read("a.txt")).toBe("hi\n");
  });

  it("lists a file operand as itself and sorts directory entries", async () => {
    await fs.writeText("b.txt", "x");
    await fs.makeDir("a");
    expect((await fs.list(".")).map((e) => [e.name, e.isDirectory])).toEqual([
      ["a", true],
      ["b.txt", false],
    ]);
    expect((await fs.list("b.txt")).map((e) => e.name)).toEqual(["b.txt"]);
  });

  it("refuses to recreate a directory without parents", async () => {
    await fs.makeDir("d");
    await expect(fs.makeDir("d")).rejects.toMatchObject({ kind: ErrorKind.AlreadyExists, path: "d" });
    await expect(fs.makeDir("d", { parents: true })).resolves.toBeUndefined();
    await fs.makeDir("x/y/z", { parents: true });
    expect((await fs.list("x/y")).map((e) => e.name)).toEqual(["z"]);
  });

  it("fails mkdir under a missing parent", async () => {
    await expect(fs.makeDir("no/such")).rejects.toMatchObject({ kind: ErrorKind.NotFound, path: "no/such" });
  });

  it("changes directory without moving the process", async () => {
    const processCwd = process.cwd();
    await fs.makeDir("d");
    expect(await fs.changeDir("d")).toBe(join(root, "d"));
    expect(fs.cwd()).toBe(join(root, "d"));
    expect(process.cwd()).toBe(processCwd);
  });

  it("refuses to cd into a file", async () => {
    await fs.writeText("f.txt", "");
    await expect(fs.changeDir("f.txt")).rejects.toMatchObject({ kind: ErrorKind.NotDirectory, path: "f.txt" });
    expect(fs.cwd()).toBe(root);
  });

  it("copies into an existing directory under the source name", async () => {
    await fs.writeText("a.txt", "data\n");
    await fs.makeDir("backup");
    await fs.copy("a.txt", "backup");
    expect(await readFile(join(root, "backup", "a.txt"), "utf-8")).toBe("data\n");
    expect(await fs.read("a.txt")).toBe("data\n");
  });

  it("copies directories recursively", async () => {
    await mkdir(join(root, "src", "deep"), { recursive: true });
    await writeFile(join(root, "src", "deep", "f"), "1");
    await fs.copy("src", "dst");
    expect(await fs.read("dst/deep/f")).toBe("1");
  });

  it("moves and renames", async () => {
    await fs.writeText("old.txt", "x");
    await fs.move("old.txt", "new.txt");
    await expect(fs.read("old.txt")).rejects.toBeInstanceOf(CapabilityError);
    expect(await fs.read("new.txt")).toBe("x");
  });

  it("needs recursive to remove a directory", async () => {
    await fs.makeDir("d");
    await fs.writeText("d/f", "");
    await expect(fs.remove("d")).rejects.toMatchObject({ kind: ErrorKind.IsDirectory, path: "d" });
    await fs.remove("d", { recursive: true });
    await expect(fs.list("d")).rejects.toMatchObject({ kind: ErrorKind.NotFound });
  });

  it("reports a missing file under the name given", async () => {
    await expect(fs.read("missing.txt")).rejects.toMatchObject({
      kind: ErrorKind.NotFound,
      path: "missing.txt",
    });
  });

  it("reports reading a directory", async () => {
    await fs.makeDir("d");
    await expect(fs.read("d")).rejects.toMatchObject({ kind: ErrorKind.IsDirectory });
  });

  it("walks regular files in sorted order", async () => {
    await fs.makeDir("b/c", { parents: true });
    await fs.writeText("b/c/z.txt", "");
    await fs.writeText("a.txt", "");
    await fs.writeText("b/y.txt", "");
    expect(await fs.walk(".")).toEqual([
      join(root, "a.txt"),
      join(root, "b", "c", "z.txt"),
      join(root, "b", "y.txt"),
    ]);
  });

  it("stops walking when aborted", async () => {
    await fs.writeText("a.txt", "");
    const controller = new AbortController();
    controller.abort();
    await expect(fs.walk(".", controller.signal)).rejects.toBeInstanceOf(InterruptedError);
  });

  it("refuses to walk a file", async () => {
    await fs.writeText("a.txt", "");
    await expect(fs.walk("a.txt")).rejects.toMatchObject({ kind: ErrorKind.NotDirectory });
  });
});
