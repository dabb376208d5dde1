import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_SETTINGS, envOverrides, loadSettings } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadSettings", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "nlsh-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const writeConfig = (body: string) => writeFile(join(dir, "config.json"), body);

  it("uses defaults without a config file", () => {
    const { settings, paths } = loadSettings(dir, {});
    expect(settings).toEqual(DEFAULT_SETTINGS);
    expect(settings.historyLimit).toBe(1000);
    expect(settings.suggestionLimit).toBe(3);
    expect(settings.translatorVerb).toBe("ai");
    expect(paths).toEqual({
      dir,
      config: join(dir, "config.json"),
      history: join(dir, "history"),
      log: join(dir, "nlsh.log"),
    });
  });

  it("reads config.json and lets the environment win", async () => {
    await writeConfig(JSON.stringify({ historyLimit: 50, lang: "ko", processLimit: 5 }));
    const { settings } = loadSettings(dir, { NLSH_HISTORY_LIMIT: "20", NLSH_LOG_LEVEL: "DEBUG" });
    expect(settings.historyLimit).toBe(20);
    expect(settings.lang).toBe("ko");
    expect(settings.processLimit).toBe(5);
    expect(settings.logLevel).toBe("debug");
  });

  it("ignores empty environment values", () => {
    expect(envOverrides({ NLSH_LANG: "", NLSH_HISTORY_LIMIT: "7" })).toEqual({ historyLimit: 7 });
  });

  it("rejects malformed JSON", async () => {
    await writeConfig("{");
    expect(() => loadSettings(dir, {})).toThrow(ConfigError);
    expect(() => loadSettings(dir, {})).toThrow(/invalid JSON/);
  });

  it("rejects a config that is not an object", async () => {
    await writeConfig("[1, 2]");
    expect(() => loadSettings(dir, {})).toThrow(/expected a JSON object/);
  });

  it("names the offending setting", async () => {
    await writeConfig(JSON.stringify({ historyLimit: -1 }));
    expect(() => loadSettings(dir, {})).toThrow(/historyLimit/);
  });

  it("rejects a translator verb that is not a lowercase word", async () => {
    await writeConfig(JSON.stringify({ translatorVerb: "A I" }));
    expect(() => loadSettings(dir, {})).toThrow(/translatorVerb: must be a lowercase word/);
  });

  it("rejects a non-numeric environment override", () => {
    expect(() => loadSettings(dir, { NLSH_HISTORY_LIMIT: "lots" })).toThrow(ConfigError);
  });
});
