import { describe, it, expect } from "vitest";
import {
  formatBytes,
  formatDate,
  formatHistory,
  formatListing,
  formatPercent,
  formatProcessTable,
  formatTimestamp,
  PROCESS_HEADER,
  splitLines,
  splitUptime,
} from "../src/dispatcher/format.js";
import { FIXED_DATE } from "./fakes.js";

describe("formatBytes", () => {
  it("keeps bytes below 1 KB whole", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(1023)).toBe("1023 B");
  });

  it("scales to one decimal", () => {
    expect(formatBytes(1024)).toBe("1.0 KB");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(1024 * 1024)).toBe("1.0 MB");
    expect(formatBytes(5 * 1024 ** 3)).toBe("5.0 GB");
  });
});

describe("formatPercent", () => {
  it("rounds to one decimal", () => {
    expect(formatPercent(12.345)).toBe("12.3%");
    expect(formatPercent(0)).toBe("0.0%");
  });
});

describe("splitUptime", () => {
  it("splits seconds into days, hours and minutes", () => {
    expect(splitUptime(90_061)).toEqual({ days: 1, hours: 1, minutes: 1 });
    expect(splitUptime(59.9)).toEqual({ days: 0, hours: 0, minutes: 0 });
  });
});

describe("dates", () => {
  it("formats listing timestamps and full dates in local time", () => {
    expect(formatTimestamp(FIXED_DATE)).toBe("Mar 07 14:05");
    expect(formatDate(FIXED_DATE)).toBe("2024-03-07 14:05:09");
  });
});

describe("formatListing", () => {
  const entries = [
    { name: "docs", isDirectory: true, size: 4096, modified: FIXED_DATE },
    { name: "a.txt", isDirectory: false, size: 5, modified: FIXED_DATE },
  ];

  it("marks directories with a slash", () => {
    expect(formatListing(entries, false)).toBe("docs/\na.txt");
  });

  it("adds mode, size and time in long form", () => {
    expect(formatListing(entries, true).split("\n")).toEqual([
      "drwxr-xr-x     4096 Mar 07 14:05 docs/",
      "-rw-r--r--        5 Mar 07 14:05 a.txt",
    ]);
  });

  it("is empty for an empty directory", () => {
    expect(formatListing([], false)).toBe("");
  });
});

describe("formatProcessTable", () => {
  const rows = [
    { pid: 1, name: "a-very-long-process-name", cpuPercent: 0.5, memPercent: 1.5 },
    { pid: 42, name: "node", cpuPercent: 12.34, memPercent: 3 },
  ];

  it("sorts by CPU and truncates long names", () => {
    expect(formatProcessTable(rows, 10).split("\n")).toEqual([
      "   PID NAME                   CPU%   MEM%",
      "    42 node                  12.3%   3.0%",
      "     1 a-very-long-process-   0.5%   1.5%",
    ]);
  });

  it("honours the row limit", () => {
    expect(formatProcessTable(rows, 1).split("\n")).toHaveLength(2);
    expect(formatProcessTable([], 5)).toBe(PROCESS_HEADER);
  });
});

describe("formatHistory", () => {
  it("right-aligns sequence numbers", () => {
    expect(
      formatHistory([
        { rawInput: "ls", sequenceNumber: 3 },
        { rawInput: "pwd", sequenceNumber: 12 },
      ])
    ).toBe("   3  ls\n  12  pwd");
  });
});

describe("splitLines", () => {
  it("drops only the final empty line", () => {
    expect(splitLines("")).toEqual([]);
    expect(splitLines("a\r\nb\n")).toEqual(["a", "b"]);
    expect(splitLines("a\n\n")).toEqual(["a", ""]);
    expect(splitLines("a")).toEqual(["a"]);
  });
});
