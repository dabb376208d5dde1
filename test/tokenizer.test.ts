import { describe, it, expect } from "vitest";
import { quoteArg, restAfterVerb, splitWords, tokenize } from "../src/tokenizer.js";
import { EmptyInputError } from "../src/errors.js";

describe("tokenize", () => {
  it("splits verb and args on whitespace", () => {
    expect(tokenize("ls -l docs")).toEqual({ verb: "ls", args: ["-l", "docs"] });
  });

  it("strips surrounding whitespace and keeps quoted spans whole", () => {
    expect(tokenize('  write notes.txt "hello world"  ')).toEqual({
      verb: "write",
      args: ["notes.txt", "hello world"],
    });
  });

  it("keeps verb case as typed", () => {
    expect(tokenize("LS").verb).toBe("LS");
  });

  it("rejects blank input", () => {
    expect(() => tokenize("")).toThrow(EmptyInputError);
    expect(() => tokenize("   \t ")).toThrow(EmptyInputError);
  });

  it("keeps an empty quoted verb", () => {
    expect(tokenize('"" foo')).toEqual({ verb: "", args: ["foo"] });
    expect(tokenize('""')).toEqual({ verb: "", args: [] });
  });
});

describe("splitWords", () => {
  it("concatenates adjacent quoted and bare text", () => {
    expect(splitWords('echo a"b c"')).toEqual(["echo", "ab c"]);
  });

  it("honours escapes inside double quotes only", () => {
    expect(splitWords('echo "say \\"hi\\""')).toEqual(["echo", 'say "hi"']);
    expect(splitWords("echo 'a\\b'")).toEqual(["echo", "a\\b"]);
  });

  it("yields an empty arg for an empty quoted span", () => {
    expect(splitWords('echo ""')).toEqual(["echo", ""]);
  });

  it("runs an unterminated quote to end of line", () => {
    expect(splitWords('cat "my file')).toEqual(["cat", "my file"]);
  });
});

describe("restAfterVerb", () => {
  it("drops one pair of enclosing quotes", () => {
    expect(restAfterVerb('ai "create a file named test.txt"')).toBe("create a file named test.txt");
    expect(restAfterVerb("ai 'show CPU usage'")).toBe("show CPU usage");
  });

  it("keeps inner quotes", () => {
    expect(restAfterVerb('ai write "hello world" to notes.txt')).toBe('write "hello world" to notes.txt');
    expect(restAfterVerb('ai "a" and "b"')).toBe('"a" and "b"');
  });

  it("is empty for a bare verb", () => {
    expect(restAfterVerb("ai")).toBe("");
    expect(restAfterVerb("  ai   ")).toBe("");
  });
});

describe("quoteArg", () => {
  it("leaves plain words alone", () => {
    expect(quoteArg("notes.txt")).toBe("notes.txt");
  });

  it("quotes whitespace, quotes and empty strings", () => {
    expect(quoteArg("my notes.txt")).toBe('"my notes.txt"');
    expect(quoteArg("")).toBe('""');
    expect(quoteArg('say "hi"')).toBe('"say \\"hi\\""');
  });

  it("round-trips through tokenize", () => {
    for (const arg of ["plain", "two words", 'with "quotes"', "back\\slash", "it's"]) {
      expect(tokenize(`echo ${quoteArg(arg)}`).args).toEqual([arg]);
    }
  });
});
