import { describe, it, expect } from "vitest";
import {
  run,
  exact,
  seq,
  bind,
  asciiWhitespace,
  noWhitespace,
  ParseError,
  MatchError,
  UnparsedInputError,
  lineCol,
  outranks,
} from "../index.js";

describe("run", () => {
  it("skips surrounding whitespace and returns the value", () => {
    const result = run(bind("true", true), "  true  ");
    expect(result).toEqual({
      ok: true,
      node: { token: "true", children: [], value: true },
      value: true,
      leftover: "",
    });
  });

  it("accepts a bare literal", () => {
    expect(run("x", "   x").ok).toBe(true);
  });

  it("reports a mismatch as a MatchError", () => {
    const result = run(seq("hello", "world"), "hello there");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(MatchError);
    expect(result.error.message).toBe("offset 6: expected world");
    expect(result.leftover).toBe("hello there");
  });

  it("reports unconsumed input as an UnparsedInputError", () => {
    const result = run("hello", "hello world");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UnparsedInputError);
    expect(result.error).not.toBeInstanceOf(MatchError);
    expect(result.error.message).toBe("left unparsed: world");
    expect(result.leftover).toBe("world");
    expect(result.node.token).toBe("hello");
  });

  it("honours the whitespace option", () => {
    expect(run(seq("a", "b"), "a b", { whitespace: noWhitespace }).ok).toBe(false);
    expect(run(seq("a", "b"), "a\u00a0b").ok).toBe(true);
    expect(run(seq("a", "b"), "a\u00a0b", { whitespace: asciiWhitespace }).ok).toBe(false);
  });
});

describe("Parser.parse / parseAll", () => {
  it("parse is run", () => {
    expect(seq("a", "b").parse("a b")).toEqual(run(seq("a", "b"), "a b"));
  });

  it("parseAll returns the root node", () => {
    expect(exact("a").parseAll(" a ").token).toBe("a");
  });

  it("parseAll throws the error", () => {
    expect(() => exact("a").parseAll("b")).toThrow(MatchError);
    expect(() => exact("a").parseAll("a b")).toThrow(UnparsedInputError);
  });
});

describe("errors", () => {
  it("classifies UnparsedInputError apart from other errors", () => {
    const unparsed = new UnparsedInputError("more stuff");
    expect(unparsed).toBeInstanceOf(UnparsedInputError);
    expect(unparsed).toBeInstanceOf(ParseError);
    expect(unparsed).toBeInstanceOf(Error);

    const generic = new Error("left unparsed: more stuff");
    expect(generic).not.toBeInstanceOf(UnparsedInputError);
    expect(generic.message).toBe(unparsed.message);

    const mismatch = new MatchError("x", { pos: 0, expected: "y" });
    expect(mismatch).not.toBeInstanceOf(UnparsedInputError);
  });

  it("locates a MatchError by line and column", () => {
    const input = "a\n\n  c";
    const result = run(seq("a", "b"), input);
    if (result.ok || !(result.error instanceof MatchError)) throw new Error("expected a MatchError");
    expect(result.error.pos).toBe(5);
    expect(result.error.line).toBe(3);
    expect(result.error.col).toBe(3);
    expect(result.error.render()).toBe("Parse error at line 3, col 3: expected b\n  ...a\n\n  c...");
  });

  it("converts offsets to 1-based line and column", () => {
    expect(lineCol("ab\ncd", 0)).toEqual({ line: 1, col: 1 });
    expect(lineCol("ab\ncd", 4)).toEqual({ line: 2, col: 2 });
  });

  it("ranks failures by position, later wins ties", () => {
    expect(outranks({ pos: 3, expected: "a" }, null)).toBe(true);
    expect(outranks({ pos: 3, expected: "a" }, { pos: 2, expected: "b" })).toBe(true);
    expect(outranks({ pos: 3, expected: "a" }, { pos: 3, expected: "b" })).toBe(true);
    expect(outranks({ pos: 2, expected: "a" }, { pos: 3, expected: "b" })).toBe(false);
  });
});
