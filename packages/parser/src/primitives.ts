/**
 * Leaf matchers for @cutparse/parser
 *
 * Every primitive skips whitespace per the active policy, then either
 * consumes a span (writing it to `node.token`) or fails at the position it
 * attempted, leaving the node empty.
 */

import type { Parser } from "./types.js";
import { mkParser } from "./parser.js";

// ---------------------------------------------------------------------------
// Character sets
// ---------------------------------------------------------------------------

/**
 * Compile a matcher such as `a-zA-Z_` into a membership test. A `-` between
 * two characters makes an inclusive range; anything else is taken literally.
 */
function parseMatcher(matcher: string): (c: string) => boolean {
  const alphabet = new Set<string>();
  const ranges: [string, string][] = [];
  const cs = [...matcher];
  for (let i = 0; i < cs.length; i++) {
    if (i + 2 < cs.length && cs[i + 1] === "-") {
      ranges.push([cs[i], cs[i + 2]]);
      i += 2;
    } else {
      alphabet.add(cs[i]);
    }
  }
  return (c) => alphabet.has(c) || ranges.some(([from, to]) => c >= from && c <= to);
}

function charsImpl<V>(matcher: string, stopOn: boolean, min: number, max: number): Parser<V> {
  const inSet = parseMatcher(matcher);
  const expected = stopOn ? `anything but ${matcher}` : matcher;
  return mkParser(`[${stopOn ? "^" : ""}${matcher}]`, (state, node) => {
    state.skipWhitespace();
    const { input } = state;
    const start = state.pos;
    let i = start;
    for (; i < input.length; i++) {
      if (max !== -1 && i - start >= max) break;
      if (inSet(input[i]) === stopOn) break;
    }
    if (i - start < min) {
      state.errorHere(expected);
      return;
    }
    node.token = input.slice(start, i);
    state.pos = i;
  });
}

/**
 * Match a run of characters from `matcher`, at least `min` and at most `max`
 * long (`-1` for no limit).
 *
 * ```ts
 * chars("a-zA-Z_")      // an identifier-ish word
 * chars("0-9", 4, 4)    // exactly four digits
 * ```
 */
export function chars<V = unknown>(matcher: string, min = 1, max = -1): Parser<V> {
  return charsImpl<V>(matcher, false, min, max);
}

/** Match a run of characters NOT in `matcher`. */
export function notChars<V = unknown>(matcher: string, min = 1, max = -1): Parser<V> {
  return charsImpl<V>(matcher, true, min, max);
}

// ---------------------------------------------------------------------------
// Regular expressions
// ---------------------------------------------------------------------------

/** Match a regex anchored at the current position. Expected text is its source. */
export function regex<V = unknown>(pattern: RegExp | string): Parser<V> {
  return namedRegex<V>(typeof pattern === "string" ? pattern : pattern.source, pattern);
}

/** Like `regex`, reporting `name` as what was expected on failure. */
export function namedRegex<V = unknown>(name: string, pattern: RegExp | string): Parser<V> {
  const anchored =
    typeof pattern === "string"
      ? new RegExp(pattern, "y")
      : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, "") + "y");
  return mkParser(name, (state, node) => {
    state.skipWhitespace();
    anchored.lastIndex = state.pos;
    const m = anchored.exec(state.input);
    if (!m) {
      state.errorHere(name);
      return;
    }
    node.token = m[0];
    state.advance(m[0].length);
  });
}

// ---------------------------------------------------------------------------
// Spans
// ---------------------------------------------------------------------------

/** Match everything up to the first terminator, or to the end of input. */
export function until<V = unknown>(...terminators: string[]): Parser<V> {
  const expected = `anything but ${terminators.join(" or ")}`;
  return mkParser("until()", (state, node) => {
    state.skipWhitespace();
    const { input } = state;
    const start = state.pos;
    let end = input.length;
    for (const t of terminators) {
      const i = input.indexOf(t, start);
      if (i !== -1 && i < end) end = i;
    }
    if (end === start) {
      state.errorHere(expected);
      return;
    }
    node.token = input.slice(start, end);
    state.pos = end;
  });
}

// ---------------------------------------------------------------------------
// Literals
// ---------------------------------------------------------------------------

const SIMPLE_ESCAPES: Record<string, string> = {
  n: "\n",
  r: "\r",
  t: "\t",
  b: "\b",
  f: "\f",
  "\\": "\\",
  "/": "/",
  '"': '"',
  "'": "'",
};

const HEX4 = /^[0-9a-fA-F]{4}$/;

/**
 * Match a quoted string with backslash escapes. The token is the raw source
 * text; the value is the unescaped contents.
 *
 * Once the opening quote is seen, a bad escape fails at the backslash and a
 * missing closing quote fails at the end of input. The cursor stays at the
 * opening quote either way, so only the reported offset moves forward.
 *
 * @param quotes - Characters accepted as the opening (and matching closing) quote
 */
export function stringLit<V = string>(quotes = `"'`): Parser<V | string> {
  return mkParser<V | string>("string literal", (state, node) => {
    state.skipWhitespace();
    const { input } = state;
    const start = state.pos;
    const q = input[start];
    if (start >= input.length || !quotes.includes(q)) {
      state.errorHere("string literal");
      return;
    }
    let i = start + 1;
    let value = "";
    while (i < input.length) {
      const ch = input[i];
      if (ch === q) {
        node.token = input.slice(start, i + 1);
        node.value = value;
        state.pos = i + 1;
        return;
      }
      if (ch !== "\\") {
        value += ch;
        i++;
        continue;
      }
      const esc = input[i + 1];
      if (esc === "u" && HEX4.test(input.slice(i + 2, i + 6))) {
        value += String.fromCharCode(parseInt(input.slice(i + 2, i + 6), 16));
        i += 6;
        continue;
      }
      const simple = esc === undefined ? undefined : SIMPLE_ESCAPES[esc];
      if (simple === undefined) {
        state.error = { pos: i, expected: "valid escape sequence" };
        return;
      }
      value += simple;
      i += 2;
    }
    state.error = { pos: input.length, expected: "closing quote" };
  });
}

const NUMBER = /[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?/y;

/** Match a signed decimal number with optional fraction and exponent. */
export function numberLit<V = number>(): Parser<V | number> {
  return mkParser<V | number>("number", (state, node) => {
    state.skipWhitespace();
    NUMBER.lastIndex = state.pos;
    const m = NUMBER.exec(state.input);
    if (!m) {
      state.errorHere("number");
      return;
    }
    node.token = m[0];
    node.value = Number(m[0]);
    state.advance(m[0].length);
  });
}
