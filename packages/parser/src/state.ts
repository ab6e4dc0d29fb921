/**
 * Parse state: the cursor every parser in one run shares.
 */

import type { Failure } from "./errors.js";
import type { TraceSink } from "./trace.js";

/** Advances `state.pos` past whatever the grammar treats as insignificant. */
export type WhitespacePolicy = (state: State) => void;

const UNICODE_WS = /\s*/uy;
const ASCII_WS = /[ \t\r\n]*/y;

function skipPattern(pattern: RegExp): WhitespacePolicy {
  return (state) => {
    pattern.lastIndex = state.pos;
    const m = pattern.exec(state.input);
    if (m) state.pos += m[0].length;
  };
}

/** Skip any Unicode whitespace. The default policy. */
export const unicodeWhitespace: WhitespacePolicy = skipPattern(UNICODE_WS);

/** Skip space, tab, carriage return and line feed only. */
export const asciiWhitespace: WhitespacePolicy = skipPattern(ASCII_WS);

/** Skip nothing. */
export const noWhitespace: WhitespacePolicy = () => {};

export interface StateOptions {
  whitespace?: WhitespacePolicy;
  trace?: TraceSink;
}

export class State {
  readonly input: string;
  /** Current offset into `input`. */
  pos = 0;
  /** The active failure, or `null`. */
  error: Failure | null = null;
  /** Cut barrier: failures at or past an entry offset below it are final. */
  cut = 0;
  /** Active whitespace policy; `noAutoWS` swaps it out temporarily. */
  ws: WhitespacePolicy;
  readonly trace: TraceSink | undefined;
  /** Nesting depth of traced invocations. */
  depth = 0;

  constructor(input: string, options: StateOptions = {}) {
    this.input = input;
    this.ws = options.whitespace ?? unicodeWhitespace;
    this.trace = options.trace;
  }

  skipWhitespace(): void {
    this.ws(this);
  }

  errored(): boolean {
    return this.error !== null;
  }

  /** Drop the active failure. */
  recover(): void {
    this.error = null;
  }

  /** Fail at the current position. */
  errorHere(expected: string): void {
    this.error = { pos: this.pos, expected };
  }

  advance(n: number): void {
    this.pos += n;
  }

  /** Raise the cut barrier to the current position. Never lowers it. */
  commit(): void {
    if (this.pos > this.cut) this.cut = this.pos;
  }

  /** Input from the cursor onwards. */
  remaining(): string {
    return this.input.slice(this.pos);
  }

  atEnd(): boolean {
    return this.pos >= this.input.length;
  }
}
