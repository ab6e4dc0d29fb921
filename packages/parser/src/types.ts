/**
 * Core types for @cutparse/parser
 *
 * Defines the parse node, the parser interface and the driver's result type.
 */

import type { State, WhitespacePolicy } from "./state.js";
import type { MatchError, UnparsedInputError } from "./errors.js";
import type { TraceSink } from "./trace.js";

/**
 * A node in the parse tree.
 *
 * `V` is the semantic payload type chosen by the grammar author; the engine
 * never looks inside it.
 */
export interface ParseNode<V = unknown> {
  /** The matched text. */
  token: string;
  /** Sub-matches, in input order. */
  children: ParseNode<V>[];
  /** Semantic value attached by `bind`, `map` or a primitive. */
  value?: V;
  /** Set on filler children produced by `signalSeq`. */
  noise?: boolean;
}

/**
 * A parser matches at the state's cursor and writes what it found into
 * `node`. Failures are reported through `state.error`, never thrown.
 */
export interface Parser<V = unknown> {
  /** Name used in traces. */
  readonly name: string;
  /** Match at the current position, populating `node`. */
  match(state: State, node: ParseNode<V>): void;
  /** Run against the whole input; same as `run(parser, input, options)`. */
  parse(input: string, options?: RunOptions): RunResult<V>;
  /** Run against the whole input, throwing the error on failure. */
  parseAll(input: string, options?: RunOptions): ParseNode<V>;
}

/** Anything accepted where a parser is expected: a literal or a parser. */
export type Parserish<V = unknown> = string | Parser<V>;

export interface RunOptions {
  /** Whitespace skipped before tokens (default: `unicodeWhitespace`). */
  whitespace?: WhitespacePolicy;
  /** Receives one record per parser invocation. */
  trace?: TraceSink;
}

/** Outcome of `run`. */
export type RunResult<V> =
  | { ok: true; node: ParseNode<V>; value: V | undefined; leftover: "" }
  | {
      ok: false;
      node: ParseNode<V>;
      value: V | undefined;
      leftover: string;
      error: MatchError | UnparsedInputError;
    };
