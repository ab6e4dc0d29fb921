/**
 * Parser construction and the top-level driver for @cutparse/parser
 *
 * Every parser is built with `mkParser`, which attaches tracing and the
 * `parse`/`parseAll` conveniences. `parsify` lets combinators accept a bare
 * string wherever a parser is expected.
 */

import type { Parser, Parserish, ParseNode, RunOptions, RunResult } from "./types.js";
import { State } from "./state.js";
import { MatchError, UnparsedInputError } from "./errors.js";
import { TRACE_INPUT_WIDTH } from "./trace.js";

export type MatchFn<V> = (state: State, node: ParseNode<V>) => void;

/** Create a Parser<V> from a raw match function. */
export function mkParser<V>(name: string, fn: MatchFn<V>): Parser<V> {
  const parser: Parser<V> = {
    name,
    match(state, node) {
      const sink = state.trace;
      if (!sink) {
        fn(state, node);
        return;
      }
      const pos = state.pos;
      const depth = state.depth++;
      try {
        fn(state, node);
      } finally {
        state.depth = depth;
      }
      const input = state.input.slice(pos, pos + TRACE_INPUT_WIDTH);
      if (state.error) {
        sink({ name, pos, input, depth, outcome: "fail", expected: state.error.expected });
      } else {
        sink({ name, pos, input, depth, outcome: "match", token: node.token });
      }
    },
    parse(input, options) {
      return run(parser, input, options);
    },
    parseAll(input, options) {
      const result = run(parser, input, options);
      if (!result.ok) throw result.error;
      return result.node;
    },
  };
  return parser;
}

export function emptyNode<V>(): ParseNode<V> {
  return { token: "", children: [] };
}

/** Return a node to the empty state a failed or absent match must leave. */
export function resetNode<V>(node: ParseNode<V>): void {
  node.token = "";
  node.children = [];
  delete node.value;
  delete node.noise;
}

/** Match an exact string. */
export function exact<V = unknown>(text: string): Parser<V> {
  return mkParser(JSON.stringify(text), (state, node) => {
    state.skipWhitespace();
    if (!state.input.startsWith(text, state.pos)) {
      state.errorHere(text);
      return;
    }
    node.token = text;
    state.advance(text.length);
  });
}

/** Normalise a literal or parser into a parser. */
export function parsify<V>(p: Parserish<V>): Parser<V> {
  return typeof p === "string" ? exact<V>(p) : p;
}

export function parsifyAll<V>(ps: readonly Parserish<V>[]): Parser<V>[] {
  return ps.map((p) => parsify(p));
}

/**
 * Late-bound parser for recursive grammars. `f` is called on first use.
 *
 * ```ts
 * const parens: Parser = seq("(", maybe(lazy(() => parens)), ")");
 * ```
 */
export function lazy<V>(f: () => Parserish<V>): Parser<V> {
  let cached: Parser<V> | null = null;
  return mkParser("lazy()", (state, node) => {
    if (!cached) cached = parsify(f());
    cached.match(state, node);
  });
}

/**
 * Run a grammar against the whole input.
 *
 * Leading and trailing whitespace (per the active policy) is skipped. A
 * grammar that matches but stops short of the end of input fails with an
 * `UnparsedInputError`; one that does not match fails with a `MatchError`.
 */
export function run<V>(p: Parserish<V>, input: string, options: RunOptions = {}): RunResult<V> {
  const parser = parsify(p);
  const state = new State(input, options);
  const node = emptyNode<V>();

  state.skipWhitespace();
  parser.match(state, node);

  if (state.error) {
    return {
      ok: false,
      node,
      value: node.value,
      leftover: state.remaining(),
      error: new MatchError(input, state.error),
    };
  }

  state.skipWhitespace();
  if (!state.atEnd()) {
    const leftover = state.remaining();
    return { ok: false, node, value: node.value, leftover, error: new UnparsedInputError(leftover) };
  }

  return { ok: true, node, value: node.value, leftover: "" };
}
