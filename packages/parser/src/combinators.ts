/**
 * Combinator algebra for @cutparse/parser
 *
 * Combinators share one `State` and write into the node they are given.
 * A failed combinator restores the cursor to where it started unless the cut
 * barrier has moved past that point, in which case the failure is final and
 * no enclosing alternation, option or repetition may swallow it.
 */

import type { Parser, Parserish, ParseNode } from "./types.js";
import type { State } from "./state.js";
import { noWhitespace } from "./state.js";
import { type Failure, outranks } from "./errors.js";
import { mkParser, emptyNode, resetNode, parsify, parsifyAll } from "./parser.js";

/** Expected description when an alternation is reached at end of input. */
export const END_OF_INPUT = "more input";

function copyNode<V>(target: ParseNode<V>, source: ParseNode<V>): void {
  resetNode(target);
  target.token = source.token;
  target.children = source.children;
  if (source.value !== undefined) target.value = source.value;
  if (source.noise) target.noise = true;
}

// ---------------------------------------------------------------------------
// Sequence
// ---------------------------------------------------------------------------

/**
 * Match every parser in order; results land in `node.children[i]`.
 *
 * The token is the input slice covering the whole sequence, interior
 * whitespace included and leading whitespace left out. A failure rewinds to
 * the offset the sequence was entered at.
 */
export function seq<V>(...parsers: Parserish<V>[]): Parser<V> {
  const ps = parsifyAll(parsers);
  return mkParser("seq()", (state, node) => {
    const entry = state.pos;
    state.skipWhitespace();
    const start = state.pos;
    node.children = [];
    for (const p of ps) {
      const child = emptyNode<V>();
      node.children.push(child);
      p.match(state, child);
      if (state.errored()) {
        state.pos = entry;
        return;
      }
    }
    node.token = state.input.slice(start, state.pos);
  });
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/**
 * Shared entry of the alternation family. Returns the start offset, or null
 * when the alternation must not try anything.
 */
function enterAlternation(state: State): number | null {
  state.skipWhitespace();
  if (state.atEnd()) {
    state.errorHere(END_OF_INPUT);
    return null;
  }
  const start = state.pos;
  // A commit past this point was made earlier in the same attempt.
  if (state.cut > start) return null;
  state.recover();
  return start;
}

function requireAlternatives(name: string, count: number): void {
  if (count === 0) throw new Error(`${name} needs at least one alternative`);
}

/**
 * Ordered choice: the first alternative that matches wins.
 *
 * When every alternative fails, or one fails after a commit, the failure
 * that got furthest into the input across the alternatives tried is
 * reported.
 */
export function any<V>(...parsers: Parserish<V>[]): Parser<V> {
  requireAlternatives("any()", parsers.length);
  const ps = parsifyAll(parsers);
  return mkParser("any()", (state, node) => {
    const start = enterAlternation(state);
    if (start === null) return;

    let furthest: Failure | null = null;
    for (const p of ps) {
      resetNode(node);
      p.match(state, node);
      if (!state.error) return;
      if (outranks(state.error, furthest)) furthest = state.error;
      if (state.cut > start) {
        state.error = furthest ?? state.error;
        state.pos = start;
        return;
      }
      state.recover();
      state.pos = start;
    }

    resetNode(node);
    state.error = furthest ?? { pos: start, expected: "alternative" };
    state.pos = start;
  });
}

/**
 * Ordered choice that reports `name` as what was expected when no
 * alternative matches.
 */
export function anyWithName<V>(name: string, ...parsers: Parserish<V>[]): Parser<V> {
  requireAlternatives(`anyWithName(${name})`, parsers.length);
  const ps = parsifyAll(parsers);
  return mkParser(name, (state, node) => {
    const start = enterAlternation(state);
    if (start === null) return;

    for (const p of ps) {
      resetNode(node);
      p.match(state, node);
      if (!state.errored()) return;
      if (state.cut > start) {
        state.pos = start;
        return;
      }
      state.recover();
      state.pos = start;
    }

    resetNode(node);
    state.errorHere(name);
  });
}

/**
 * Try every alternative and keep the one that consumed the most input.
 * Ties go to the earliest alternative.
 *
 * ```ts
 * longest("operator", "=", "==", "===")
 * ```
 */
export function longest<V>(name: string, ...parsers: Parserish<V>[]): Parser<V> {
  requireAlternatives(`longest(${name})`, parsers.length);
  const ps = parsifyAll(parsers);
  return mkParser(name, (state, node) => {
    const start = enterAlternation(state);
    if (start === null) return;

    let best: ParseNode<V> | null = null;
    let bestPos = start;
    for (const p of ps) {
      const attempt = emptyNode<V>();
      p.match(state, attempt);
      if (state.errored()) {
        if (state.cut > start) {
          resetNode(node);
          state.pos = start;
          return;
        }
        state.recover();
      } else if (state.pos > bestPos) {
        best = attempt;
        bestPos = state.pos;
      }
      state.pos = start;
    }

    if (best) {
      copyNode(node, best);
      state.pos = bestPos;
      return;
    }
    resetNode(node);
    state.errorHere(name);
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

function repeat<V>(name: string, min: number, op: Parserish<V>, sep: Parserish<V> | undefined): Parser<V> {
  const opParser = parsify(op);
  const sepParser = sep === undefined ? null : parsify(sep);

  return mkParser(name, (state, node) => {
    const start = state.pos;
    node.children = [];
    for (;;) {
      const before = state.pos;
      const child = emptyNode<V>();
      opParser.match(state, child);
      if (state.errored()) {
        if (node.children.length < min || state.cut > state.pos) {
          state.pos = start;
          return;
        }
        state.recover();
        state.pos = before;
        break;
      }
      node.children.push(child);
      // An operand that consumed nothing would match here forever.
      if (state.pos === before) break;

      if (sepParser) {
        const afterOp = state.pos;
        sepParser.match(state, emptyNode<V>());
        if (state.errored()) {
          state.recover();
          state.pos = afterOp;
          break;
        }
      }
    }
    node.token = state.input.slice(start, state.pos);
  });
}

/**
 * Zero or more matches of `parser`, each a child of the node. A separator,
 * if given, is consumed between matches but kept out of the children; a
 * trailing separator is accepted.
 */
export function many<V>(parser: Parserish<V>, separator?: Parserish<V>): Parser<V> {
  return repeat("many()", 0, parser, separator);
}

/** One or more matches of `parser`. See `many`. */
export function some<V>(parser: Parserish<V>, separator?: Parserish<V>): Parser<V> {
  return repeat("some()", 1, parser, separator);
}

/** Zero or one match. Absence leaves an empty node and no error. */
export function maybe<V>(parser: Parserish<V>): Parser<V> {
  const p = parsify(parser);
  return mkParser("maybe()", (state, node) => {
    const start = state.pos;
    p.match(state, node);
    if (state.errored() && state.cut <= start) {
      state.recover();
      state.pos = start;
      resetNode(node);
    }
  });
}

// ---------------------------------------------------------------------------
// Commit
// ---------------------------------------------------------------------------

/**
 * Commit to the current alternative. Consumes nothing; once crossed, a later
 * failure can no longer be recovered from by an enclosing `any`, `maybe` or
 * `many`, so it is reported where it happened.
 *
 * ```ts
 * // Once "<" is seen, a missing ">" is an error rather than a reason to
 * // try the next alternative.
 * any(seq("<", cut(), chars("a-z"), ">"), chars("a-z"))
 * ```
 */
export function cut<V = unknown>(): Parser<V> {
  return mkParser("cut()", (state) => {
    state.commit();
  });
}

// ---------------------------------------------------------------------------
// Semantic values
// ---------------------------------------------------------------------------

/** Set a constant value on the node when `parser` matches. */
export function bind<V>(parser: Parserish<V>, value: V): Parser<V> {
  const p = parsify(parser);
  return mkParser("bind()", (state, node) => {
    p.match(state, node);
    if (state.errored()) return;
    node.value = value;
  });
}

/**
 * Call `f` with the populated node when `parser` matches. `f` typically sets
 * `node.value`, and may rewrite `node.token`.
 */
export function map<V>(parser: Parserish<V>, f: (node: ParseNode<V>) => void): Parser<V> {
  const p = parsify(parser);
  return mkParser("map()", (state, node) => {
    p.match(state, node);
    if (state.errored()) return;
    f(node);
  });
}

/** Depth-first concatenation of the leaf tokens under `node`. */
export function flattenToken<V>(node: ParseNode<V>): string {
  if (node.children.length === 0) return node.token;
  return node.children.map((child) => flattenToken(child)).join("");
}

/**
 * Collapse the matched structure into one token made of its leaf tokens.
 * Children are left in place.
 */
export function merge<V>(parser: Parserish<V>): Parser<V> {
  return map(parser, (node) => {
    node.token = flattenToken(node);
  });
}

// ---------------------------------------------------------------------------
// Whitespace
// ---------------------------------------------------------------------------

/** Turn off whitespace skipping for everything beneath `parser`. */
export function noAutoWS<V>(parser: Parserish<V>): Parser<V> {
  const p = parsify(parser);
  return mkParser("noAutoWS()", (state, node) => {
    const previous = state.ws;
    state.ws = noWhitespace;
    try {
      p.match(state, node);
    } finally {
      state.ws = previous;
    }
  });
}

// ---------------------------------------------------------------------------
// Signal amid noise
// ---------------------------------------------------------------------------

/**
 * Find `signals` in order, skipping over anything `noise` matches between
 * them.
 *
 * At each position the next expected signal is tried before the noise
 * parser, so a signal is never swallowed as filler. Noise children are kept
 * with `noise: true` unless the noise parser gave them a value, in which case
 * they are kept as meaningful matches. Input after the last meaningful match
 * is left unconsumed.
 *
 * ```ts
 * const order = signalSeq(regex(/\S+/), regex(/\d+/), regex(/eggs|chickens/));
 * order.parseAll("i would like 12 large eggs");  // token "12 eggs"
 * ```
 */
export function signalSeq<V>(noise: Parserish<V>, ...signals: Parserish<V>[]): Parser<V> {
  const noiseParser = parsify(noise);
  const signalParsers = parsifyAll(signals);

  return mkParser("signalSeq()", (state, node) => {
    const start = state.pos;
    const children: ParseNode<V>[] = [];
    let next = 0;
    let kept = 0;
    let keptEnd = start;
    let stallPos = start;
    let missed: Failure | null = null;

    for (;;) {
      state.skipWhitespace();
      const before = state.pos;
      stallPos = before;

      if (next < signalParsers.length) {
        const child = emptyNode<V>();
        signalParsers[next].match(state, child);
        if (!state.error) {
          children.push(child);
          next++;
          kept = children.length;
          keptEnd = state.pos;
          continue;
        }
        if (state.cut > before) {
          state.pos = start;
          return;
        }
        missed = state.error;
        state.recover();
        state.pos = before;
      }

      const child = emptyNode<V>();
      noiseParser.match(state, child);
      if (state.errored()) {
        if (state.cut > before) {
          state.pos = start;
          return;
        }
        state.recover();
        state.pos = before;
        break;
      }
      if (state.pos === before) break;
      children.push(child);
      if (child.value === undefined) {
        child.noise = true;
      } else {
        kept = children.length;
        keptEnd = state.pos;
      }
    }

    if (next < signalParsers.length) {
      const expected = missed ? `${missed.expected} or noise` : "noise";
      state.error = { pos: stallPos, expected };
      state.pos = start;
      return;
    }

    node.children = children.slice(0, kept);
    node.token = signalChildren(node)
      .map((c) => c.token)
      .join(" ");
    state.pos = keptEnd;
  });
}

/** The children of a `signalSeq` node that are not noise filler. */
export function signalChildren<V>(node: ParseNode<V>): ParseNode<V>[] {
  return node.children.filter((c) => !c.noise);
}
