/**
 * Failure values and error classes for @cutparse/parser
 *
 * Inside the engine a failure is a plain `Failure` value held on the state;
 * `run` turns it into a `MatchError` for callers.
 */

/** Where a match failed and what was expected there. */
export interface Failure {
  readonly pos: number;
  readonly expected: string;
}

/**
 * Furthest-failure rule: `a` outranks `b` when it failed at least as far into
 * the input. On a tie the later failure (`a`) wins.
 */
export function outranks(a: Failure, b: Failure | null): boolean {
  return b === null || a.pos >= b.pos;
}

/** Base class of every error the driver reports. */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

/** No alternative matched. */
export class MatchError extends ParseError {
  /** Zero-based offset of the furthest failure. */
  readonly pos: number;
  /** What the parser expected at `pos`. */
  readonly expected: string;
  /** 1-based line of `pos`. */
  readonly line: number;
  /** 1-based column of `pos`. */
  readonly col: number;

  private readonly input: string;

  constructor(input: string, failure: Failure) {
    super(`offset ${failure.pos}: expected ${failure.expected}`);
    this.name = "MatchError";
    this.pos = failure.pos;
    this.expected = failure.expected;
    this.input = input;
    const { line, col } = lineCol(input, failure.pos);
    this.line = line;
    this.col = col;
  }

  /** Human-oriented message with line/column and an excerpt of the input. */
  render(): string {
    const snippet = this.input.slice(Math.max(0, this.pos - 10), this.pos + 20);
    return `Parse error at line ${this.line}, col ${this.col}: expected ${this.expected}\n  ...${snippet}...`;
  }
}

/** The grammar matched, but input was left over. */
export class UnparsedInputError extends ParseError {
  readonly leftover: string;

  constructor(leftover: string) {
    super(`left unparsed: ${leftover}`);
    this.name = "UnparsedInputError";
    this.leftover = leftover;
  }
}

/** Convert a zero-based offset to 1-based line/col. */
export function lineCol(input: string, pos: number): { line: number; col: number } {
  let line = 1;
  let col = 1;
  for (let i = 0; i < pos && i < input.length; i++) {
    if (input[i] === "\n") {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { line, col };
}
