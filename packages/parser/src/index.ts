/**
 * @cutparse/parser
 *
 * Parser combinators over a shared cursor, with backtracking, an explicit
 * commit (`cut`) and furthest-failure error reporting.
 *
 * Provides:
 * - A combinator algebra: seq, any, anyWithName, longest, many, some, maybe,
 *   cut, bind, map, merge, noAutoWS, signalSeq
 * - Leaf matchers that follow the same cursor contract
 * - A driver (`run`) that reports unconsumed input separately from mismatches
 *
 * @module
 */

// Core types
export type { ParseNode, Parser, Parserish, RunOptions, RunResult } from "./types.js";

// Cursor
export {
  State,
  unicodeWhitespace,
  asciiWhitespace,
  noWhitespace,
  type StateOptions,
  type WhitespacePolicy,
} from "./state.js";

// Errors
export {
  ParseError,
  MatchError,
  UnparsedInputError,
  outranks,
  lineCol,
  type Failure,
} from "./errors.js";

// Parser construction and driver
export {
  mkParser,
  emptyNode,
  resetNode,
  exact,
  parsify,
  parsifyAll,
  lazy,
  run,
  type MatchFn,
} from "./parser.js";

// Leaf matchers
export {
  chars,
  notChars,
  regex,
  namedRegex,
  until,
  stringLit,
  numberLit,
} from "./primitives.js";

// Combinator API
export {
  END_OF_INPUT,
  seq,
  any,
  anyWithName,
  longest,
  many,
  some,
  maybe,
  cut,
  bind,
  map,
  flattenToken,
  merge,
  noAutoWS,
  signalSeq,
  signalChildren,
} from "./combinators.js";

// Tracing
export {
  TRACE_INPUT_WIDTH,
  formatTraceRecord,
  consoleTraceSink,
  createTraceStats,
  type TraceRecord,
  type TraceSink,
  type ParserStats,
  type TraceStats,
} from "./trace.js";

// Configuration
export {
  DEFAULT_CONFIG,
  ConfigError,
  validateConfig,
  configFromEnv,
  loadConfigFile,
  loadConfig,
  runOptionsFromConfig,
  type CutparseConfig,
  type WhitespaceMode,
  type LoadConfigOptions,
} from "./config.js";
