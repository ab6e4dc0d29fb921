/**
 * Diagnostic tracing for @cutparse/parser
 *
 * A trace sink is handed to `run` and receives one record per parser
 * invocation. It has no effect on results.
 */

/** One parser invocation. */
export interface TraceRecord {
  /** Parser name, e.g. `seq()` or `"hello"`. */
  name: string;
  /** Offset the invocation started at. */
  pos: number;
  /** Up to `TRACE_INPUT_WIDTH` characters of input at `pos`. */
  input: string;
  /** Nesting depth, 0 for the outermost parser. */
  depth: number;
  outcome: "match" | "fail";
  /** Matched text, on a match. */
  token?: string;
  /** Expected description, on a failure. */
  expected?: string;
}

export type TraceSink = (record: TraceRecord) => void;

export const TRACE_INPUT_WIDTH = 20;

/** Render a record as a single line. */
export function formatTraceRecord(record: TraceRecord): string {
  const indent = "  ".repeat(record.depth);
  const input = JSON.stringify(record.input);
  const detail =
    record.outcome === "match"
      ? `found ${JSON.stringify(record.token ?? "")}`
      : `expected ${record.expected ?? "?"}`;
  return `${indent}${record.name} @${record.pos} ${input} ${detail}`;
}

/**
 * A sink that writes one formatted line per record.
 *
 * @param writer - Line writer (default: console.error)
 */
export function consoleTraceSink(writer: (line: string) => void = (line) => console.error(line)): TraceSink {
  return (record) => writer(formatTraceRecord(record));
}

/** Per-parser invocation counts. */
export interface ParserStats {
  name: string;
  calls: number;
  matches: number;
  fails: number;
}

export interface TraceStats {
  readonly sink: TraceSink;
  /** Counts per parser name, most called first. */
  snapshot(): ParserStats[];
  /** Table of the counts, one parser per line. */
  report(): string;
  reset(): void;
}

/** Collect per-parser counts; useful when profiling a grammar. */
export function createTraceStats(): TraceStats {
  const byName = new Map<string, ParserStats>();

  const sink: TraceSink = (record) => {
    let stats = byName.get(record.name);
    if (!stats) {
      stats = { name: record.name, calls: 0, matches: 0, fails: 0 };
      byName.set(record.name, stats);
    }
    stats.calls++;
    if (record.outcome === "match") stats.matches++;
    else stats.fails++;
  };

  const snapshot = (): ParserStats[] =>
    [...byName.values()].map((s) => ({ ...s })).sort((a, b) => b.calls - a.calls);

  return {
    sink,
    snapshot,
    report() {
      const rows = snapshot();
      const width = Math.max(6, ...rows.map((r) => r.name.length));
      const lines = [`${"parser".padEnd(width)}  calls  match   fail`];
      for (const r of rows) {
        lines.push(
          `${r.name.padEnd(width)}  ${String(r.calls).padStart(5)}  ${String(r.matches).padStart(5)}  ${String(r.fails).padStart(5)}`,
        );
      }
      return lines.join("\n");
    },
    reset() {
      byName.clear();
    },
  };
}
