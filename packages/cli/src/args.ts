import { parseArgs } from "node:util";
import type { CliOptions } from "./types";
import { DEFAULT_OPTIONS } from "./types";

export const USAGE = `
bigrams - Count adjacent word pairs in text

Usage:
  bigrams [options] [file...]

Reads standard input when no files are given. Files are processed
concurrently into one table.

Options:
  --sort        Order entries by count (descending), then by words
  --metrics     Write Prometheus metrics to stderr after the run
  --help        Show this help

Output:
  One line per bigram: "first second": count

Exit codes:
  0  success
  1  a file could not be opened, or bad arguments
  2  a stream failed while being read or processed

Environment Variables:
  BIGRAM_SEGMENT_SIZE             Bytes requested per read (default: 4096)
  BIGRAM_PAUSE_WRITER_THRESHOLD   Unparsed bytes before reading pauses (default: 65536)
  BIGRAM_RESUME_WRITER_THRESHOLD  Unparsed bytes before reading resumes (default: 32768)
  BIGRAM_STREAM_TIMEOUT_MS        Per-stream timeout, 0 for none (default: 0)
  BIGRAM_MONITOR                  Collect per-stream counters (default: false)
  LOG_LEVEL                       pino log level
`;

/**
 * Parses command-line arguments. Throws a TypeError on unknown options.
 */
export function parseCliArgs(args: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args,
    options: {
      sort: { type: "boolean" },
      metrics: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
    strict: true,
  });

  return {
    files: positionals,
    sort: values.sort ?? DEFAULT_OPTIONS.sort,
    metrics: values.metrics ?? DEFAULT_OPTIONS.metrics,
    help: values.help ?? DEFAULT_OPTIONS.help,
  };
}
