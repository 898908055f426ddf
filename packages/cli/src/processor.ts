import { once } from "node:events";
import type { Writable } from "node:stream";
import {
  ByteSources,
  configFromEnvironment,
  countBigrams,
  type BigramEntry,
  type ByteSource,
  type OrchestratorConfig,
} from "@bigram/histogram";
import { logger, renderMetrics } from "@bigram/shared";
import { parseCliArgs, USAGE } from "./args";
import { closeFiles, openFiles, OpenFileError, type OpenedFile } from "./file-utils";
import { compareEntries, formatEntry, formatErrorChain } from "./format";
import { ExitCode, type CliIO, type CliOptions } from "./types";

const OUTPUT_BATCH_LINES = 1000;

const defaultIO: CliIO = {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
};

async function write(stream: Writable, text: string): Promise<void> {
  if (!stream.write(text)) {
    await once(stream, "drain");
  }
}

/**
 * Runs the command and resolves with the process exit code. Argument,
 * configuration, input and processing failures are reported on stderr.
 */
export async function runCli(
  args: string[],
  io: CliIO = defaultIO,
): Promise<ExitCode> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    await write(io.stderr, `${error instanceof Error ? error.message : String(error)}\n${USAGE}`);
    return ExitCode.InputError;
  }

  if (options.help) {
    await write(io.stdout, USAGE);
    return ExitCode.Success;
  }

  // Before any file is opened
  let config: OrchestratorConfig;
  try {
    config = configFromEnvironment();
  } catch (error) {
    await write(io.stderr, `Invalid configuration:\n${formatErrorChain(error)}`);
    return ExitCode.InputError;
  }

  let files: OpenedFile[] = [];
  if (options.files.length > 0) {
    try {
      files = await openFiles(options.files);
    } catch (error) {
      const reported = error instanceof OpenFileError ? error.cause : error;
      const heading =
        error instanceof OpenFileError ? error.message : "Error opening files:";
      await write(io.stderr, `${heading}\n${formatErrorChain(reported)}`);
      return ExitCode.InputError;
    }
  }

  try {
    const sources: ByteSource[] =
      files.length > 0
        ? files.map(({ source }) => source)
        : [ByteSources.fromReadable(io.stdin, "stdin")];

    logger.cli.debug("Counting bigrams", { sources: sources.map((s) => s.name) });
    const result = await countBigrams(sources, config);

    if (result.failures.length > 0) {
      let report = "Error processing text:\n";
      for (const failure of result.failures) {
        report += formatErrorChain(failure);
      }
      await write(io.stderr, report);
      return ExitCode.ProcessingError;
    }

    const entries: Iterable<BigramEntry> = options.sort
      ? [...result.histogram.entries()].sort(compareEntries)
      : result.histogram.entries();
    let lines: string[] = [];
    for (const entry of entries) {
      lines.push(formatEntry(entry));
      if (lines.length === OUTPUT_BATCH_LINES) {
        await write(io.stdout, `${lines.join("\n")}\n`);
        lines = [];
      }
    }
    if (lines.length > 0) {
      await write(io.stdout, `${lines.join("\n")}\n`);
    }

    return ExitCode.Success;
  } finally {
    await closeFiles(files);
    if (options.metrics) {
      await write(io.stderr, await renderMetrics());
    }
  }
}
