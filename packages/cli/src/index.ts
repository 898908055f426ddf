#!/usr/bin/env tsx

import { formatErrorChain } from "./format";
import { runCli } from "./processor";
import { ExitCode } from "./types";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`Error processing text:\n${formatErrorChain(error)}`);
    process.exitCode = ExitCode.ProcessingError;
  },
);
