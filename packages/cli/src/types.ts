import type { Readable, Writable } from "node:stream";

export interface CliOptions {
  files: string[];
  sort: boolean;
  metrics: boolean;
  help: boolean;
}

export const DEFAULT_OPTIONS: CliOptions = {
  files: [],
  sort: false,
  metrics: false,
  help: false,
};

export const ExitCode = {
  Success: 0,
  InputError: 1,
  ProcessingError: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliIO {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
}
