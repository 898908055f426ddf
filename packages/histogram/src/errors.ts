/**
 * I/O failure while a byte source was being read.
 */
export class SourceReadFailure extends Error {
  override readonly name = "SourceReadFailure";

  constructor(
    readonly sourceName: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to read from source "${sourceName}"`, options);
  }
}

/**
 * The writer side of a pipeline completed with an error; seen by the reader.
 */
export class PipelineFailure extends Error {
  override readonly name = "PipelineFailure";

  constructor(options?: ErrorOptions) {
    super("Pipeline writer completed with an error", options);
  }
}

export class StreamTimeoutError extends Error {
  override readonly name = "StreamTimeoutError";

  constructor(
    readonly sourceName: string,
    readonly timeoutMS: number,
  ) {
    super(`Source "${sourceName}" did not finish within ${timeoutMS}ms`);
  }
}

/**
 * One stream's failure, as reported by the orchestrator.
 */
export class StreamFailure extends Error {
  override readonly name = "StreamFailure";

  constructor(
    /** Position of the stream in the input list */
    readonly index: number,
    readonly sourceName: string,
    options: { cause: unknown },
  ) {
    super(`Stream ${index} ("${sourceName}") failed`, options);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
