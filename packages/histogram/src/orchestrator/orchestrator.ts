import { randomUUID } from "node:crypto";
import { createStructuredLogger, environment, recordStream } from "@bigram/shared";
import { BigramAccumulator, type IAccumulator } from "../accumulator";
import { StreamFailure, StreamTimeoutError } from "../errors";
import { BufferPipeline } from "../pipeline";
import { pumpSource, type ByteSource } from "../source";
import { Tokenizer } from "../tokenizer";
import type {
  BigramRunResult,
  IStreamOrchestrator,
  OrchestratorConfig,
  StreamConfig,
  StreamResult,
} from "./orchestrator.domain";

const log = createStructuredLogger("orchestrator");

/**
 * Runs one source through its own pipeline and tokenizer, counting into
 * `accumulator`. Resolves once both the reading and the parsing half are
 * done; rejects with the source's failure if there was one, else with the
 * tokenizer's.
 */
export async function processStream(
  accumulator: IAccumulator,
  source: ByteSource,
  { pipeline, monitor = false, streamTimeoutMS = 0 }: StreamConfig = {},
): Promise<Omit<StreamResult, "index">> {
  const startMS = performance.now();
  const pipe = new BufferPipeline(pipeline);
  const tokenizer = new Tokenizer({
    accumulator,
    monitor: monitor ? { mode: "enabled" } : false,
  });

  const controller = streamTimeoutMS > 0 ? new AbortController() : null;
  const timer = controller
    ? setTimeout(
        () => controller.abort(new StreamTimeoutError(source.name, streamTimeoutMS)),
        streamTimeoutMS,
      )
    : null;

  try {
    const [pumped, consumed] = await Promise.allSettled([
      pumpSource(source, pipe.writer, {
        sizeHint: pipe.config.segmentSize,
        signal: controller?.signal,
      }),
      tokenizer.consume(pipe.reader),
    ]);

    if (pumped.status === "rejected") throw pumped.reason;
    if (consumed.status === "rejected") throw consumed.reason;

    return {
      name: source.name,
      ...pumped.value,
      durationMS: performance.now() - startMS,
      tokenizer: tokenizer.stats,
    };
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Fans out over a set of sources, one concurrent worker each, and gathers the
 * counts of every worker that succeeds into one histogram. Workers count into
 * private accumulators that are merged once they finish, so a failed stream
 * leaves no partial counts behind.
 */
export class StreamOrchestrator implements IStreamOrchestrator {
  private _config: OrchestratorConfig;

  constructor(config: OrchestratorConfig = {}) {
    this._config = config;
  }

  async run(
    sources: readonly ByteSource[],
    accumulator: IAccumulator = new BigramAccumulator(),
  ): Promise<BigramRunResult> {
    if (sources.length === 0) {
      throw new RangeError("At least one source is required");
    }

    const runId = randomUUID();
    const startMS = performance.now();
    log.info("Run started", {
      runId,
      streams: sources.length,
      ...this._config.meta,
    });

    const settled = await Promise.allSettled(
      sources.map((source, index) => this.runWorker(source, index)),
    );

    const failures: StreamFailure[] = [];
    const streams: StreamResult[] = [];

    settled.forEach((outcome, index) => {
      if (outcome.status === "fulfilled") {
        accumulator.merge(outcome.value.counts);
        streams.push(outcome.value.result);
        return;
      }

      const failure = new StreamFailure(index, sources[index].name, {
        cause: outcome.reason,
      });
      log.error(failure.message, failure, { runId });
      failures.push(failure);
    });

    const result: BigramRunResult = {
      runId,
      histogram: accumulator,
      failures,
      streams,
      durationMS: performance.now() - startMS,
    };

    log.info("Run complete", {
      runId,
      streams: sources.length,
      failed: failures.length,
      bigrams: accumulator.size,
      durationMS: Number(result.durationMS.toFixed(2)),
    });
    return result;
  }

  private async runWorker(
    source: ByteSource,
    index: number,
  ): Promise<{ counts: IAccumulator; result: StreamResult }> {
    const { createAccumulator } = this._config;
    const counts = createAccumulator
      ? createAccumulator(source, index)
      : new BigramAccumulator();
    const startMS = performance.now();

    try {
      const stream = await processStream(counts, source, this._config);
      recordStream("succeeded", stream.durationMS);
      log.debug("Stream complete", {
        index,
        source: source.name,
        bytesRead: stream.bytesRead,
        bigrams: counts.total,
      });
      return { counts, result: { index, ...stream } };
    } catch (error) {
      recordStream("failed", performance.now() - startMS);
      throw error;
    }
  }

  get config(): OrchestratorConfig {
    return this._config;
  }
}

/**
 * Stream settings taken from the environment.
 */
export function configFromEnvironment(): OrchestratorConfig {
  const env = environment();
  return {
    pipeline: {
      segmentSize: env.BIGRAM_SEGMENT_SIZE,
      pauseWriterThreshold: env.BIGRAM_PAUSE_WRITER_THRESHOLD,
      resumeWriterThreshold: env.BIGRAM_RESUME_WRITER_THRESHOLD,
    },
    monitor: env.BIGRAM_MONITOR,
    streamTimeoutMS: env.BIGRAM_STREAM_TIMEOUT_MS,
  };
}

/**
 * Counts the bigrams of every source concurrently into one histogram.
 */
export function countBigrams(
  sources: readonly ByteSource[],
  config: OrchestratorConfig = configFromEnvironment(),
  accumulator?: IAccumulator,
): Promise<BigramRunResult> {
  return new StreamOrchestrator(config).run(sources, accumulator);
}

/**
 * Throws an `AggregateError` of every stream failure, if there were any.
 */
export function assertNoFailures(result: BigramRunResult): void {
  if (result.failures.length === 0) return;
  throw new AggregateError(
    result.failures,
    `${result.failures.length} of ${result.failures.length + result.streams.length} streams failed`,
  );
}
