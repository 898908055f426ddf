import type { IAccumulator } from "../accumulator";
import type { StreamFailure } from "../errors";
import type { IBufferPipelineConfig } from "../pipeline";
import type { ByteSource } from "../source";
import type { ITokenizerStats } from "../tokenizer";

export type Metadata = Record<string, string | number>;

export interface StreamConfig {
  pipeline?: IBufferPipelineConfig;
  /** Collect per-stream tokenizer counters */
  monitor?: boolean;
  /** Fail a stream that has not finished after this many milliseconds; 0 disables */
  streamTimeoutMS?: number;
}

export interface OrchestratorConfig extends StreamConfig {
  meta?: Metadata;
  /** Private accumulator for one worker; a fresh `BigramAccumulator` when omitted */
  createAccumulator?: (source: ByteSource, index: number) => IAccumulator;
}

export interface StreamResult {
  index: number;
  name: string;
  bytesRead: number;
  reads: number;
  stoppedEarly: boolean;
  durationMS: number;
  tokenizer: ITokenizerStats | null;
}

export interface BigramRunResult {
  runId: string;
  /** Counts from every stream that succeeded */
  histogram: IAccumulator;
  /** One entry per failed stream, in input order */
  failures: StreamFailure[];
  /** One entry per successful stream, in input order */
  streams: StreamResult[];
  durationMS: number;
}

export interface IStreamOrchestrator {
  run(
    sources: readonly ByteSource[],
    accumulator?: IAccumulator,
  ): Promise<BigramRunResult>;
  readonly config: OrchestratorConfig;
}
