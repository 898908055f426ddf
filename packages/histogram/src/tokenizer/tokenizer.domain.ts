import type { IAccumulator, Token } from "../accumulator";
import type { IPipeReader } from "../pipeline";
import type {
  ITokenizerMonitor,
  ITokenizerMonitorConfig,
  ITokenizerStats,
} from "./monitor.domain";

export interface ITokenizerConfig {
  /** Where bigrams are counted; a private accumulator when omitted */
  accumulator?: IAccumulator;
  /** A monitor instance, a config for a new one, or `false` for none */
  monitor?: ITokenizerMonitor | ITokenizerMonitorConfig | false;
}

export type TokenizerPhase = "outside-word" | "in-word" | "pending-punctuation";

export interface ITokenizer {
  /**
   * Scans the bytes of `buffer` not examined by an earlier call, counting every
   * completed bigram. Returns the number of leading bytes that are fully
   * processed; the rest (a token still accumulating) must be passed again at
   * the head of the next buffer. With `isCompleted` the trailing token is
   * emitted and the whole buffer is consumed.
   */
  process(buffer: Uint8Array, isCompleted: boolean): number;

  /**
   * Reads the pipeline until the writer completes, then completes the reader.
   */
  consume(reader: IPipeReader): Promise<void>;

  readonly accumulator: IAccumulator;
  readonly previousWord: Token | null;
  readonly phase: TokenizerPhase;
  readonly stats: ITokenizerStats | null;
}
