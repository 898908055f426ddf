export type CounterType =
  | "bytesScanned"
  | "reads"
  | "tokensEmitted"
  | "bigramsEmitted";

export interface ITokenizerStats {
  durationMS: number;
  bytesScanned: number;
  reads: number;
  tokensEmitted: number;
  bigramsEmitted: number;
  rateMBs: number;
}

export interface ITokenizerMonitorConfig {
  mode?: "disabled" | "enabled";
}

export interface ITokenizerMonitor {
  readonly config: ITokenizerMonitorConfig;

  /**
   * Start tracking time. Skips if a timer is already running
   */
  start(): void;

  increment(counter: CounterType, amount?: number): void;

  getCounters(): Record<CounterType, number>;

  /**
   * Current stats, or null before `start` or while disabled
   */
  readonly stats: ITokenizerStats | null;
}
