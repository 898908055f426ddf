import type {
  CounterType,
  ITokenizerMonitor,
  ITokenizerMonitorConfig,
  ITokenizerStats,
} from "./monitor.domain";

const emptyCounters = (): Record<CounterType, number> => ({
  bytesScanned: 0,
  reads: 0,
  tokensEmitted: 0,
  bigramsEmitted: 0,
});

/**
 * Per-stream counters for one tokenizer
 */
export class TokenizerMonitor implements ITokenizerMonitor {
  readonly config: ITokenizerMonitorConfig;
  private _enabled: boolean;
  private _timeStart: number | null = null;
  private _counters = emptyCounters();

  constructor({ mode = "enabled" }: ITokenizerMonitorConfig = {}) {
    this.config = { mode };
    this._enabled = mode === "enabled";
  }

  start(): void {
    if (!this._enabled || this._timeStart !== null) return;
    this._timeStart = performance.now();
  }

  increment(counter: CounterType, amount = 1): void {
    if (!this._enabled) return;
    this._counters[counter] += amount;
  }

  getCounters(): Record<CounterType, number> {
    return { ...this._counters };
  }

  get stats(): ITokenizerStats | null {
    if (this._timeStart === null) return null;
    const durationMS = performance.now() - this._timeStart;
    const counters = this.getCounters();

    return {
      durationMS,
      ...counters,
      rateMBs:
        durationMS > 0
          ? (counters.bytesScanned * 0.000001) / (durationMS / 1000)
          : 0,
    };
  }
}

export class NoOpTokenizerMonitor implements ITokenizerMonitor {
  readonly config: ITokenizerMonitorConfig = { mode: "disabled" };

  start(): void {
    // No-op
  }

  increment(_counter: CounterType, _amount = 1): void {
    // No-op
  }

  getCounters(): Record<CounterType, number> {
    return emptyCounters();
  }

  get stats(): ITokenizerStats | null {
    return null;
  }
}
