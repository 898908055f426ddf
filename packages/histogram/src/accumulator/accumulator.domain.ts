export type Token = string;

export interface BigramEntry {
  first: Token;
  second: Token;
  count: number;
}

/**
 * A counting map of ordered word pairs.
 */
export interface IAccumulator {
  /**
   * Adds `amount` to the count of `(first, second)`, inserting it if absent.
   */
  increment(first: Token, second: Token, amount?: number): void;

  /**
   * Adds every entry of `other` into this accumulator.
   */
  merge(other: IAccumulator): void;

  /**
   * Count of `(first, second)`, or 0 when it was never seen.
   */
  get(first: Token, second: Token): number;

  entries(): Generator<BigramEntry, void, unknown>;

  /**
   * Serialized key (`first\tsecond`) to count.
   */
  toMap(): Map<string, number>;

  clear(): void;

  /** Number of distinct bigrams */
  readonly size: number;

  /** Sum of all counts */
  readonly total: number;
}
