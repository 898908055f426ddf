import type { BigramEntry, IAccumulator, Token } from "./accumulator.domain";

const SEPARATOR = "\t";

export function toBigramKey(first: Token, second: Token): string {
  return `${first}${SEPARATOR}${second}`;
}

export function fromBigramKey(key: string): [Token, Token] {
  const at = key.indexOf(SEPARATOR);
  if (at < 0) throw new Error(`Not a bigram key: "${key}"`);
  return [key.slice(0, at), key.slice(at + 1)];
}

/**
 * Histogram of bigrams. Every update is a synchronous read-modify-write, so
 * async workers interleaving on the event loop cannot lose or tear counts.
 */
export class BigramAccumulator implements IAccumulator {
  private _counts = new Map<string, number>();
  private _total = 0;

  increment(first: Token, second: Token, amount = 1): void {
    if (!Number.isInteger(amount) || amount < 1) {
      throw new RangeError(`Increment must be a positive integer, got ${amount}`);
    }
    const key = toBigramKey(first, second);
    this._counts.set(key, (this._counts.get(key) ?? 0) + amount);
    this._total += amount;
  }

  merge(other: IAccumulator): void {
    for (const { first, second, count } of other.entries()) {
      this.increment(first, second, count);
    }
  }

  get(first: Token, second: Token): number {
    return this._counts.get(toBigramKey(first, second)) ?? 0;
  }

  *entries(): Generator<BigramEntry, void, unknown> {
    for (const [key, count] of this._counts) {
      const [first, second] = fromBigramKey(key);
      yield { first, second, count };
    }
  }

  toMap(): Map<string, number> {
    return new Map(this._counts);
  }

  clear(): void {
    this._counts.clear();
    this._total = 0;
  }

  get size(): number {
    return this._counts.size;
  }

  get total(): number {
    return this._total;
  }
}
