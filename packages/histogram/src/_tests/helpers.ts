import type { IAccumulator } from "../accumulator";
import type { ByteSource } from "../source";

/**
 * Histogram as a plain object keyed by "first second".
 */
export function counts(accumulator: IAccumulator): Record<string, number> {
  const out: Record<string, number> = {};
  for (const { first, second, count } of accumulator.entries()) {
    out[`${first} ${second}`] = count;
  }
  return out;
}

export function bytes(text: string): Uint8Array {
  return Buffer.from(text, "latin1");
}

export function text(buffer: Uint8Array): string {
  return Buffer.from(buffer).toString("latin1");
}

/**
 * Serves `prefix` and then fails every later read.
 */
export function failingSource(
  name: string,
  prefix: string,
  error = new Error("device unplugged"),
): ByteSource {
  let served = false;
  return {
    name,
    async read(target) {
      if (served || prefix.length === 0) throw error;
      served = true;
      target.set(bytes(prefix).subarray(0, target.length));
      return Math.min(prefix.length, target.length);
    },
  };
}

/**
 * A source whose reads never settle.
 */
export function stalledSource(name: string): ByteSource {
  return {
    name,
    read: () => new Promise<number>(() => {}),
  };
}

export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
