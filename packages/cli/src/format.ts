import type { BigramEntry } from "@bigram/histogram";

export function formatEntry({ first, second, count }: BigramEntry): string {
  return `"${first} ${second}": ${count}`;
}

/**
 * Count descending, then first word, then second word.
 */
export function compareEntries(a: BigramEntry, b: BigramEntry): number {
  if (b.count !== a.count) return b.count - a.count;
  if (a.first !== b.first) return a.first < b.first ? -1 : 1;
  if (a.second !== b.second) return a.second < b.second ? -1 : 1;
  return 0;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Renders an error and everything behind it: the members of an
 * `AggregateError`, otherwise the `cause` chain. Each error is preceded by a
 * blank line.
 */
export function formatErrorChain(error: unknown): string {
  if (error === undefined || error === null) return "";

  let text = `\n${describeError(error)}\n`;
  if (error instanceof AggregateError) {
    for (const inner of error.errors) {
      text += formatErrorChain(inner);
    }
  } else if (error instanceof Error) {
    text += formatErrorChain(error.cause);
  }
  return text;
}
