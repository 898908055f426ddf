import type { FileHandle } from "node:fs/promises";
import type { Readable } from "node:stream";
import type { ByteSource } from "./source.domain";

const EMPTY = new Uint8Array(0);
const encoder = new TextEncoder();

// UTF-8 keeps every non-ASCII character in high-bit bytes
function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  if (typeof chunk === "string") return encoder.encode(chunk);
  throw new TypeError(`Expected a byte chunk, got ${typeof chunk}`);
}

/**
 * Copies as much of `chunk` as fits into `target`; returns the remainder.
 */
function copyInto(target: Uint8Array, chunk: Uint8Array): [number, Uint8Array] {
  const count = Math.min(target.length, chunk.length);
  target.set(chunk.subarray(0, count));
  return [count, chunk.subarray(count)];
}

export class ByteSources {
  /**
   * One read at the handle's current position per call.
   */
  static fromFileHandle(handle: FileHandle, name = "file"): ByteSource {
    return {
      name,
      async read(target) {
        const { bytesRead } = await handle.read(target, 0, target.length, null);
        return bytesRead;
      },
    };
  }

  /**
   * Adapts a Node readable (stdin, a file stream, a socket). Stopping early
   * leaves the stream open for its owner; `cancel` destroys it, which ends a
   * read still waiting on it.
   */
  static fromReadable(stream: Readable, name = "stream"): ByteSource {
    const chunks = stream.iterator({ destroyOnReturn: false });
    let pending: Uint8Array = EMPTY;

    return {
      name,
      async read(target) {
        while (pending.length === 0) {
          const next = await chunks.next();
          if (next.done) return 0;
          pending = toBytes(next.value);
        }

        const [count, rest] = copyInto(target, pending);
        pending = rest;
        return count;
      },
      cancel() {
        pending = EMPTY;
        stream.destroy();
      },
    };
  }

  /**
   * Serves `chunks` in order, at most one chunk per read. Strings are
   * encoded as UTF-8.
   */
  static fromChunks(
    chunks: Iterable<Uint8Array | string>,
    name = "chunks",
  ): ByteSource {
    const iterator = chunks[Symbol.iterator]();
    let pending: Uint8Array = EMPTY;

    return {
      name,
      async read(target) {
        while (pending.length === 0) {
          const next = iterator.next();
          if (next.done) return 0;
          pending = toBytes(next.value);
        }

        const [count, rest] = copyInto(target, pending);
        pending = rest;
        return count;
      },
    };
  }

  static fromString(text: string, name = "string"): ByteSource {
    return ByteSources.fromChunks([text], name);
  }
}
