import { logger, recordBytesRead } from "@bigram/shared";
import { SourceReadFailure, toError } from "../errors";
import type { IPipeWriter } from "../pipeline";
import type { ByteSource, PumpOptions, PumpResult } from "./source.domain";

/**
 * Reads `source` into the pipeline until it is exhausted or the reader stops
 * asking for data, then completes the writer. A read failure completes the
 * writer with a `SourceReadFailure` and rejects with it. An abort cancels the
 * source and rejects with the signal's reason.
 */
export async function pumpSource(
  source: ByteSource,
  writer: IPipeWriter,
  { sizeHint, signal }: PumpOptions = {},
): Promise<PumpResult> {
  let bytesRead = 0;
  let reads = 0;
  let stoppedEarly = false;

  try {
    while (true) {
      const memory = writer.getMemory(sizeHint);
      const count = await readWithSignal(source, memory, signal);
      reads++;

      if (!Number.isInteger(count) || count < 0 || count > memory.length) {
        throw new RangeError(
          `Source returned ${count} bytes for a ${memory.length} byte read`,
        );
      }
      if (count === 0) break;

      writer.advance(count);
      bytesRead += count;
      recordBytesRead(count);

      const { isCompleted } = await writer.flush();
      if (isCompleted) {
        stoppedEarly = true;
        break;
      }
    }
  } catch (error) {
    const aborted = signal?.aborted === true && error === signal.reason;
    if (aborted) source.cancel?.();

    const failure = aborted
      ? toError(error)
      : new SourceReadFailure(source.name, { cause: error });

    logger.source.debug("Source failed", { source: source.name, bytesRead }, failure);
    writer.complete(failure);
    throw failure;
  }

  writer.complete();
  return { bytesRead, reads, stoppedEarly };
}

function readWithSignal(
  source: ByteSource,
  memory: Uint8Array,
  signal?: AbortSignal,
): Promise<number> {
  if (!signal) return source.read(memory);
  if (signal.aborted) return Promise.reject(signal.reason);

  const reading = source.read(memory);
  return new Promise<number>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });

    reading.then(
      (count) => {
        signal.removeEventListener("abort", onAbort);
        resolve(count);
      },
      (error) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
