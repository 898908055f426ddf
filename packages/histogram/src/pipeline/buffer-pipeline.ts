import { logger } from "@bigram/shared";
import { PipelineFailure } from "../errors";
import type {
  FlushResult,
  IBufferPipeline,
  IBufferPipelineConfig,
  IPipeReader,
  IPipeWriter,
  ReadResult,
} from "./buffer-pipeline.domain";

export const DEFAULT_PIPELINE_CONFIG: Required<IBufferPipelineConfig> = {
  segmentSize: 4096,
  pauseWriterThreshold: 65536,
  resumeWriterThreshold: 32768,
};

interface ReadWaiter {
  resolve: (result: ReadResult) => void;
  reject: (error: Error) => void;
}

/**
 * Single-producer, single-consumer byte pipe over one contiguous, growable
 * store. Layout of `_buffer`:
 *
 *   [consumed | retained + examined | published, unexamined | written, unpublished | free]
 *             ^_readStart           ^_examined               ^_published           ^_written
 *
 * Backpressure counts only unexamined bytes, so a token longer than the
 * pause threshold still makes progress.
 */
export class BufferPipeline implements IBufferPipeline {
  readonly writer: IPipeWriter;
  readonly reader: IPipeReader;
  readonly config: Required<IBufferPipelineConfig>;

  private _buffer: Uint8Array;
  private _readStart = 0;
  private _examined = 0;
  private _published = 0;
  private _written = 0;
  private _memoryAvailable = 0;
  private _lastReadLength = 0;
  private _readerHolding = false;

  private _writerCompleted = false;
  private _writerError: Error | undefined;
  private _readerCompleted = false;

  private _readWaiter: ReadWaiter | null = null;
  private _flushWaiter: ((result: FlushResult) => void) | null = null;

  constructor(config: IBufferPipelineConfig = {}) {
    const {
      segmentSize = DEFAULT_PIPELINE_CONFIG.segmentSize,
      pauseWriterThreshold = DEFAULT_PIPELINE_CONFIG.pauseWriterThreshold,
      resumeWriterThreshold = Math.min(
        DEFAULT_PIPELINE_CONFIG.resumeWriterThreshold,
        pauseWriterThreshold,
      ),
    } = config;

    for (const [name, value] of Object.entries({
      segmentSize,
      pauseWriterThreshold,
      resumeWriterThreshold,
    })) {
      if (!Number.isInteger(value) || value < 1) {
        throw new RangeError(`${name} must be a positive integer, got ${value}`);
      }
    }
    if (resumeWriterThreshold > pauseWriterThreshold) {
      throw new RangeError(
        `resumeWriterThreshold (${resumeWriterThreshold}) must not exceed pauseWriterThreshold (${pauseWriterThreshold})`,
      );
    }

    this.config = { segmentSize, pauseWriterThreshold, resumeWriterThreshold };
    this._buffer = new Uint8Array(segmentSize);

    const pipeline = this;
    this.writer = {
      getMemory: (sizeHint) => this.getMemory(sizeHint),
      advance: (count) => this.advance(count),
      flush: () => this.flush(),
      complete: (error) => this.completeWriter(error),
      get isCompleted() {
        return pipeline._writerCompleted;
      },
    };
    this.reader = {
      read: () => this.read(),
      advanceTo: (consumed) => this.advanceTo(consumed),
      complete: () => this.completeReader(),
      get isCompleted() {
        return pipeline._readerCompleted;
      },
    };
  }

  // --- writer -------------------------------------------------------------

  private getMemory(sizeHint = this.config.segmentSize): Uint8Array {
    if (this._writerCompleted) {
      throw new Error("Cannot write to a completed pipeline writer");
    }
    const size = Math.max(1, Math.floor(sizeHint));
    this.ensureCapacity(size);
    this._memoryAvailable = size;
    return this._buffer.subarray(this._written, this._written + size);
  }

  private advance(count: number): void {
    if (!Number.isInteger(count) || count < 0 || count > this._memoryAvailable) {
      throw new RangeError(
        `Cannot advance by ${count}; ${this._memoryAvailable} bytes of memory were requested`,
      );
    }
    this._written += count;
    this._memoryAvailable -= count;
  }

  private async flush(): Promise<FlushResult> {
    if (this._readerCompleted) return { isCompleted: true };

    this._published = this._written;
    this._memoryAvailable = 0;
    this.wakeReader();

    if (this.unexamined < this.config.pauseWriterThreshold) {
      return { isCompleted: false };
    }

    logger.pipeline.debug("Writer paused", { unexamined: this.unexamined });
    return new Promise<FlushResult>((resolve) => {
      this._flushWaiter = resolve;
    });
  }

  private completeWriter(error?: Error): void {
    if (this._writerCompleted) return;
    this._writerCompleted = true;
    this._writerError = error;
    this._published = this._written;
    this._memoryAvailable = 0;
    this.wakeReader();
  }

  // --- reader -------------------------------------------------------------

  private read(): Promise<ReadResult> {
    if (this._readerCompleted) {
      return Promise.reject(new Error("Cannot read from a completed pipeline reader"));
    }
    if (this._readWaiter) {
      return Promise.reject(new Error("A read is already pending"));
    }
    if (this.readable) {
      try {
        return Promise.resolve(this.takeReadResult());
      } catch (error) {
        return Promise.reject(error);
      }
    }

    return new Promise<ReadResult>((resolve, reject) => {
      this._readWaiter = { resolve, reject };
    });
  }

  private advanceTo(consumed: number): void {
    if (!this._readerHolding) {
      throw new Error("advanceTo called without a preceding read");
    }
    if (!Number.isInteger(consumed) || consumed < 0 || consumed > this._lastReadLength) {
      throw new RangeError(
        `Cannot consume ${consumed} bytes of a ${this._lastReadLength} byte buffer`,
      );
    }

    this._examined = this._readStart + this._lastReadLength;
    this._readStart += consumed;
    this._readerHolding = false;

    // Rewind an empty store, unless the writer still fills a region of it
    if (this._readStart === this._written && this._memoryAvailable === 0) {
      this._readStart = this._examined = this._published = this._written = 0;
    }

    if (this._flushWaiter && this.unexamined < this.config.resumeWriterThreshold) {
      this.wakeWriter();
    }
  }

  private completeReader(): void {
    if (this._readerCompleted) return;
    this._readerCompleted = true;
    this._readerHolding = false;
    this.wakeWriter();
  }

  // --- internals ----------------------------------------------------------

  private get unexamined(): number {
    return this._published - this._examined;
  }

  private get readable(): boolean {
    return this._writerCompleted || this._published > this._examined;
  }

  private takeReadResult(): ReadResult {
    if (this._writerError) {
      throw new PipelineFailure({ cause: this._writerError });
    }
    this._readerHolding = true;
    this._lastReadLength = this._published - this._readStart;
    return {
      buffer: this._buffer.subarray(this._readStart, this._published),
      isCompleted: this._writerCompleted,
    };
  }

  private wakeReader(): void {
    const waiter = this._readWaiter;
    if (!waiter || !this.readable) return;

    this._readWaiter = null;
    try {
      waiter.resolve(this.takeReadResult());
    } catch (error) {
      waiter.reject(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private wakeWriter(): void {
    const waiter = this._flushWaiter;
    if (!waiter) return;

    this._flushWaiter = null;
    waiter({ isCompleted: this._readerCompleted });
  }

  /**
   * Makes room for `size` bytes after `_written`. Compacts in place unless the
   * reader still holds a view into the store, in which case a new store is
   * allocated and the old view stays intact.
   */
  private ensureCapacity(size: number): void {
    if (this._buffer.length - this._written >= size) return;

    const live = this._written - this._readStart;
    const canCompact =
      !this._readerHolding &&
      this._readStart > 0 &&
      this._buffer.length - live >= size;

    if (canCompact) {
      this._buffer.copyWithin(0, this._readStart, this._written);
    } else {
      const next = new Uint8Array(
        Math.max(live + size, this._buffer.length * 2),
      );
      next.set(this._buffer.subarray(this._readStart, this._written));
      this._buffer = next;
    }

    const shift = this._readStart;
    this._readStart = 0;
    this._examined -= shift;
    this._published -= shift;
    this._written -= shift;
  }
}
