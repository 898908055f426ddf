export interface FlushResult {
  /** The reader completed; the writer should stop producing. */
  isCompleted: boolean;
}

export interface ReadResult {
  /**
   * All published bytes not yet consumed, including bytes retained from
   * earlier reads. Valid until the next `advanceTo`.
   */
  buffer: Uint8Array;
  /** The writer completed; `buffer` holds everything that is left. */
  isCompleted: boolean;
}

/**
 * Producer side of a pipeline
 */
export interface IPipeWriter {
  /**
   * Returns a writable region of at least `sizeHint` bytes placed after the
   * bytes already written.
   */
  getMemory(sizeHint?: number): Uint8Array;

  /**
   * Marks `count` bytes of the last region returned by `getMemory` as written.
   */
  advance(count: number): void;

  /**
   * Publishes written bytes to the reader. Suspends while the reader is
   * too far behind.
   */
  flush(): Promise<FlushResult>;

  /**
   * No more bytes will be written. An error fails the reader's next read.
   */
  complete(error?: Error): void;

  readonly isCompleted: boolean;
}

/**
 * Consumer side of a pipeline
 */
export interface IPipeReader {
  /**
   * Suspends until there are bytes the reader has not examined yet, or the
   * writer completed.
   */
  read(): Promise<ReadResult>;

  /**
   * Releases the first `consumed` bytes of the last read buffer. The rest are
   * retained and returned again by the next read.
   */
  advanceTo(consumed: number): void;

  /**
   * The reader needs no more data; pending and future flushes report
   * completion.
   */
  complete(): void;

  readonly isCompleted: boolean;
}

export interface IBufferPipelineConfig {
  /** Default size of a region handed to the writer */
  segmentSize?: number;
  /** Unexamined bytes at which `flush` starts suspending */
  pauseWriterThreshold?: number;
  /** Unexamined bytes below which a suspended `flush` resumes */
  resumeWriterThreshold?: number;
}

export interface IBufferPipeline {
  readonly writer: IPipeWriter;
  readonly reader: IPipeReader;
  readonly config: Required<IBufferPipelineConfig>;
}
