/**
 * An already-open stream of bytes. The source's owner opens and closes it.
 */
export interface ByteSource {
  /** Used in logs and failure reports */
  readonly name: string;

  /**
   * Fills a prefix of `target` and returns how many bytes were written.
   * Returns 0 only at the end of the source.
   */
  read(target: Uint8Array): Promise<number>;

  /**
   * Releases a read that will never be awaited again, after a timeout.
   */
  cancel?(): void;
}

export interface PumpOptions {
  /** Size of the region requested from the pipeline per read */
  sizeHint?: number;
  /** Aborting fails the stream with the signal's reason */
  signal?: AbortSignal;
}

export interface PumpResult {
  bytesRead: number;
  reads: number;
  /** The reader completed before the source was exhausted */
  stoppedEarly: boolean;
}
