import { BigramAccumulator, type IAccumulator, type Token } from "../accumulator";
import type { IPipeReader } from "../pipeline";
import { isAsciiLetter, isInWordPunctuation } from "./ascii";
import type { ITokenizer, ITokenizerConfig, TokenizerPhase } from "./tokenizer.domain";
import type { ITokenizerMonitor, ITokenizerStats } from "./monitor.domain";
import { NoOpTokenizerMonitor, TokenizerMonitor } from "./monitor";

// Tokens hold only ASCII letters, '-' and '\'', so any single-byte decoding
// followed by toLowerCase is an ASCII case fold.
const decoder = new TextDecoder("latin1");

/**
 * Byte-level word tokenizer for one stream. Counts each pair of consecutive
 * tokens into the accumulator.
 *
 * Transitions, per byte:
 *
 *   outside-word         letter -> in-word; anything else is skipped
 *   in-word              letter -> in-word; '-' or '\'' -> pending-punctuation;
 *                        other -> emit, outside-word
 *   pending-punctuation  letter -> in-word (punctuation was internal);
 *                        other -> emit without the pending byte, outside-word
 */
export class Tokenizer implements ITokenizer {
  private _accumulator: IAccumulator;
  private _monitor: ITokenizerMonitor;

  private _previousWord: Token | null = null;
  private _inWord = false;
  private _pendingPunctuation = false;
  // Bytes at the head of the next buffer that were already scanned
  private _examined = 0;

  constructor({ accumulator, monitor }: ITokenizerConfig = {}) {
    this._accumulator = accumulator ?? new BigramAccumulator();

    if (!monitor || ("mode" in monitor && monitor.mode === "disabled")) {
      this._monitor = new NoOpTokenizerMonitor();
    } else if ("increment" in monitor) {
      this._monitor = monitor;
    } else {
      this._monitor = new TokenizerMonitor(monitor);
    }
  }

  process(buffer: Uint8Array, isCompleted: boolean): number {
    if (buffer.length < this._examined) {
      throw new RangeError(
        `Buffer of ${buffer.length} bytes is shorter than the ${this._examined} retained bytes`,
      );
    }
    this._monitor.increment("bytesScanned", buffer.length - this._examined);

    let consumed = 0;
    for (let i = this._examined; i < buffer.length; i++) {
      const byte = buffer[i];

      if (isAsciiLetter(byte)) {
        this._inWord = true;
        this._pendingPunctuation = false;
      } else if (
        this._inWord &&
        !this._pendingPunctuation &&
        isInWordPunctuation(byte)
      ) {
        this._pendingPunctuation = true;
      } else {
        if (this._inWord) {
          this.emit(buffer.subarray(consumed, i));
        }
        consumed = i + 1;
      }
    }

    if (isCompleted) {
      if (this._inWord) {
        this.emit(buffer.subarray(consumed));
      }
      this._examined = 0;
      return buffer.length;
    }

    this._examined = buffer.length - consumed;
    return consumed;
  }

  async consume(reader: IPipeReader): Promise<void> {
    this._monitor.start();
    try {
      while (true) {
        const { buffer, isCompleted } = await reader.read();
        this._monitor.increment("reads");

        reader.advanceTo(this.process(buffer, isCompleted));
        if (isCompleted) return;
      }
    } finally {
      reader.complete();
    }
  }

  /**
   * Closes the current token. `bytes` runs from the token's first letter up
   * to the break, including a pending punctuation byte if there is one.
   */
  private emit(bytes: Uint8Array): void {
    const tokenBytes = this._pendingPunctuation
      ? bytes.subarray(0, bytes.length - 1)
      : bytes;
    this._inWord = false;
    this._pendingPunctuation = false;

    const token = decoder.decode(tokenBytes).toLowerCase();
    this._monitor.increment("tokensEmitted");

    if (this._previousWord !== null) {
      this._accumulator.increment(this._previousWord, token);
      this._monitor.increment("bigramsEmitted");
    }
    this._previousWord = token;
  }

  get accumulator(): IAccumulator {
    return this._accumulator;
  }

  get previousWord(): Token | null {
    return this._previousWord;
  }

  get phase(): TokenizerPhase {
    if (!this._inWord) return "outside-word";
    return this._pendingPunctuation ? "pending-punctuation" : "in-word";
  }

  get stats(): ITokenizerStats | null {
    return this._monitor.stats;
  }
}
