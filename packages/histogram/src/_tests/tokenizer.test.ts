import { describe, expect, test } from "vitest";
import {
  Tokenizer,
  TokenizerMonitor,
  isAsciiLetter,
  isInWordPunctuation,
  type CounterType,
  type ITokenizerMonitor,
} from "../tokenizer";
import { bytes, counts } from "./helpers";

/**
 * Feeds `chunks` to a tokenizer the way the pipeline does: bytes left
 * unconsumed by one call are prepended to the next chunk.
 */
function tokenize(chunks: string[], tokenizer = new Tokenizer()) {
  if (chunks.length === 0) {
    tokenizer.process(new Uint8Array(0), true);
    return tokenizer;
  }

  let retained: Uint8Array = new Uint8Array(0);
  chunks.forEach((chunk, index) => {
    const buffer = new Uint8Array([...retained, ...bytes(chunk)]);
    const consumed = tokenizer.process(buffer, index === chunks.length - 1);
    retained = buffer.subarray(consumed);
  });
  return tokenizer;
}

function histogram(input: string) {
  return counts(tokenize([input]).accumulator);
}

const SAMPLE = "The quick brown fox and the quick blue hare.";
const SAMPLE_HISTOGRAM = {
  "the quick": 2,
  "quick brown": 1,
  "brown fox": 1,
  "fox and": 1,
  "and the": 1,
  "quick blue": 1,
  "blue hare": 1,
};

describe("ASCII classification", () => {
  test("letters are A-Z and a-z only", () => {
    expect(isAsciiLetter(0x41)).toBe(true);
    expect(isAsciiLetter(0x7a)).toBe(true);
    expect(isAsciiLetter(0x40)).toBe(false);
    expect(isAsciiLetter(0x5b)).toBe(false);
    expect(isAsciiLetter(0x30)).toBe(false);
    expect(isAsciiLetter(0xe9)).toBe(false);
  });

  test("hyphen and apostrophe are in-word punctuation", () => {
    expect(isInWordPunctuation(0x2d)).toBe(true);
    expect(isInWordPunctuation(0x27)).toBe(true);
    expect(isInWordPunctuation(0x2e)).toBe(false);
  });
});

describe("Tokenizer", () => {
  test("counts the bigrams of a sentence", () => {
    expect(histogram(SAMPLE)).toEqual(SAMPLE_HISTOGRAM);
  });

  test("empty input and a single token produce nothing", () => {
    expect(counts(tokenize([]).accumulator)).toEqual({});
    expect(histogram("")).toEqual({});
    expect(histogram("token")).toEqual({});
  });

  test("repeated tokens", () => {
    expect(histogram("token token token")).toEqual({ "token token": 2 });
  });

  test("folds ASCII case", () => {
    expect(histogram("TOKEN token")).toEqual({ "token token": 1 });
    expect(histogram("ToKeN tOkEn")).toEqual({ "token token": 1 });
  });

  test("collapses runs of separators", () => {
    expect(histogram("token   token")).toEqual(histogram("token token"));
    expect(histogram("token\t\r\n.,;!? token")).toEqual({ "token token": 1 });
  });

  test("leading and trailing breaks never produce empty tokens", () => {
    expect(histogram("   token token")).toEqual({ "token token": 1 });
    expect(histogram("token token   ")).toEqual({ "token token": 1 });
  });

  test("keeps punctuation between letters inside the token", () => {
    expect(histogram("token-a token-b")).toEqual({ "token-a token-b": 1 });
    expect(histogram("don't stop")).toEqual({ "don't stop": 1 });
    expect(histogram("rock'n'roll music")).toEqual({ "rock'n'roll music": 1 });
  });

  test("treats punctuation next to a non-letter as a break", () => {
    expect(histogram("-tokena- -tokenb-")).toEqual({ "tokena tokenb": 1 });
    expect(histogram("end- start")).toEqual({ "end start": 1 });
    expect(histogram("'quoted' words")).toEqual({ "quoted words": 1 });
  });

  test("a second punctuation byte ends the token", () => {
    expect(histogram("a--b c")).toEqual({ "a b": 1, "b c": 1 });
    expect(histogram("a-'b")).toEqual({ "a b": 1 });
  });

  test("digits and high-bit bytes are breaks", () => {
    expect(histogram("abc1def")).toEqual({ "abc def": 1 });
    expect(histogram("café ok")).toEqual({ "caf ok": 1 });
    expect(histogram("naïve")).toEqual({ "na ve": 1 });
  });

  test("N tokens produce N-1 bigrams", () => {
    const words = ["alpha", "beta", "gamma", "alpha", "beta", "delta", "alpha"];
    const tokenizer = tokenize([words.join(" ")]);

    expect(tokenizer.accumulator.total).toBe(words.length - 1);
    expect(tokenizer.previousWord).toBe("alpha");
  });

  describe("chunked input", () => {
    test("words split across chunks are reassembled", () => {
      const chunks = ["The qu", "ick bro", "wn fox and the q", "uick blue ha", "re."];
      expect(counts(tokenize(chunks).accumulator)).toEqual(SAMPLE_HISTOGRAM);
    });

    test("every two-way split gives the same histogram", () => {
      for (let at = 1; at < SAMPLE.length; at++) {
        const chunks = [SAMPLE.slice(0, at), SAMPLE.slice(at)];
        expect(counts(tokenize(chunks).accumulator)).toEqual(SAMPLE_HISTOGRAM);
      }
    });

    test("one byte per chunk", () => {
      const input = "-tokena- don't rock'n'roll a--b END- ";
      expect(counts(tokenize([...input]).accumulator)).toEqual(histogram(input));
    });

    test("a pending hyphen at the end of a chunk", () => {
      expect(counts(tokenize(["token-", "a token-b"]).accumulator)).toEqual({
        "token-a token-b": 1,
      });

      const tokenizer = tokenize(["token", "-", "a"]);
      expect(counts(tokenizer.accumulator)).toEqual({});
      expect(tokenizer.previousWord).toBe("token-a");
    });
  });

  describe("process", () => {
    test("consumes up to the last break and keeps the open token", () => {
      const tokenizer = new Tokenizer();

      expect(tokenizer.process(bytes("ab cd"), false)).toBe(3);
      expect(tokenizer.phase).toBe("in-word");
      expect(tokenizer.previousWord).toBe("ab");

      expect(tokenizer.process(bytes("cd"), true)).toBe(2);
      expect(tokenizer.phase).toBe("outside-word");
      expect(counts(tokenizer.accumulator)).toEqual({ "ab cd": 1 });
    });

    test("reports a trailing hyphen as pending", () => {
      const tokenizer = new Tokenizer();

      expect(tokenizer.process(bytes("ab-"), false)).toBe(0);
      expect(tokenizer.phase).toBe("pending-punctuation");
    });

    test("rejects a buffer that lost retained bytes", () => {
      const tokenizer = new Tokenizer();
      tokenizer.process(bytes("abc"), false);

      expect(() => tokenizer.process(bytes("a"), false)).toThrow(RangeError);
    });
  });

  test("monitor counts bytes, tokens and bigrams", () => {
    const monitor = new TokenizerMonitor();
    tokenize(["one two", " three"], new Tokenizer({ monitor }));

    expect(monitor.getCounters()).toEqual({
      bytesScanned: 13,
      reads: 0,
      tokensEmitted: 3,
      bigramsEmitted: 2,
    });
  });

  test("a disabled monitor reports no stats", () => {
    const tokenizer = new Tokenizer({ monitor: false });
    tokenizer.process(bytes("one two"), true);

    expect(tokenizer.stats).toBeNull();
    expect(new Tokenizer({ monitor: { mode: "disabled" } }).stats).toBeNull();

    const disabled = new TokenizerMonitor({ mode: "disabled" });
    disabled.start();
    expect(disabled.stats).toBeNull();
  });

  test("accepts any monitor implementation", () => {
    const calls: string[] = [];
    const monitor: ITokenizerMonitor = {
      config: { mode: "enabled" },
      start() {},
      increment(counter: CounterType, amount = 1) {
        calls.push(`${counter}:${amount}`);
      },
      getCounters: () => ({ bytesScanned: 0, reads: 0, tokensEmitted: 0, bigramsEmitted: 0 }),
      stats: null,
    };

    tokenize(["a b"], new Tokenizer({ monitor }));

    expect(calls).toEqual([
      "bytesScanned:3",
      "tokensEmitted:1",
      "tokensEmitted:1",
      "bigramsEmitted:1",
    ]);
  });
});
