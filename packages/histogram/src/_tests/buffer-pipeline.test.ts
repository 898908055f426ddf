import { describe, expect, test } from "vitest";
import { PipelineFailure } from "../errors";
import { BufferPipeline, type IPipeWriter } from "../pipeline";
import { bytes, text, tick } from "./helpers";

function write(writer: IPipeWriter, value: string) {
  const memory = writer.getMemory(value.length);
  memory.set(bytes(value));
  writer.advance(value.length);
}

describe("BufferPipeline", () => {
  test("retains unconsumed bytes for the next read", async () => {
    const { writer, reader } = new BufferPipeline();

    write(writer, "hello");
    await writer.flush();

    const first = await reader.read();
    expect(text(first.buffer)).toBe("hello");
    expect(first.isCompleted).toBe(false);
    reader.advanceTo(2);

    write(writer, " world");
    await writer.flush();

    const second = await reader.read();
    expect(text(second.buffer)).toBe("llo world");
  });

  test("a read waits for the next flush", async () => {
    const { writer, reader } = new BufferPipeline();
    let resolved = false;
    const reading = reader.read().then((result) => {
      resolved = true;
      return result;
    });

    write(writer, "abc");
    await tick();
    expect(resolved).toBe(false);

    await writer.flush();
    expect(text((await reading).buffer)).toBe("abc");
  });

  test("a read with nothing new waits even if bytes are retained", async () => {
    const { writer, reader } = new BufferPipeline();
    write(writer, "abc");
    await writer.flush();

    await reader.read();
    reader.advanceTo(1);

    let resolved = false;
    const reading = reader.read().then((result) => {
      resolved = true;
      return result;
    });
    await tick();
    expect(resolved).toBe(false);

    writer.complete();
    const last = await reading;
    expect(text(last.buffer)).toBe("bc");
    expect(last.isCompleted).toBe(true);
  });

  test("completion hands over the remaining bytes", async () => {
    const { writer, reader } = new BufferPipeline();
    write(writer, "abc");
    await writer.flush();
    write(writer, "def");
    writer.complete();

    const result = await reader.read();
    expect(text(result.buffer)).toBe("abcdef");
    expect(result.isCompleted).toBe(true);
    expect(writer.isCompleted).toBe(true);
  });

  test("a writer error fails the reader", async () => {
    const { writer, reader } = new BufferPipeline();
    const cause = new Error("disk gone");
    write(writer, "abc");
    writer.complete(cause);

    const failure = await reader.read().catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(PipelineFailure);
    expect(failure instanceof Error && failure.cause).toBe(cause);
  });

  test("a writer error fails a read that is already waiting", async () => {
    const { writer, reader } = new BufferPipeline();
    const reading = reader.read();

    writer.complete(new Error("disk gone"));

    await expect(reading).rejects.toBeInstanceOf(PipelineFailure);
  });

  test("flush suspends at the pause threshold and resumes once examined", async () => {
    const { writer, reader } = new BufferPipeline({
      segmentSize: 4,
      pauseWriterThreshold: 8,
      resumeWriterThreshold: 4,
    });

    write(writer, "abcd");
    expect(await writer.flush()).toEqual({ isCompleted: false });

    write(writer, "efgh");
    let resumed = false;
    const flushing = writer.flush().then((result) => {
      resumed = true;
      return result;
    });
    await tick();
    expect(resumed).toBe(false);

    const { buffer } = await reader.read();
    expect(text(buffer)).toBe("abcdefgh");
    reader.advanceTo(8);

    expect(await flushing).toEqual({ isCompleted: false });
  });

  test("a token longer than the pause threshold does not stall the writer", async () => {
    const { writer, reader } = new BufferPipeline({
      segmentSize: 4,
      pauseWriterThreshold: 8,
      resumeWriterThreshold: 4,
    });

    write(writer, "abcdefgh");
    const flushing = writer.flush();

    await reader.read();
    reader.advanceTo(0);

    expect(await flushing).toEqual({ isCompleted: false });

    write(writer, "ij");
    await writer.flush();
    expect(text((await reader.read()).buffer)).toBe("abcdefghij");
  });

  test("completing the reader releases the writer", async () => {
    const { writer, reader } = new BufferPipeline({
      segmentSize: 4,
      pauseWriterThreshold: 4,
      resumeWriterThreshold: 2,
    });

    write(writer, "abcd");
    const flushing = writer.flush();
    reader.complete();

    expect(await flushing).toEqual({ isCompleted: true });
    expect(await writer.flush()).toEqual({ isCompleted: true });
    expect(reader.isCompleted).toBe(true);
  });

  test("keeps byte order across compaction and growth", async () => {
    const { writer, reader } = new BufferPipeline({
      segmentSize: 4,
      pauseWriterThreshold: 64,
      resumeWriterThreshold: 32,
    });
    const input = "the quick brown fox jumps over the lazy dog".repeat(5);
    let consumedText = "";

    for (let at = 0; at < input.length; at += 7) {
      write(writer, input.slice(at, at + 7));
      await writer.flush();

      const { buffer } = await reader.read();
      const keep = Math.min(3, buffer.length);
      consumedText += text(buffer.subarray(0, buffer.length - keep));
      reader.advanceTo(buffer.length - keep);
    }
    writer.complete();

    const last = await reader.read();
    consumedText += text(last.buffer);
    reader.advanceTo(last.buffer.length);

    expect(last.isCompleted).toBe(true);
    expect(consumedText).toBe(input);
  });

  test("validates counts", async () => {
    const { writer, reader } = new BufferPipeline();

    writer.getMemory(4);
    expect(() => writer.advance(5)).toThrow(RangeError);
    expect(() => reader.advanceTo(0)).toThrow("advanceTo called without a preceding read");

    writer.advance(2);
    await writer.flush();
    await reader.read();
    expect(() => reader.advanceTo(3)).toThrow(RangeError);
  });

  test("rejects a resume threshold above the pause threshold", () => {
    expect(
      () => new BufferPipeline({ pauseWriterThreshold: 4, resumeWriterThreshold: 8 }),
    ).toThrow(RangeError);
  });

  test("rejects writes after completion and reads after the reader completed", async () => {
    const { writer, reader } = new BufferPipeline();
    writer.complete();
    reader.complete();

    expect(() => writer.getMemory()).toThrow("Cannot write to a completed pipeline writer");
    await expect(reader.read()).rejects.toThrow(
      "Cannot read from a completed pipeline reader",
    );
  });
});
