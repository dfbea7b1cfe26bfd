import { describe, expect, it } from "vitest";
import { ConsoleBuffer } from "../libs/consoleBuffer";

describe("ConsoleBuffer", () => {
  it("reads chunks after a sequence number", () => {
    const buffer = new ConsoleBuffer(10);
    buffer.append("stdout", "a");
    buffer.append("stderr", "b");
    buffer.append("stdout", "c");

    expect(buffer.read(1).map((c) => [c.seq, c.stream, c.text])).toEqual([
      [2, "stderr", "b"],
      [3, "stdout", "c"],
    ]);
    expect(buffer.read(0, 1).map((c) => c.text)).toEqual(["a"]);
  });

  it("drops the oldest chunks past its limit and keeps numbering after clear", () => {
    const buffer = new ConsoleBuffer(2);
    for (const t of ["a", "b", "c"]) buffer.append("stdout", t);

    expect(buffer.read().map((c) => c.text)).toEqual(["b", "c"]);

    buffer.clear();
    expect(buffer.size).toBe(0);
    expect(buffer.append("stdout", "d").seq).toBe(4);
  });

  it("evicts the oldest chunks once the character budget is exceeded", () => {
    const buffer = new ConsoleBuffer(100, 10);
    buffer.append("stdout", "aaaa");
    buffer.append("stdout", "bbbb");
    buffer.append("stderr", "cccc");

    expect(buffer.read().map((c) => c.text)).toEqual(["bbbb", "cccc"]);
    expect(buffer.chars).toBe(8);
  });

  it("keeps a single chunk larger than the character budget", () => {
    const buffer = new ConsoleBuffer(100, 5);
    buffer.append("stdout", "ab");
    buffer.append("stdout", "0123456789");

    expect(buffer.read().map((c) => c.text)).toEqual(["0123456789"]);
    expect(buffer.chars).toBe(10);

    buffer.clear();
    expect(buffer.chars).toBe(0);
  });
});
