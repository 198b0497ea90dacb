import { describe, expect, it, vi } from "vitest";
import { LineFramer } from "../lineFramer";

describe("LineFramer", () => {
  it("joins partial reads", () => {
    const framer = new LineFramer();
    expect(framer.push("$G")).toEqual([]);
    expect(framer.push("S\r")).toEqual(["$GS"]);
  });

  it("accepts CR, LF and CRLF and skips empty lines", () => {
    const framer = new LineFramer();
    expect(framer.push("$GS\r\n$GC\n\r\r$GV\r")).toEqual(["$GS", "$GC", "$GV"]);
  });

  it("discards an over-long line up to its terminator", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const framer = new LineFramer();

    expect(framer.push("x".repeat(300))).toEqual([]);
    expect(framer.push("yyy\r$GS\r")).toEqual(["$GS"]);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });

  it("keeps a line of exactly the maximum length", () => {
    const framer = new LineFramer();
    const line = `$${"x".repeat(255)}`;
    expect(framer.push(`${line}\r`)).toEqual([line]);
  });
});
