import { describe, expect, it } from "vitest";
import { appendChecksum, stripChecksum, toHex, xorChecksum } from "../checksum";

describe("checksum", () => {
  it("XORs every character", () => {
    expect(xorChecksum("$GS")).toBe(0x30);
    expect(appendChecksum("$OK")).toBe("$OK^20");
  });

  it("splits and verifies a suffix", () => {
    expect(stripChecksum("$GS^30")).toEqual({ present: true, valid: true, body: "$GS" });
    expect(stripChecksum("$GS^31")).toEqual({ present: true, valid: false, body: "$GS" });
    expect(stripChecksum("$GS^3")).toEqual({ present: true, valid: false, body: "$GS" });
    expect(stripChecksum("$GS")).toEqual({ present: false, body: "$GS" });
  });

  it("pads hex values", () => {
    expect(toHex(0x21, 4)).toBe("0021");
    expect(toHex(0xfe, 2)).toBe("FE");
  });
});
