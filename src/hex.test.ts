import { describe, expect, it } from "vitest";

import { formatHexBytes, parseHexBytes } from "./hex";

describe("hex", () => {
  it("parses spaced, comma-separated and prefixed bytes", () => {
    expect(Array.from(parseHexBytes("05 01,0x09 0X02"))).toEqual([0x05, 0x01, 0x09, 0x02]);
    expect(Array.from(parseHexBytes("05010902"))).toEqual([0x05, 0x01, 0x09, 0x02]);
    expect(Array.from(parseHexBytes("a1\n\tC0\n"))).toEqual([0xa1, 0xc0]);
  });

  it("parses empty input as no bytes", () => {
    expect(parseHexBytes("").byteLength).toBe(0);
    expect(parseHexBytes("  \n").byteLength).toBe(0);
  });

  it("rejects odd-length and non-hex tokens", () => {
    expect(() => parseHexBytes("05 1")).toThrow('invalid hex byte "1"');
    expect(() => parseHexBytes("0x")).toThrow('invalid hex byte "0x"');
    expect(() => parseHexBytes("zz")).toThrow('invalid hex byte "zz"');
  });

  it("formats uppercase bytes separated by spaces", () => {
    expect(formatHexBytes(new Uint8Array([0x0a, 0xff, 0x00]))).toBe("0A FF 00");
    expect(formatHexBytes(new Uint8Array(0))).toBe("");
  });
});
