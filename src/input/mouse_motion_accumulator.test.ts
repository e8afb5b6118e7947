import { describe, expect, it } from "vitest";

import { I32_MAX } from "./int32";
import { encodeMouseMotionPacket, MOUSE_PACKET_BYTES, MouseMotionAccumulator } from "./mouse_motion_accumulator";

describe("input/MouseMotionAccumulator", () => {
  it("returns null until something changes", () => {
    const acc = new MouseMotionAccumulator();
    expect(acc.take()).toBeNull();
    acc.add({ dx: 0, dy: 0, wheel: 0, buttons: 0 });
    expect(acc.dirty).toBe(false);
    expect(acc.take()).toBeNull();
  });

  it("sums samples into one packet", () => {
    const acc = new MouseMotionAccumulator();
    acc.add({ dx: 5, dy: -3, wheel: 1, buttons: 1 });
    acc.add({ dx: 2, dy: -1, wheel: 0, buttons: 1 });
    expect(acc.take()).toEqual({ dx: 7, dy: -4, wheel: 1, buttons: 1, buttonsChanged: true });
    expect(acc.take()).toBeNull();
  });

  it("carries motion beyond the packet limits into later packets", () => {
    const acc = new MouseMotionAccumulator();
    acc.add({ dx: 40_000, dy: 0, wheel: -200, buttons: 0 });
    expect(acc.take()).toEqual({ dx: 32_767, dy: 0, wheel: -127, buttons: 0, buttonsChanged: false });
    expect(acc.dirty).toBe(true);
    expect(acc.take()).toEqual({ dx: 7_233, dy: 0, wheel: -73, buttons: 0, buttonsChanged: false });
    expect(acc.take()).toBeNull();
  });

  it("sends button changes without motion", () => {
    const acc = new MouseMotionAccumulator();
    acc.add({ dx: 0, dy: 0, wheel: 0, buttons: 2 });
    expect(acc.take()).toEqual({ dx: 0, dy: 0, wheel: 0, buttons: 2, buttonsChanged: true });
    acc.add({ dx: 0, dy: 0, wheel: 0, buttons: 2 });
    expect(acc.take()).toBeNull();
  });

  it("saturates pending totals", () => {
    const acc = new MouseMotionAccumulator();
    acc.add({ dx: I32_MAX, dy: 0, wheel: 0, buttons: 0 });
    acc.add({ dx: I32_MAX, dy: 0, wheel: 0, buttons: 0 });
    expect(acc.pending.dx).toBe(I32_MAX);
  });

  it("restores a packet that could not be sent", () => {
    const acc = new MouseMotionAccumulator();
    acc.add({ dx: 10, dy: 20, wheel: 0, buttons: 1 });
    const packet = acc.take();
    if (!packet) throw new Error("expected a packet");
    acc.add({ dx: 1, dy: 1, wheel: 0, buttons: 1 });
    acc.restore(packet);
    expect(acc.pending).toEqual({ dx: 11, dy: 21, wheel: 0, buttons: 1 });
    expect(acc.take()).toEqual({ dx: 11, dy: 21, wheel: 0, buttons: 1, buttonsChanged: true });
  });

  it("clear drops pending state", () => {
    const acc = new MouseMotionAccumulator();
    acc.add({ dx: 3, dy: 3, wheel: 3, buttons: 3 });
    acc.clear();
    expect(acc.dirty).toBe(false);
    expect(acc.pending).toEqual({ dx: 0, dy: 0, wheel: 0, buttons: 0 });
    expect(acc.take()).toBeNull();
  });
});

describe("input/encodeMouseMotionPacket", () => {
  it("packs buttons, little-endian X/Y and wheel", () => {
    const bytes = encodeMouseMotionPacket({ dx: -2, dy: 300, wheel: -1, buttons: 0x0f, buttonsChanged: false });
    expect(bytes.byteLength).toBe(MOUSE_PACKET_BYTES);
    expect(Array.from(bytes)).toEqual([0x07, 0xfe, 0xff, 0x2c, 0x01, 0xff]);
  });
});
