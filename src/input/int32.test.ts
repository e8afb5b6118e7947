import { describe, expect, it } from "vitest";

import { addI32Saturating, clampI32, I32_MAX, I32_MIN } from "./int32";

describe("input/int32", () => {
  it("clamps to the given bounds", () => {
    expect(clampI32(5, -3, 3)).toBe(3);
    expect(clampI32(-5, -3, 3)).toBe(-3);
    expect(clampI32(2, -3, 3)).toBe(2);
  });

  it("saturates instead of wrapping", () => {
    expect(addI32Saturating(I32_MAX, 1)).toBe(I32_MAX);
    expect(addI32Saturating(I32_MIN, -1)).toBe(I32_MIN);
    expect(addI32Saturating(I32_MAX, I32_MIN)).toBe(-1);
  });
});
