import { describe, it, expect } from "vitest";
import { computeError } from "./offset";

const target = (centerX: number, centerY: number) => ({ centerX, centerY, area: 1, classId: 15 });

describe("computeError", () => {
  it("is zero for a centered target", () => {
    expect(computeError(target(320, 240), 640, 480)).toEqual({ x: 0, y: 0 });
  });

  it("normalizes by the half-frame size", () => {
    // (480 - 320) / 320, (120 - 240) / 240
    expect(computeError(target(480, 120), 640, 480)).toEqual({ x: 0.5, y: -0.5 });
  });

  it("reaches ±1 at the frame edges and is not clamped beyond", () => {
    expect(computeError(target(640, 0), 640, 480)).toEqual({ x: 1, y: -1 });
    expect(computeError(target(960, 240), 640, 480).x).toBe(2);
  });

  it("never divides by less than one", () => {
    // half width 0.5 is floored to 1
    expect(computeError(target(1.5, 0.5), 1, 1)).toEqual({ x: 1, y: 0 });
  });
});
