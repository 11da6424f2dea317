import type { FrameError, SelectedTarget } from "../types/index";

/**
 * Offset of the target's center from the frame center, normalized by the
 * half-frame size. Roughly [-1, 1]; not clamped here.
 */
export function computeError(
  target: SelectedTarget,
  frameWidth: number,
  frameHeight: number
): FrameError {
  const halfW = frameWidth / 2;
  const halfH = frameHeight / 2;
  return {
    x: (target.centerX - halfW) / Math.max(halfW, 1),
    y: (target.centerY - halfH) / Math.max(halfH, 1),
  };
}
