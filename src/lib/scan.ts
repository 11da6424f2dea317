import type { AxisConfig, AxisState, JointId, ScanState } from "../types/index";
import type { Actuator } from "./actuator";

export function initialScanState(): ScanState {
  return { framesSinceTarget: 0, direction: 1 };
}

export function shouldScan(scan: ScanState, missThreshold: number): boolean {
  return scan.framesSinceTarget >= missThreshold;
}

/**
 * Sweep the pan axis one step, bouncing off its configured bounds. The
 * angle lands exactly on the bound and the direction flips on that tick.
 * Only pan is commanded; holding tilt is the caller's job.
 */
export function tickScan(
  scan: ScanState,
  pan: AxisState,
  panConfig: AxisConfig,
  stepDegrees: number,
  actuator: Actuator,
  panJoint: JointId
): { scan: ScanState; pan: AxisState } {
  let angle = pan.angle + scan.direction * stepDegrees;
  let direction = scan.direction;

  if (angle >= panConfig.max) {
    angle = panConfig.max;
    direction = -1;
  } else if (angle <= panConfig.min) {
    angle = panConfig.min;
    direction = 1;
  }

  actuator.setAngle(panJoint, Math.round(angle));
  return {
    scan: { framesSinceTarget: scan.framesSinceTarget, direction },
    pan: { angle },
  };
}
