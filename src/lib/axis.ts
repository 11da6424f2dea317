import type { AxisConfig, AxisState, JointId } from "../types/index";
import type { Actuator } from "./actuator";

export function clampAngle(angle: number, config: AxisConfig): number {
  return Math.max(config.min, Math.min(config.max, angle));
}

export function initialAxisState(config: AxisConfig): AxisState {
  return { angle: config.center };
}

/**
 * One proportional-control step for a single joint.
 *
 * The stored angle keeps full float precision across frames; only the value
 * sent to the actuator is rounded, so small corrections are not lost to
 * rounding drift.
 */
export function stepAxis(
  state: AxisState,
  config: AxisConfig,
  err: number,
  actuator: Actuator,
  joint: JointId
): AxisState {
  let e = config.invert ? -err : err;
  if (Math.abs(e) < config.deadzone) e = 0;

  const span = config.max - config.min;
  const angle = clampAngle(state.angle + config.gain * e * span * 0.5, config);

  actuator.setAngle(joint, Math.round(angle));
  return { angle };
}
