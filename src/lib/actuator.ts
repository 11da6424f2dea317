import type { JointId } from "../types/index";
import {
  ACTUATOR_DEFAULT_ANGLE,
  ACTUATOR_MAX_ANGLE,
  ACTUATOR_MIN_ANGLE,
} from "./constants";

/**
 * Two-operation servo capability. Control code only ever talks to this
 * interface, never to a concrete driver.
 */
export interface Actuator {
  /** Clamp to the safe absolute range, truncate to whole degrees, and move. */
  setAngle(joint: JointId, angle: number): void;
  /** Last commanded angle for the joint. */
  getAngle(joint: JointId): number;
}

export function toDeviceAngle(angle: number): number {
  return Math.max(
    ACTUATOR_MIN_ANGLE,
    Math.min(ACTUATOR_MAX_ANGLE, Math.trunc(angle))
  );
}

/** In-memory stand-in used when no servo hardware is attached. */
export class MemoryActuator implements Actuator {
  private angles: Map<JointId, number> = new Map();

  setAngle(joint: JointId, angle: number): void {
    this.angles.set(joint, toDeviceAngle(angle));
  }

  getAngle(joint: JointId): number {
    return this.angles.get(joint) ?? ACTUATOR_DEFAULT_ANGLE;
  }
}

/** Prints every command, then records it in memory. */
export class EchoActuator implements Actuator {
  private inner = new MemoryActuator();

  constructor(
    private names: Record<JointId, string> = {},
    private log: (line: string) => void = console.log
  ) {}

  setAngle(joint: JointId, angle: number): void {
    this.inner.setAngle(joint, angle);
    const name = this.names[joint] ?? `servo ${joint}`;
    this.log(`  [servo] ${name} -> ${this.inner.getAngle(joint)}`);
  }

  getAngle(joint: JointId): number {
    return this.inner.getAngle(joint);
  }
}
