import type { AxisConfig, TrackerConfig } from "../types/index";
import {
  DEADZONE,
  GAIN,
  MIN_TRACK_HEIGHT,
  MIN_TRACK_WIDTH,
  MISS_THRESHOLD,
  PAN_CENTER,
  PAN_JOINT,
  PAN_RANGE,
  SCAN_STEP_DEGREES,
  TILT_CENTER,
  TILT_JOINT,
  TILT_RANGE,
} from "./constants";

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid tracker configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

export interface ConfigOverrides {
  pan?: Partial<AxisConfig>;
  tilt?: Partial<AxisConfig>;
  /** Applied to both axes unless an axis sets its own gain. */
  gain?: number;
  allowedClassIds?: Iterable<number>;
  minWidth?: number;
  minHeight?: number;
  missThreshold?: number;
  scanStepDegrees?: number;
}

export const DEFAULT_PAN: AxisConfig = {
  center: PAN_CENTER,
  min: PAN_RANGE[0],
  max: PAN_RANGE[1],
  gain: GAIN,
  deadzone: DEADZONE,
  invert: false,
};

export const DEFAULT_TILT: AxisConfig = {
  center: TILT_CENTER,
  min: TILT_RANGE[0],
  max: TILT_RANGE[1],
  gain: GAIN,
  deadzone: DEADZONE,
  invert: false,
};

/**
 * Merge operator overrides onto the defaults, validate, and freeze. Throws
 * ConfigError before anything moves if tracking would be impossible.
 */
export function buildConfig(overrides: ConfigOverrides = {}): TrackerConfig {
  const sharedGain = overrides.gain !== undefined ? { gain: overrides.gain } : {};
  const config: TrackerConfig = {
    pan: Object.freeze({ ...DEFAULT_PAN, ...sharedGain, ...overrides.pan }),
    tilt: Object.freeze({ ...DEFAULT_TILT, ...sharedGain, ...overrides.tilt }),
    panJoint: PAN_JOINT,
    tiltJoint: TILT_JOINT,
    filter: Object.freeze({
      allowedClassIds: new Set(overrides.allowedClassIds ?? []),
      minWidth: overrides.minWidth ?? MIN_TRACK_WIDTH,
      minHeight: overrides.minHeight ?? MIN_TRACK_HEIGHT,
    }),
    missThreshold: overrides.missThreshold ?? MISS_THRESHOLD,
    scanStepDegrees: overrides.scanStepDegrees ?? SCAN_STEP_DEGREES,
  };
  validateConfig(config);
  return Object.freeze(config);
}

function axisProblems(name: string, axis: AxisConfig): string[] {
  const problems: string[] = [];
  if (axis.min > axis.max) {
    problems.push(`${name}: min angle ${axis.min} is above max angle ${axis.max}`);
  } else if (axis.center < axis.min || axis.center > axis.max) {
    problems.push(`${name}: center ${axis.center} is outside [${axis.min}, ${axis.max}]`);
  }
  if (!(axis.gain > 0)) problems.push(`${name}: gain must be > 0 (got ${axis.gain})`);
  if (!(axis.deadzone >= 0 && axis.deadzone < 1)) {
    problems.push(`${name}: deadzone must be in [0, 1) (got ${axis.deadzone})`);
  }
  return problems;
}

export function validateConfig(config: TrackerConfig): void {
  const problems = [
    ...axisProblems("pan", config.pan),
    ...axisProblems("tilt", config.tilt),
  ];
  const { filter } = config;
  if (filter.allowedClassIds.size === 0) problems.push("no classes to track");
  if (!(filter.minWidth >= 0)) problems.push(`min width must be >= 0 (got ${filter.minWidth})`);
  if (!(filter.minHeight >= 0)) problems.push(`min height must be >= 0 (got ${filter.minHeight})`);
  if (!Number.isInteger(config.missThreshold) || config.missThreshold < 1) {
    problems.push(`miss threshold must be a positive integer (got ${config.missThreshold})`);
  }
  if (!(config.scanStepDegrees > 0)) {
    problems.push(`scan step must be > 0 (got ${config.scanStepDegrees})`);
  }
  if (config.panJoint === config.tiltJoint) problems.push("pan and tilt share a joint");

  if (problems.length > 0) throw new ConfigError(problems);
}

/**
 * Resolve class names to detector class ids (case-insensitive). Unknown names
 * are skipped; the caller decides whether an empty result is fatal.
 */
export function resolveClassIds(names: readonly string[], labels: readonly string[]): number[] {
  const ids: number[] = [];
  for (const raw of names) {
    const want = raw.trim().toLowerCase();
    if (!want) continue;
    const idx = labels.findIndex((label) => label.toLowerCase() === want);
    if (idx >= 0 && !ids.includes(idx)) ids.push(idx);
  }
  return ids;
}
