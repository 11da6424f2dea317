// types/index.ts

export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface Detection {
  classId: number;
  bbox: BoundingBox;
  confidence: number;
}

/** One frame's worth of detector output. */
export interface FrameDetections {
  width: number;
  height: number;
  detections: Detection[];
}

export interface TargetFilter {
  allowedClassIds: ReadonlySet<number>;
  minWidth: number;
  minHeight: number;
}

export interface SelectedTarget {
  centerX: number;
  centerY: number;
  area: number;
  classId: number;
}

export interface FrameError {
  x: number;
  y: number;
}

export interface AxisConfig {
  center: number;
  min: number;
  max: number;
  gain: number;
  deadzone: number;
  invert: boolean;
}

export interface AxisState {
  angle: number;
}

export type ScanDirection = 1 | -1;

export interface ScanState {
  framesSinceTarget: number;
  direction: ScanDirection;
}

export type TrackerMode = "tracking" | "scanning";

export type JointId = number;

export interface TrackerConfig {
  pan: AxisConfig;
  tilt: AxisConfig;
  panJoint: JointId;
  tiltJoint: JointId;
  filter: TargetFilter;
  missThreshold: number;
  scanStepDegrees: number;
}

export interface FrameOutcome {
  mode: TrackerMode;
  target: SelectedTarget | null;
  error: FrameError | null;
  framesSinceTarget: number;
  /** Angles sent to the actuator this frame; null when the axes were held. */
  commanded: { pan: number; tilt: number } | null;
}
