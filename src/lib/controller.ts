import type {
  AxisState,
  FrameDetections,
  FrameOutcome,
  JointId,
  ScanState,
  TrackerConfig,
  TrackerMode,
} from "../types/index";
import type { Actuator } from "./actuator";
import { initialAxisState, stepAxis } from "./axis";
import { computeError } from "./offset";
import { initialScanState, shouldScan, tickScan } from "./scan";
import { selectTarget } from "./target";

/**
 * Owns the cross-frame state (both axis angles, the miss counter and the scan
 * direction) and is the only writer to the actuator.
 *
 * Mode transitions, evaluated once per frame:
 *   target found                       -> "tracking", counter reset to 0
 *   no target, counter >= missThreshold -> "scanning"
 *   no target, counter <  missThreshold -> mode unchanged, axes held
 */
export class TrackingController {
  private pan: AxisState;
  private tilt: AxisState;
  private scan: ScanState = initialScanState();
  private currentMode: TrackerMode = "tracking";

  constructor(
    private readonly config: TrackerConfig,
    private readonly actuator: Actuator
  ) {
    this.pan = initialAxisState(config.pan);
    this.tilt = initialAxisState(config.tilt);
  }

  get mode(): TrackerMode {
    return this.currentMode;
  }

  get angles(): { pan: number; tilt: number } {
    return { pan: this.pan.angle, tilt: this.tilt.angle };
  }

  get scanState(): ScanState {
    return { ...this.scan };
  }

  /** Command both axes to center before the first frame. */
  start(): void {
    this.center();
  }

  /** Re-center both axes; used on every exit path. */
  shutdown(): void {
    this.center();
  }

  update(frame: FrameDetections): FrameOutcome {
    const { config, actuator } = this;
    const target = selectTarget(frame.detections, config.filter);

    if (target) {
      this.scan = { ...this.scan, framesSinceTarget: 0 };
      this.currentMode = "tracking";

      const error = computeError(target, frame.width, frame.height);
      this.pan = stepAxis(this.pan, config.pan, error.x, actuator, config.panJoint);
      this.tilt = stepAxis(this.tilt, config.tilt, error.y, actuator, config.tiltJoint);

      return {
        mode: this.currentMode,
        target,
        error,
        framesSinceTarget: 0,
        commanded: this.commanded(),
      };
    }

    this.scan = { ...this.scan, framesSinceTarget: this.scan.framesSinceTarget + 1 };
    if (!shouldScan(this.scan, config.missThreshold)) {
      return {
        mode: this.currentMode,
        target: null,
        error: null,
        framesSinceTarget: this.scan.framesSinceTarget,
        commanded: null,
      };
    }

    this.currentMode = "scanning";
    const next = tickScan(
      this.scan,
      this.pan,
      config.pan,
      config.scanStepDegrees,
      actuator,
      config.panJoint
    );
    this.scan = next.scan;
    this.pan = next.pan;
    // Tilt holds: resend its last command unchanged.
    actuator.setAngle(config.tiltJoint, Math.round(this.tilt.angle));

    return {
      mode: this.currentMode,
      target: null,
      error: null,
      framesSinceTarget: this.scan.framesSinceTarget,
      commanded: this.commanded(),
    };
  }

  private commanded(): { pan: number; tilt: number } {
    return { pan: Math.round(this.pan.angle), tilt: Math.round(this.tilt.angle) };
  }

  /** Every joint is attempted; the first failure is rethrown afterwards. */
  private center(): void {
    const { config, actuator } = this;
    const targets: Array<[JointId, number]> = [
      [config.panJoint, config.pan.center],
      [config.tiltJoint, config.tilt.center],
    ];
    let failure: { err: unknown } | null = null;

    for (const [joint, angle] of targets) {
      try {
        actuator.setAngle(joint, angle);
      } catch (err) {
        if (failure === null) failure = { err };
      }
    }

    if (failure !== null) throw failure.err;
  }
}
