import { describe, it, expect, beforeEach } from "vitest";
import { TrackingController } from "./controller";
import { buildConfig } from "./config";
import type { Actuator } from "./actuator";
import type { Detection, FrameDetections, JointId } from "../types/index";

const CAT = 15;
const PERSON = 0;

class RecordingActuator implements Actuator {
  calls: Array<[JointId, number]> = [];
  private angles = new Map<JointId, number>();

  setAngle(joint: JointId, angle: number): void {
    this.calls.push([joint, angle]);
    this.angles.set(joint, angle);
  }

  getAngle(joint: JointId): number {
    return this.angles.get(joint) ?? 90;
  }
}

const det = (classId: number, x1: number, y1: number, x2: number, y2: number): Detection => ({
  classId,
  bbox: { x1, y1, x2, y2 },
  confidence: 0.9,
});

const frame = (...detections: Detection[]): FrameDetections => ({ width: 640, height: 480, detections });

// centered at (480, 240): err_x = 0.5, err_y = 0
const catRightOfCenter = det(CAT, 440, 200, 520, 280);

describe("TrackingController", () => {
  let actuator: RecordingActuator;
  let controller: TrackingController;

  beforeEach(() => {
    actuator = new RecordingActuator();
    controller = new TrackingController(
      buildConfig({ allowedClassIds: [CAT], missThreshold: 3 }),
      actuator
    );
  });

  it("centers both axes on start", () => {
    controller.start();
    expect(actuator.calls).toEqual([
      [0, 90],
      [1, 90],
    ]);
    expect(controller.angles).toEqual({ pan: 90, tilt: 90 });
  });

  it("drives both axes toward a selected target", () => {
    const outcome = controller.update(frame(catRightOfCenter));

    expect(outcome.mode).toBe("tracking");
    expect(outcome.target).toEqual({ centerX: 480, centerY: 240, area: 6400, classId: CAT });
    expect(outcome.error).toEqual({ x: 0.5, y: 0 });
    expect(outcome.commanded).toEqual({ pan: 107, tilt: 90 });
    expect(controller.angles).toEqual({ pan: 106.5, tilt: 90 });
    expect(actuator.calls).toEqual([
      [0, 107],
      [1, 90],
    ]);
  });

  it("ignores targets of classes it is not tracking", () => {
    const outcome = controller.update(frame(det(PERSON, 0, 0, 600, 400)));
    expect(outcome.target).toBeNull();
    expect(outcome.framesSinceTarget).toBe(1);
  });

  it("holds the axes for misses below the threshold", () => {
    controller.update(frame());
    const outcome = controller.update(frame());

    expect(outcome.mode).toBe("tracking");
    expect(outcome.commanded).toBeNull();
    expect(outcome.framesSinceTarget).toBe(2);
    expect(actuator.calls).toEqual([]);
  });

  it("never scans when a target returns one frame before the threshold", () => {
    controller.update(frame());
    controller.update(frame());
    const outcome = controller.update(frame(catRightOfCenter));

    expect(outcome.mode).toBe("tracking");
    expect(outcome.framesSinceTarget).toBe(0);
    expect(controller.scanState.framesSinceTarget).toBe(0);
    expect(actuator.calls).toEqual([
      [0, 107],
      [1, 90],
    ]);
  });

  it("scans pan and resends tilt once the threshold is reached", () => {
    controller.update(frame());
    controller.update(frame());
    const outcome = controller.update(frame());

    expect(outcome.mode).toBe("scanning");
    expect(outcome.framesSinceTarget).toBe(3);
    expect(outcome.commanded).toEqual({ pan: 92, tilt: 90 });
    expect(actuator.calls).toEqual([
      [0, 92],
      [1, 90],
    ]);
  });

  it("resets the miss counter the instant a target appears mid-scan", () => {
    for (let i = 0; i < 5; i++) controller.update(frame());
    expect(controller.mode).toBe("scanning");

    const outcome = controller.update(frame(catRightOfCenter));
    expect(outcome.mode).toBe("tracking");
    expect(controller.scanState.framesSinceTarget).toBe(0);

    // a single dropout afterwards does not restart the scan
    const dropout = controller.update(frame());
    expect(dropout.mode).toBe("tracking");
    expect(dropout.commanded).toBeNull();
  });

  it("holds tilt at its last rounded command while scanning", () => {
    // centered at (320, 360): err_y = 0.5, tilt 90 + 0.55 * 0.5 * 80 * 0.5 = 101
    controller.update(frame(det(CAT, 300, 340, 340, 380)));
    actuator.calls = [];

    for (let i = 0; i < 3; i++) controller.update(frame());
    expect(actuator.calls).toEqual([
      [0, 92],
      [1, 101],
    ]);
    expect(controller.angles.tilt).toBeCloseTo(101, 10);
  });

  it("keeps the scan direction across tracking interruptions", () => {
    const config = buildConfig({ allowedClassIds: [CAT], missThreshold: 1, scanStepDegrees: 50 });
    const c = new TrackingController(config, actuator);
    c.update(frame()); // 140
    c.update(frame()); // 150, flip
    expect(c.scanState.direction).toBe(-1);
    c.update(frame(det(CAT, 300, 220, 340, 260))); // centered: no motion
    c.update(frame());
    expect(c.angles.pan).toBe(100);
  });

  it("still centers tilt when the pan joint fails on shutdown", () => {
    const broken = new RecordingActuator();
    const setAngle = broken.setAngle.bind(broken);
    broken.setAngle = (joint, angle) => {
      setAngle(joint, angle);
      if (joint === 0) throw new Error(`pan servo unplugged at ${angle}`);
    };
    const c = new TrackingController(buildConfig({ allowedClassIds: [CAT] }), broken);

    expect(() => c.shutdown()).toThrow("pan servo unplugged at 90");
    expect(broken.calls).toEqual([
      [0, 90],
      [1, 90],
    ]);
  });

  it("re-centers both axes on shutdown", () => {
    controller.update(frame(catRightOfCenter));
    actuator.calls = [];
    controller.shutdown();
    expect(actuator.calls).toEqual([
      [0, 90],
      [1, 90],
    ]);
  });
});
