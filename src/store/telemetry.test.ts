import { describe, it, expect, beforeEach } from "vitest";
import { createTelemetryStore, snapshotOf } from "./telemetry";
import type { TelemetryStore } from "./telemetry";
import type { FrameOutcome } from "../types/index";

const tracked: FrameOutcome = {
  mode: "tracking",
  target: { centerX: 480, centerY: 240, area: 6400, classId: 15 },
  error: { x: 0.5, y: 0 },
  framesSinceTarget: 0,
  commanded: { pan: 107, tilt: 90 },
};

const held: FrameOutcome = {
  mode: "tracking",
  target: null,
  error: null,
  framesSinceTarget: 1,
  commanded: null,
};

describe("telemetry store", () => {
  let store: TelemetryStore;

  beforeEach(() => {
    store = createTelemetryStore();
  });

  it("starts at the home position once set", () => {
    store.getState().setHome(90, 90);
    expect(snapshotOf(store.getState())).toEqual({
      mode: "tracking",
      pan: 90,
      tilt: 90,
      targetLabel: null,
      detectionCount: 0,
      frameCount: 0,
      framesSinceTarget: 0,
      fps: 0,
    });
  });

  it("records the commanded angles and target of each frame", () => {
    store.getState().recordFrame(tracked, 3, "cat", 0);
    const s = store.getState();
    expect(s.pan).toBe(107);
    expect(s.targetLabel).toBe("cat");
    expect(s.detectionCount).toBe(3);
    expect(s.frameCount).toBe(1);
  });

  it("keeps the last commanded angles while the axes are held", () => {
    store.getState().recordFrame(tracked, 1, "cat", 0);
    store.getState().recordFrame(held, 0, null, 100);
    const s = store.getState();
    expect(s.pan).toBe(107);
    expect(s.tilt).toBe(90);
    expect(s.targetLabel).toBeNull();
    expect(s.framesSinceTarget).toBe(1);
  });

  it("counts frames per second over one-second windows", () => {
    const { recordFrame } = store.getState();
    recordFrame(tracked, 1, "cat", 0);
    recordFrame(tracked, 1, "cat", 500);
    expect(store.getState().fps).toBe(0);
    recordFrame(tracked, 1, "cat", 1000);
    expect(store.getState().fps).toBe(3);
  });

  it("notifies subscribers on every frame", () => {
    const frames: number[] = [];
    const unsubscribe = store.subscribe((s) => frames.push(s.frameCount));
    store.getState().recordFrame(tracked, 1, "cat", 0);
    store.getState().recordFrame(held, 0, null, 10);
    unsubscribe();
    expect(frames).toEqual([1, 2]);
  });
});
