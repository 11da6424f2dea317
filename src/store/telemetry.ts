import { createStore } from "zustand/vanilla";
import type { FrameOutcome, TrackerMode } from "../types/index";

export interface TelemetrySnapshot {
  mode: TrackerMode;
  pan: number;
  tilt: number;
  targetLabel: string | null;
  detectionCount: number;
  frameCount: number;
  framesSinceTarget: number;
  fps: number;
}

export interface TelemetryState extends TelemetrySnapshot {
  recordFrame: (
    outcome: FrameOutcome,
    detectionCount: number,
    targetLabel: string | null,
    now: number
  ) => void;
  setHome: (pan: number, tilt: number) => void;
  // fps bookkeeping
  fpsWindowStart: number;
  fpsWindowFrames: number;
}

export type TelemetryStore = ReturnType<typeof createTelemetryStore>;

export function createTelemetryStore() {
  return createStore<TelemetryState>((set) => ({
    mode: "tracking",
    pan: 0,
    tilt: 0,
    targetLabel: null,
    detectionCount: 0,
    frameCount: 0,
    framesSinceTarget: 0,
    fps: 0,
    fpsWindowStart: 0,
    fpsWindowFrames: 0,

    setHome: (pan, tilt) => set({ pan, tilt }),

    recordFrame: (outcome, detectionCount, targetLabel, now) =>
      set((state) => {
        // Frames counted over rolling one-second windows
        let { fps, fpsWindowStart, fpsWindowFrames } = state;
        if (state.frameCount === 0) fpsWindowStart = now;
        fpsWindowFrames += 1;
        if (now - fpsWindowStart >= 1000) {
          fps = fpsWindowFrames;
          fpsWindowFrames = 0;
          fpsWindowStart = now;
        }

        return {
          mode: outcome.mode,
          // Held axes keep the last commanded angles
          pan: outcome.commanded?.pan ?? state.pan,
          tilt: outcome.commanded?.tilt ?? state.tilt,
          targetLabel,
          detectionCount,
          frameCount: state.frameCount + 1,
          framesSinceTarget: outcome.framesSinceTarget,
          fps,
          fpsWindowStart,
          fpsWindowFrames,
        };
      }),
  }));
}

export function snapshotOf(state: TelemetrySnapshot): TelemetrySnapshot {
  const { mode, pan, tilt, targetLabel, detectionCount, frameCount, framesSinceTarget, fps } =
    state;
  return { mode, pan, tilt, targetLabel, detectionCount, frameCount, framesSinceTarget, fps };
}
