import type { TelemetrySnapshot } from "../store/telemetry";
import { DEBUG_EVERY_FRAMES, STATUS_INTERVAL_MS } from "../lib/constants";

export function formatStatus(s: TelemetrySnapshot): string {
  return `FPS: ${s.fps} | Target: ${s.targetLabel ?? "scanning"} | pan=${s.pan} tilt=${s.tilt}`;
}

export function formatDebug(s: TelemetrySnapshot): string {
  return `DEBUG: detections=${s.detectionCount} target=${s.targetLabel ?? "none"} pan=${s.pan} tilt=${s.tilt}`;
}

export interface StatusReporterOptions {
  intervalMs?: number;
  debug?: boolean;
  debugEvery?: number;
  log?: (line: string) => void;
}

/**
 * Headless status output: a status line at most every intervalMs (and for
 * the first two frames, which can be slow while the model warms up), plus a
 * debug line every debugEvery frames when enabled.
 */
export class StatusReporter {
  private lastPrint = Number.NEGATIVE_INFINITY;
  private intervalMs: number;
  private debug: boolean;
  private debugEvery: number;
  private log: (line: string) => void;

  constructor(options: StatusReporterOptions = {}) {
    this.intervalMs = options.intervalMs ?? STATUS_INTERVAL_MS;
    this.debug = options.debug ?? false;
    this.debugEvery = options.debugEvery ?? DEBUG_EVERY_FRAMES;
    this.log = options.log ?? console.log;
  }

  report(snapshot: TelemetrySnapshot, now: number): void {
    if (this.debug && snapshot.frameCount % this.debugEvery === 0) {
      this.log(formatDebug(snapshot));
    }
    if (snapshot.frameCount <= 2 || now - this.lastPrint >= this.intervalMs) {
      this.lastPrint = now;
      this.log(formatStatus(snapshot));
    }
  }
}
