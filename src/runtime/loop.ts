import type { TrackerConfig } from "../types/index";
import type { Actuator } from "../lib/actuator";
import type { DetectionSource } from "../capture/source";
import { TrackingController } from "../lib/controller";
import { createTelemetryStore, snapshotOf } from "../store/telemetry";
import type { TelemetryStore } from "../store/telemetry";
import type { StatusReporter } from "./status";

export interface RunOptions {
  config: TrackerConfig;
  actuator: Actuator;
  source: DetectionSource;
  labels?: readonly string[];
  store?: TelemetryStore;
  reporter?: StatusReporter;
  signal?: AbortSignal;
  now?: () => number;
}

export interface RunSummary {
  frames: number;
  stoppedBy: "end-of-stream" | "abort";
}

/** Settle with null as soon as the signal aborts; otherwise follow `p`. */
function untilAborted<T>(p: Promise<T>, signal?: AbortSignal): Promise<T | null> {
  if (!signal) return p;
  return new Promise<T | null>((resolve, reject) => {
    if (signal.aborted) {
      resolve(null);
      return;
    }
    const onAbort = () => resolve(null);
    signal.addEventListener("abort", onAbort, { once: true });
    p.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Drive the tracker one frame at a time until the source runs dry or the
 * signal aborts. Whatever happens, including a throwing actuator, source or
 * detector, both axes are re-centered and then the source is closed before
 * this returns or rethrows. When the run itself failed, that error is the one
 * rethrown even if cleanup fails too.
 */
export async function runTracker(options: RunOptions): Promise<RunSummary> {
  const { config, actuator, source, labels = [], reporter, signal } = options;
  const store = options.store ?? createTelemetryStore();
  const now = options.now ?? Date.now;
  const controller = new TrackingController(config, actuator);
  let frames = 0;
  let failed = false;

  try {
    controller.start();
    store.getState().setHome(config.pan.center, config.tilt.center);

    while (!signal?.aborted) {
      const frame = await untilAborted(source.next(), signal);
      if (signal?.aborted) break;
      if (!frame) return { frames, stoppedBy: "end-of-stream" };

      const outcome = controller.update(frame);
      frames++;

      const label = outcome.target
        ? labels[outcome.target.classId] ?? `class ${outcome.target.classId}`
        : null;
      const t = now();
      store.getState().recordFrame(outcome, frame.detections.length, label, t);
      reporter?.report(snapshotOf(store.getState()), t);
    }

    return { frames, stoppedBy: "abort" };
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    const cleanupErrors: unknown[] = [];
    try {
      controller.shutdown();
    } catch (err) {
      cleanupErrors.push(err);
    }
    try {
      await source.close();
    } catch (err) {
      cleanupErrors.push(err);
    }

    if (cleanupErrors.length > 0) {
      // The run's own error wins; cleanup failures behind it are only logged.
      if (!failed) throw cleanupErrors[0];
      for (const err of cleanupErrors) {
        console.error("Cleanup failed:", err instanceof Error ? err.message : String(err));
      }
    }
  }
}
