import { parseArgs } from "node:util";
import { EchoActuator, MemoryActuator } from "./lib/actuator";
import type { Actuator } from "./lib/actuator";
import { buildConfig, resolveClassIds } from "./lib/config";
import {
  DEFAULT_TRACK_CLASSES,
  FRAME_HEIGHT,
  FRAME_WIDTH,
  PAN_JOINT,
  TILT_JOINT,
  YOLO_CONFIDENCE_THRESHOLD,
  YOLO_MODEL_PATH,
} from "./lib/constants";
import { COCO_CLASSES } from "./lib/yolo";
import { RawFrameReader } from "./capture/raw-frames";
import { ReplayDetectionSource } from "./capture/replay";
import type { DetectionSource } from "./capture/source";
import { YoloDetectionSource } from "./capture/yolo-source";
import { YoloDetector } from "./detector/yolo-detector";
import { runTracker } from "./runtime/loop";
import { StatusReporter } from "./runtime/status";

const USAGE = `Usage: cat-tracker [options]

Frames come from --replay <file> (recorded detections, one JSON frame per
line) or raw RGBA video on stdin, e.g.
  ffmpeg -i /dev/video0 -f rawvideo -pix_fmt rgba -s 640x480 - | cat-tracker

  --track <names>        classes to track (default: ${DEFAULT_TRACK_CLASSES.join(",")})
  --list-classes         print the detector's classes and exit
  --gain <n>             tracking gain for both axes
  --invert-pan           reverse pan direction
  --invert-tilt          reverse tilt direction
  --min-width <px>       ignore narrower boxes
  --min-height <px>      ignore shorter boxes
  --miss-threshold <n>   frames without a target before scanning
  --scan-step <deg>      pan degrees per scanning frame
  --model <path>         YOLO ONNX model (default: ${YOLO_MODEL_PATH})
  --conf <0-1>           detection confidence threshold
  --width <px>           stdin frame width (default: ${FRAME_WIDTH})
  --height <px>          stdin frame height (default: ${FRAME_HEIGHT})
  --replay <file>        replay recorded detections instead of running the model
  --echo-servo           print every servo command
  --debug                print detections and angles every 20 frames
  --help`;

function numberOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new Error(`--${name} expects a number (got "${raw}")`);
  return value;
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      track: { type: "string" },
      "list-classes": { type: "boolean", default: false },
      gain: { type: "string" },
      "invert-pan": { type: "boolean", default: false },
      "invert-tilt": { type: "boolean", default: false },
      "min-width": { type: "string" },
      "min-height": { type: "string" },
      "miss-threshold": { type: "string" },
      "scan-step": { type: "string" },
      model: { type: "string", default: YOLO_MODEL_PATH },
      conf: { type: "string" },
      width: { type: "string" },
      height: { type: "string" },
      replay: { type: "string" },
      "echo-servo": { type: "boolean", default: false },
      debug: { type: "boolean", default: false },
      help: { type: "boolean", default: false },
    },
    strict: true,
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const trackNames = values.track
    ? values.track.split(",").map((s) => s.trim()).filter(Boolean)
    : DEFAULT_TRACK_CLASSES;
  const classIds = resolveClassIds(trackNames, COCO_CLASSES);

  if (values["list-classes"]) {
    console.log("Classes:");
    COCO_CLASSES.forEach((name, idx) => console.log(`  ${idx}: ${name}`));
    console.log("");
    console.log(`Requested --track: ${trackNames.join(", ")}`);
    if (classIds.length > 0) {
      console.log(
        `Resolved to class IDs: ${classIds.map((i) => `${COCO_CLASSES[i]} (id ${i})`).join(", ")}`
      );
    } else {
      console.log("WARNING: none of those names match the detector's classes.");
    }
    return;
  }

  if (classIds.length === 0) {
    throw new Error(
      `No valid track classes in "${trackNames.join(",")}". Run with --list-classes to see the detector's classes.`
    );
  }

  const config = buildConfig({
    gain: numberOption("gain", values.gain),
    pan: { invert: values["invert-pan"] },
    tilt: { invert: values["invert-tilt"] },
    allowedClassIds: classIds,
    minWidth: numberOption("min-width", values["min-width"]),
    minHeight: numberOption("min-height", values["min-height"]),
    missThreshold: numberOption("miss-threshold", values["miss-threshold"]),
    scanStepDegrees: numberOption("scan-step", values["scan-step"]),
  });

  const actuator: Actuator = values["echo-servo"]
    ? new EchoActuator({ [PAN_JOINT]: "pan", [TILT_JOINT]: "tilt" })
    : new MemoryActuator();

  let source: DetectionSource;
  let sourceLabel: string;
  if (values.replay) {
    source = ReplayDetectionSource.fromFile(values.replay);
    sourceLabel = `replay ${values.replay}`;
  } else {
    const width = numberOption("width", values.width) ?? FRAME_WIDTH;
    const height = numberOption("height", values.height) ?? FRAME_HEIGHT;
    const detector = await YoloDetector.load(values.model, {
      confidenceThreshold: numberOption("conf", values.conf) ?? YOLO_CONFIDENCE_THRESHOLD,
      classIds: new Set(classIds),
    });
    source = new YoloDetectionSource(new RawFrameReader(process.stdin, width, height), detector);
    sourceLabel = `stdin ${width}x${height}, model ${values.model}`;
  }

  console.log(
    `Tracking class IDs: ${classIds.map((i) => `${COCO_CLASSES[i]} (id ${i})`).join(", ")}`
  );
  console.log(`Servo: ${values["echo-servo"] ? "echo" : "memory"} | Source: ${sourceLabel}`);
  console.log("Ctrl+C to stop.");

  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  try {
    const summary = await runTracker({
      config,
      actuator,
      source,
      labels: COCO_CLASSES,
      reporter: new StatusReporter({ debug: values.debug }),
      signal: controller.signal,
    });
    console.log(`Stopped (${summary.stoppedBy}) after ${summary.frames} frames. Centered.`);
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
