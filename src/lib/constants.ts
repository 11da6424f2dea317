// lib/constants.ts

export const PAN_JOINT = 0;   // pan-tilt bracket: 0=pan, 1=tilt
export const TILT_JOINT = 1;
export const PAN_CENTER = 90;
export const TILT_CENTER = 90;
export const PAN_RANGE = [30, 150] as const;   // min/max pan angle
export const TILT_RANGE = [50, 130] as const;  // min/max tilt angle
export const GAIN = 0.55;          // 0.2 = slow, 0.8 = fast
export const DEADZONE = 0.05;      // fraction of half-frame ignored as noise
export const SCAN_STEP_DEGREES = 2.0;  // pan degrees per frame while scanning
export const MISS_THRESHOLD = 10;  // frames without a target before scanning
export const MIN_TRACK_WIDTH = 0;  // px; 0 = any size
export const MIN_TRACK_HEIGHT = 0;
export const DEFAULT_TRACK_CLASSES = ["cat", "person"];

export const ACTUATOR_MIN_ANGLE = 0;
export const ACTUATOR_MAX_ANGLE = 180;
export const ACTUATOR_DEFAULT_ANGLE = 90;

export const YOLO_CONFIDENCE_THRESHOLD = 0.35;
export const YOLO_IOU_THRESHOLD = 0.3;
export const YOLO_MAX_DETECTIONS = 10;
export const YOLO_INPUT_SIZE = 640;
export const YOLO_PAD_VALUE = 114;  // YOLOv8 standard letterbox gray
export const YOLO_MODEL_PATH = "models/yolov8n.onnx";

export const FRAME_WIDTH = 640;
export const FRAME_HEIGHT = 480;

export const STATUS_INTERVAL_MS = 2000;  // headless status line
export const DEBUG_EVERY_FRAMES = 20;
