import type { BoundingBox, Detection } from "../types/index";
import {
  YOLO_CONFIDENCE_THRESHOLD,
  YOLO_INPUT_SIZE,
  YOLO_IOU_THRESHOLD,
  YOLO_MAX_DETECTIONS,
  YOLO_PAD_VALUE,
} from "./constants";
import cocoClasses from "./coco-classes.json";

export const COCO_CLASSES: readonly string[] = cocoClasses;

/** Raw RGBA pixels, row-major, 4 bytes per pixel. */
export interface RgbaFrame {
  width: number;
  height: number;
  data: Uint8Array | Uint8ClampedArray;
}

export interface LetterboxInfo {
  padX: number;
  padY: number;
  scale: number;
  /** Original frame size, used to clip decoded boxes. */
  width: number;
  height: number;
}

export interface PreprocessResult {
  tensor: Float32Array;
  letterbox: LetterboxInfo;
}

export interface DecodeOptions {
  numClasses?: number;
  confidenceThreshold?: number;
  iouThreshold?: number;
  maxDetections?: number;
  /** When set, anchors whose best class is outside the set are dropped. */
  classIds?: ReadonlySet<number>;
}

/**
 * Letterbox an RGBA frame into size×size (aspect preserved, gray padding,
 * nearest-neighbour sampling), normalize to [0,1], and lay out as NCHW.
 * Returns a [1, 3, size, size] tensor plus the metadata decodeOutput needs
 * to map boxes back into frame coordinates.
 */
export function letterboxFrame(frame: RgbaFrame, size = YOLO_INPUT_SIZE): PreprocessResult {
  const { width: origW, height: origH, data } = frame;

  const scale = Math.min(size / origW, size / origH);
  const scaledW = Math.round(origW * scale);
  const scaledH = Math.round(origH * scale);
  const padX = Math.round((size - scaledW) / 2);
  const padY = Math.round((size - scaledH) / 2);

  const numPixels = size * size;
  const tensor = new Float32Array(3 * numPixels).fill(YOLO_PAD_VALUE / 255.0);

  for (let y = 0; y < scaledH; y++) {
    const srcY = Math.min(origH - 1, Math.floor(y / scale));
    for (let x = 0; x < scaledW; x++) {
      const srcX = Math.min(origW - 1, Math.floor(x / scale));
      const src = (srcY * origW + srcX) * 4;
      const dst = (y + padY) * size + (x + padX);
      tensor[dst] = data[src] / 255.0;                     // R
      tensor[numPixels + dst] = data[src + 1] / 255.0;     // G
      tensor[2 * numPixels + dst] = data[src + 2] / 255.0; // B
    }
  }

  return { tensor, letterbox: { padX, padY, scale, width: origW, height: origH } };
}

/**
 * Decode a YOLOv8-style output [1, 4 + numClasses, numAnchors] into
 * detections in original frame coordinates, with per-class NMS.
 */
export function decodeOutput(
  output: Float32Array,
  letterbox: LetterboxInfo,
  options: DecodeOptions = {}
): Detection[] {
  const numClasses = options.numClasses ?? COCO_CLASSES.length;
  const threshold = options.confidenceThreshold ?? YOLO_CONFIDENCE_THRESHOLD;
  const numAnchors = Math.floor(output.length / (4 + numClasses));
  const { padX, padY, scale, width, height } = letterbox;

  const candidates: Detection[] = [];

  for (let a = 0; a < numAnchors; a++) {
    let maxScore = 0;
    let maxClass = 0;
    for (let c = 0; c < numClasses; c++) {
      const score = output[(4 + c) * numAnchors + a];
      if (score > maxScore) {
        maxScore = score;
        maxClass = c;
      }
    }

    if (maxScore <= threshold) continue;
    if (options.classIds && !options.classIds.has(maxClass)) continue;

    // cx, cy, bw, bh in letterboxed space
    const cx = output[0 * numAnchors + a];
    const cy = output[1 * numAnchors + a];
    const bw = output[2 * numAnchors + a];
    const bh = output[3 * numAnchors + a];

    const bbox: BoundingBox = {
      x1: clip((cx - bw / 2 - padX) / scale, width),
      y1: clip((cy - bh / 2 - padY) / scale, height),
      x2: clip((cx + bw / 2 - padX) / scale, width),
      y2: clip((cy + bh / 2 - padY) / scale, height),
    };
    if (bbox.x2 <= bbox.x1 || bbox.y2 <= bbox.y1) continue;

    candidates.push({ classId: maxClass, bbox, confidence: maxScore });
  }

  return nms(
    candidates,
    options.iouThreshold ?? YOLO_IOU_THRESHOLD,
    options.maxDetections ?? YOLO_MAX_DETECTIONS
  );
}

function clip(v: number, limit: number): number {
  return Math.max(0, Math.min(limit, v));
}

export function iou(a: BoundingBox, b: BoundingBox): number {
  const interW = Math.max(0, Math.min(a.x2, b.x2) - Math.max(a.x1, b.x1));
  const interH = Math.max(0, Math.min(a.y2, b.y2) - Math.max(a.y1, b.y1));
  const inter = interW * interH;
  if (inter === 0) return 0;

  const union =
    (a.x2 - a.x1) * (a.y2 - a.y1) + (b.x2 - b.x1) * (b.y2 - b.y1) - inter;
  return union <= 0 ? 0 : inter / union;
}

function nms(detections: Detection[], iouThreshold: number, maxDetections: number): Detection[] {
  const sorted = [...detections].sort((a, b) => b.confidence - a.confidence);
  const kept: Detection[] = [];

  for (const det of sorted) {
    if (kept.length >= maxDetections) break;
    const overlaps = kept.some(
      (k) => k.classId === det.classId && iou(k.bbox, det.bbox) > iouThreshold
    );
    if (!overlaps) kept.push(det);
  }

  return kept;
}
