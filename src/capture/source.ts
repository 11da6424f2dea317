import type { FrameDetections } from "../types/index";

/** Yields one frame's detections at a time; null once the stream is over. */
export interface DetectionSource {
  next(): Promise<FrameDetections | null>;
  close(): Promise<void>;
}
