import type { FrameDetections } from "../types/index";
import type { Detector } from "../detector/yolo-detector";
import type { DetectionSource } from "./source";
import type { RawFrameReader } from "./raw-frames";

/** Live frames run through the detector, one at a time. */
export class YoloDetectionSource implements DetectionSource {
  constructor(
    private frames: RawFrameReader,
    private detector: Detector
  ) {}

  async next(): Promise<FrameDetections | null> {
    const frame = await this.frames.read();
    if (!frame) return null;
    const detections = await this.detector.detect(frame);
    return { width: frame.width, height: frame.height, detections };
  }

  async close(): Promise<void> {
    this.frames.close();
    await this.detector.close();
  }
}
