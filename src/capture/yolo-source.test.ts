import { describe, it, expect } from "vitest";
import { Readable } from "node:stream";
import { RawFrameReader } from "./raw-frames";
import { YoloDetectionSource } from "./yolo-source";
import type { Detector } from "../detector/yolo-detector";
import type { Detection } from "../types/index";
import type { RgbaFrame } from "../lib/yolo";

class FakeDetector implements Detector {
  seen: RgbaFrame[] = [];
  closed = false;

  async detect(frame: RgbaFrame): Promise<Detection[]> {
    this.seen.push(frame);
    return [{ classId: 15, bbox: { x1: 0, y1: 0, x2: 1, y2: 1 }, confidence: 0.9 }];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

describe("YoloDetectionSource", () => {
  it("runs each frame through the detector and reports its size", async () => {
    const detector = new FakeDetector();
    const frames = new RawFrameReader(Readable.from([Buffer.alloc(2 * 1 * 4 * 2)]), 2, 1);
    const source = new YoloDetectionSource(frames, detector);

    const first = await source.next();
    await source.next();

    expect(first).toEqual({
      width: 2,
      height: 1,
      detections: [{ classId: 15, bbox: { x1: 0, y1: 0, x2: 1, y2: 1 }, confidence: 0.9 }],
    });
    expect(detector.seen).toHaveLength(2);
    expect(await source.next()).toBeNull();
  });

  it("closes the detector along with the frame stream", async () => {
    const detector = new FakeDetector();
    const source = new YoloDetectionSource(new RawFrameReader(Readable.from([]), 2, 2), detector);
    await source.close();
    expect(detector.closed).toBe(true);
  });
});
