import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import type { Interface } from "node:readline";
import type { Readable } from "node:stream";
import type { BoundingBox, Detection, FrameDetections } from "../types/index";
import type { DetectionSource } from "./source";

export class ReplayFormatError extends Error {
  constructor(readonly lineNumber: number, reason: string) {
    super(`Replay line ${lineNumber}: ${reason}`);
    this.name = "ReplayFormatError";
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isFiniteNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

function parseBox(v: unknown): BoundingBox | null {
  if (!Array.isArray(v) || v.length !== 4) return null;
  const [x1, y1, x2, y2]: unknown[] = v;
  if (!isFiniteNumber(x1) || !isFiniteNumber(y1) || !isFiniteNumber(x2) || !isFiniteNumber(y2)) {
    return null;
  }
  if (x2 <= x1 || y2 <= y1) return null;
  return { x1, y1, x2, y2 };
}

function parseDetection(v: unknown): Detection | null {
  if (!isRecord(v)) return null;
  const { classId, confidence } = v;
  if (!Number.isInteger(classId) || !isFiniteNumber(classId)) return null;
  if (!isFiniteNumber(confidence) || confidence < 0 || confidence > 1) return null;
  const bbox = parseBox(v.bbox);
  if (!bbox) return null;
  return { classId, bbox, confidence };
}

/**
 * Parse one recorded frame:
 * `{"width":640,"height":480,"detections":[{"classId":15,"bbox":[x1,y1,x2,y2],"confidence":0.9}]}`
 */
export function parseReplayLine(line: string, lineNumber: number): FrameDetections {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new ReplayFormatError(lineNumber, err instanceof Error ? err.message : String(err));
  }
  if (!isRecord(raw)) throw new ReplayFormatError(lineNumber, "expected an object");

  const { width, height, detections } = raw;
  if (!isFiniteNumber(width) || width <= 0 || !isFiniteNumber(height) || height <= 0) {
    throw new ReplayFormatError(lineNumber, "width and height must be positive numbers");
  }
  if (!Array.isArray(detections)) {
    throw new ReplayFormatError(lineNumber, "detections must be an array");
  }

  const parsed: Detection[] = [];
  detections.forEach((d: unknown, i) => {
    const det = parseDetection(d);
    if (!det) throw new ReplayFormatError(lineNumber, `detection ${i} is malformed`);
    parsed.push(det);
  });

  return { width, height, detections: parsed };
}

/** Replays recorded detections, one JSON frame per line. */
export class ReplayDetectionSource implements DetectionSource {
  private lines: Interface;
  private iterator: AsyncIterator<string>;
  private lineNumber = 0;

  constructor(private input: Readable) {
    this.lines = createInterface({ input, crlfDelay: Infinity });
    this.iterator = this.lines[Symbol.asyncIterator]();
  }

  static fromFile(path: string): ReplayDetectionSource {
    return new ReplayDetectionSource(createReadStream(path, { encoding: "utf8" }));
  }

  async next(): Promise<FrameDetections | null> {
    for (;;) {
      const { value, done } = await this.iterator.next();
      if (done) return null;
      this.lineNumber++;
      if (value.trim() === "") continue;
      return parseReplayLine(value, this.lineNumber);
    }
  }

  async close(): Promise<void> {
    this.lines.close();
    this.input.destroy();
  }
}
