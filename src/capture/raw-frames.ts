import type { Readable } from "node:stream";
import type { RgbaFrame } from "../lib/yolo";

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  if (typeof chunk === "string") return Buffer.from(chunk, "binary");
  throw new TypeError(`Unexpected chunk type from frame stream: ${typeof chunk}`);
}

/**
 * Splits a byte stream of raw RGBA video (e.g. `ffmpeg -f rawvideo
 * -pix_fmt rgba -`) into fixed-size frames. A trailing partial frame at end
 * of stream is dropped.
 */
export class RawFrameReader {
  private iterator: AsyncIterator<unknown>;
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private ended = false;

  constructor(
    private stream: Readable,
    readonly width: number,
    readonly height: number
  ) {
    if (!(width > 0 && height > 0)) {
      throw new RangeError(`Frame size must be positive (got ${width}x${height})`);
    }
    this.iterator = stream[Symbol.asyncIterator]();
  }

  get frameSize(): number {
    return this.width * this.height * 4;
  }

  async read(): Promise<RgbaFrame | null> {
    const frameSize = this.frameSize;

    while (this.pendingBytes < frameSize) {
      if (this.ended) return null;
      const { value, done } = await this.iterator.next();
      if (done) {
        this.ended = true;
        return null;
      }
      const chunk = toBuffer(value);
      this.pending.push(chunk);
      this.pendingBytes += chunk.length;
    }

    const all = Buffer.concat(this.pending, this.pendingBytes);
    const rest = all.subarray(frameSize);
    this.pending = rest.length > 0 ? [rest] : [];
    this.pendingBytes = rest.length;

    return {
      width: this.width,
      height: this.height,
      data: new Uint8Array(all.subarray(0, frameSize)),
    };
  }

  close(): void {
    this.stream.destroy();
  }
}
