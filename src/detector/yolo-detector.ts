import * as ort from "onnxruntime-web";
import type { Detection } from "../types/index";
import { YOLO_INPUT_SIZE } from "../lib/constants";
import { decodeOutput, letterboxFrame } from "../lib/yolo";
import type { DecodeOptions, RgbaFrame } from "../lib/yolo";

export interface Detector {
  detect(frame: RgbaFrame): Promise<Detection[]>;
  close(): Promise<void>;
}

/** The slice of an onnxruntime InferenceSession the detector uses. */
export interface InferenceRunner {
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
  run(feeds: Record<string, ort.Tensor>): Promise<Record<string, { data: unknown }>>;
  release(): Promise<void>;
}

/** YOLOv8 ONNX model run through onnxruntime's wasm backend. */
export class YoloDetector implements Detector {
  constructor(
    private session: InferenceRunner,
    private options: DecodeOptions = {}
  ) {}

  static async load(modelPath: string, options: DecodeOptions = {}): Promise<YoloDetector> {
    try {
      const session = await ort.InferenceSession.create(modelPath, {
        executionProviders: ["wasm"],
      });
      return new YoloDetector(session, options);
    } catch (err) {
      throw new Error(
        `Failed to load YOLO model ${modelPath}: ${
          err instanceof Error ? err.message : String(err)
        }`
      );
    }
  }

  async detect(frame: RgbaFrame): Promise<Detection[]> {
    const { tensor, letterbox } = letterboxFrame(frame);
    const session = this.session;

    const inputName = session.inputNames[0];
    const feeds: Record<string, ort.Tensor> = {
      [inputName]: new ort.Tensor("float32", tensor, [1, 3, YOLO_INPUT_SIZE, YOLO_INPUT_SIZE]),
    };

    const results = await session.run(feeds);
    const output = results[session.outputNames[0]];
    if (!output || !(output.data instanceof Float32Array)) {
      throw new Error("YOLO model returned a non-float32 output tensor");
    }

    return decodeOutput(output.data, letterbox, this.options);
  }

  async close(): Promise<void> {
    await this.session.release();
  }
}
