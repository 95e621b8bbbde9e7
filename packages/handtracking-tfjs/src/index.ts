import type { Hand, HandDetector } from "@tensorflow-models/hand-pose-detection";
import type { Tensor3D } from "@tensorflow/tfjs-core";
import type { Handedness, HandFrame, LandmarkSource, TrackedHand } from "@touchless-calc/gesture-core";

export interface HandModel<TImage = Tensor3D> {
  estimateHands(image: TImage): Promise<TrackedHand[]>;
}

/** The part of a hand-pose-detection detector the model relies on. */
export type HandDetectorLike = Pick<HandDetector, "estimateHands">;

export interface TFJSHandModelOptions {
  modelType?: "lite" | "full";
  maxHands?: number;
  detectorModelUrl?: string;
  landmarkModelUrl?: string;
  flipHorizontal?: boolean;
  /** Replaces the MediaPipe Hands detector, e.g. with a fake in tests. */
  detectorFactory?: () => Promise<HandDetectorLike>;
}

export type DetectionLike = Pick<Hand, "keypoints"> & {
  handedness?: string;
  score?: number;
};

let tfBackendReady: Promise<void> | null = null;

async function loadMediaPipeHandsDetector(options: TFJSHandModelOptions): Promise<HandDetectorLike> {
  await ensureTfjsBackend();
  const handPoseDetection = await import("@tensorflow-models/hand-pose-detection");
  const { SupportedModels } = handPoseDetection;
  return handPoseDetection.createDetector(SupportedModels.MediaPipeHands, {
    runtime: "tfjs",
    modelType: options.modelType ?? "full",
    maxHands: options.maxHands ?? 1,
    detectorModelUrl: options.detectorModelUrl,
    landmarkModelUrl: options.landmarkModelUrl,
  });
}

class TFJSHandModel implements HandModel {
  private detector: Promise<HandDetectorLike> | null = null;

  constructor(private readonly options: TFJSHandModelOptions = {}) {}

  async estimateHands(image: Tensor3D): Promise<TrackedHand[]> {
    const [height, width] = image.shape;
    if (!width || !height) {
      return [];
    }
    try {
      const detector = await this.loadDetector();
      const predictions = await detector.estimateHands(image, {
        flipHorizontal: Boolean(this.options.flipHorizontal),
      });
      return mapDetectionsToTrackedHands(predictions, { width, height });
    } catch (err) {
      console.error("handtracking-tfjs estimateHands failed", err);
      // Drop the cached detector so the next frame re-creates it.
      this.detector = null;
      return [];
    }
  }

  private loadDetector(): Promise<HandDetectorLike> {
    if (!this.detector) {
      const factory = this.options.detectorFactory ?? (() => loadMediaPipeHandsDetector(this.options));
      this.detector = factory();
    }
    return this.detector;
  }
}

export function mapDetectionsToTrackedHands(
  detections: DetectionLike[],
  frameSize: { width: number; height: number }
): TrackedHand[] {
  const width = frameSize.width || 1;
  const height = frameSize.height || 1;

  return detections.map((detection) => {
    const landmarks = detection.keypoints.map((kp) => {
      // NaN passes through so the classifier can reject the hand.
      const isNormalized = kp.x >= 0 && kp.x <= 1 && kp.y >= 0 && kp.y <= 1;
      const x = isNormalized ? kp.x : kp.x / width;
      const y = isNormalized ? kp.y : kp.y / height;
      return kp.z === undefined ? { x, y } : { x, y, z: kp.z };
    });
    const hand: TrackedHand = { handedness: toHandedness(detection.handedness), landmarks };
    if (detection.score !== undefined) hand.score = detection.score;
    return hand;
  });
}

function toHandedness(label: string | undefined): Handedness {
  return label === "Left" ? "Left" : "Right";
}

async function ensureTfjsBackend(): Promise<void> {
  if (tfBackendReady) return tfBackendReady;
  tfBackendReady = (async () => {
    const tf = await import("@tensorflow/tfjs-core");
    await import("@tensorflow/tfjs-backend-cpu");
    if (tf.getBackend() !== "cpu") {
      await tf.setBackend("cpu");
    }
    await tf.ready();
  })();
  return tfBackendReady;
}

export async function createTFJSHandModel(options?: TFJSHandModelOptions): Promise<HandModel> {
  return new TFJSHandModel(options);
}

/**
 * Runs each image from `images` through `model`, stamping frames with
 * `clock()`. The source ends when the image stream does.
 */
export function createHandModelSource<TImage>(
  model: HandModel<TImage>,
  images: AsyncIterable<TImage>,
  clock: () => number = () => performance.now()
): LandmarkSource {
  const iterator = images[Symbol.asyncIterator]();
  return {
    async read(): Promise<HandFrame | undefined> {
      const next = await iterator.next();
      if (next.done) return undefined;
      const hands = await model.estimateHands(next.value);
      return { hands, timestamp: clock() };
    },
  };
}

// For environments without a camera or model.
export class StubHandModel<TImage = Tensor3D> implements HandModel<TImage> {
  async estimateHands(_image: TImage): Promise<TrackedHand[]> {
    return [];
  }
}
