import type {
  FingerName,
  GestureClassifierOptions,
  HandFrame,
  Landmark,
  PoseClassification,
  TrackedHand,
} from "./types";

const DEFAULTS: Required<GestureClassifierOptions> = {
  extensionMargin: 0.1,
  minHandScore: 0,
  project: (fingertip) => ({ x: fingertip.x, y: fingertip.y }),
};

export const HAND_LANDMARK_COUNT = 21;

const WRIST = 0;
const MIDDLE_MCP = 9;
const INDEX_TIP = 8;

// [pip, tip] per finger, MediaPipe hand topology
const FINGER_JOINTS: Record<FingerName, [number, number]> = {
  index: [6, 8],
  middle: [10, 12],
  ring: [14, 16],
  pinky: [18, 20],
};

const NO_HAND: PoseClassification = { kind: "NO_HAND" };
const OTHER: PoseClassification = { kind: "OTHER" };

export class GestureClassifier {
  private readonly options: Required<GestureClassifierOptions>;

  constructor(opts?: GestureClassifierOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  classifyFrame(frame: HandFrame | null | undefined): PoseClassification {
    return this.classify(frame?.hands[0]);
  }

  classify(hand: TrackedHand | null | undefined): PoseClassification {
    if (!hand || !isUsable(hand.landmarks)) return NO_HAND;
    if (hand.score !== undefined && !(hand.score >= this.options.minHandScore)) return NO_HAND;

    const { landmarks } = hand;
    const palmSize = distance2D(landmarks[WRIST], landmarks[MIDDLE_MCP]);
    if (!(palmSize > 0)) return NO_HAND;

    const extended = (finger: FingerName) => this.isExtended(landmarks, finger, palmSize);
    if (extended("index") && !extended("middle") && !extended("ring") && !extended("pinky")) {
      return { kind: "POINTING", fingertip: this.options.project(landmarks[INDEX_TIP]) };
    }
    return OTHER;
  }

  /** Per-finger extension flags, useful for overlays and debugging. */
  fingerStates(hand: TrackedHand): Record<FingerName, boolean> | null {
    if (!isUsable(hand.landmarks)) return null;
    const palmSize = distance2D(hand.landmarks[WRIST], hand.landmarks[MIDDLE_MCP]);
    if (!(palmSize > 0)) return null;
    return {
      index: this.isExtended(hand.landmarks, "index", palmSize),
      middle: this.isExtended(hand.landmarks, "middle", palmSize),
      ring: this.isExtended(hand.landmarks, "ring", palmSize),
      pinky: this.isExtended(hand.landmarks, "pinky", palmSize),
    };
  }

  private isExtended(landmarks: Landmark[], finger: FingerName, palmSize: number): boolean {
    const [pip, tip] = FINGER_JOINTS[finger];
    const wrist = landmarks[WRIST];
    const reach = distance2D(landmarks[tip], wrist) - distance2D(landmarks[pip], wrist);
    return reach > this.options.extensionMargin * palmSize;
  }
}

export { DEFAULTS as defaultGestureClassifierOptions };

function isUsable(landmarks: Landmark[] | undefined): landmarks is Landmark[] {
  if (!landmarks || landmarks.length < HAND_LANDMARK_COUNT) return false;
  for (let i = 0; i < HAND_LANDMARK_COUNT; i++) {
    const point = landmarks[i];
    if (!point || !Number.isFinite(point.x) || !Number.isFinite(point.y)) return false;
  }
  return true;
}

export function distance2D(a: Landmark, b: Landmark): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}
