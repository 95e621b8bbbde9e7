export type Handedness = "Left" | "Right";

export interface Landmark {
  x: number;
  y: number;
  z?: number;
}

export interface Point2D {
  x: number;
  y: number;
}

export interface TrackedHand {
  handedness: Handedness;
  landmarks: Landmark[];
  /** Detector confidence in [0, 1], when the model reports one. */
  score?: number;
}

export interface HandFrame {
  hands: TrackedHand[];
  timestamp: number;
}

/**
 * Produces one frame per call. `undefined` means the stream has ended; a
 * frame with no hands means nothing was detected.
 */
export interface LandmarkSource {
  read(): Promise<HandFrame | undefined>;
}

export type PoseKind = "POINTING" | "OTHER" | "NO_HAND";

export type PoseClassification =
  | { kind: "POINTING"; fingertip: Point2D }
  | { kind: "OTHER" }
  | { kind: "NO_HAND" };

export type FingerName = "index" | "middle" | "ring" | "pinky";

export interface GestureClassifierOptions {
  /** Fraction of palm size by which a tip must clear its PIP joint to count as extended. */
  extensionMargin?: number;
  minHandScore?: number;
  project?: (fingertip: Landmark) => Point2D;
}

export interface DisplaySize {
  width: number;
  height: number;
}
