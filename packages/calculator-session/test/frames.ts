import type { HandFrame, Landmark, LandmarkSource, TrackedHand } from "@touchless-calc/gesture-core";

// Index tip first; the rest of an upright right hand relative to it.
const POINTING: Array<[number, number]> = [
  [0.5, 0.9],
  [0.44, 0.86], [0.41, 0.8], [0.43, 0.76], [0.46, 0.75],
  [0.4, 0.7], [0.4, 0.6], [0.4, 0.55], [0.4, 0.5],
  [0.47, 0.7], [0.47, 0.6], [0.47, 0.65], [0.47, 0.68],
  [0.54, 0.71], [0.54, 0.6], [0.54, 0.65], [0.54, 0.68],
  [0.61, 0.73], [0.61, 0.6], [0.61, 0.65], [0.61, 0.68],
];

const FIST: Array<[number, number]> = POINTING.map(([x, y], i) =>
  i === 7 ? [x, 0.65] : i === 8 ? [x, 0.68] : [x, y]
);

function placeHand(points: Array<[number, number]>, tipX: number, tipY: number): TrackedHand {
  const [ox, oy] = POINTING[8];
  const landmarks: Landmark[] = points.map(([x, y]) => ({
    x: tipX + 0.5 * (x - ox),
    y: tipY + 0.5 * (y - oy),
  }));
  return { handedness: "Right", landmarks, score: 0.95 };
}

/** A pointing hand whose index fingertip sits at the given normalized position. */
export function pointingAt(x: number, y: number, timestamp: number): HandFrame {
  return { hands: [placeHand(POINTING, x, y)], timestamp };
}

export function fistAt(x: number, y: number, timestamp: number): HandFrame {
  return { hands: [placeHand(FIST, x, y)], timestamp };
}

export function noHand(timestamp: number): HandFrame {
  return { hands: [], timestamp };
}

/** Normalized position of a display pixel on a 1280x720 display. */
export function norm(px: number, py: number): [number, number] {
  return [px / 1280, py / 720];
}

export function fromFrames(frames: HandFrame[]): LandmarkSource & { now: () => number } {
  let index = 0;
  let current = 0;
  return {
    async read() {
      const frame = frames[index++];
      if (frame) current = frame.timestamp;
      return frame;
    },
    now: () => current,
  };
}
