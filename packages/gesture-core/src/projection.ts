import type { DisplaySize, Landmark, Point2D } from "./types";

export interface DisplayProjectionOptions {
  /** Flip horizontally so the display behaves like a mirror. */
  mirror?: boolean;
}

/**
 * Maps a normalized camera-space landmark onto display pixels. Pixel
 * keypoints are normalized by frame size upstream, so the composed map from
 * frame to display is linear.
 */
export function createDisplayProjection(
  display: DisplaySize,
  options: DisplayProjectionOptions = {}
): (landmark: Landmark) => Point2D {
  const { width, height } = display;
  const mirror = options.mirror ?? false;
  return (landmark) => ({
    x: (mirror ? 1 - landmark.x : landmark.x) * width,
    y: landmark.y * height,
  });
}
