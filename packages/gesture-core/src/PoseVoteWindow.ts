import type { Point2D, PoseClassification, PoseKind } from "./types";

/**
 * Majority vote over the last `size` classifications. Ties go to the newest
 * frame's kind; a POINTING result carries the newest pointing fingertip.
 */
export class PoseVoteWindow {
  private readonly size: number;
  private readonly window: PoseClassification[] = [];

  constructor(size = 1) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Vote window size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  push(pose: PoseClassification): PoseClassification {
    this.window.push(pose);
    if (this.window.length > this.size) {
      this.window.shift();
    }
    if (this.size === 1) return pose;

    const counts: Record<PoseKind, number> = { POINTING: 0, OTHER: 0, NO_HAND: 0 };
    for (const entry of this.window) counts[entry.kind] += 1;

    let winner: PoseKind = pose.kind;
    for (const kind of ["POINTING", "OTHER", "NO_HAND"] as const) {
      if (counts[kind] > counts[winner]) winner = kind;
    }

    if (winner === "POINTING") {
      const fingertip = this.latestFingertip();
      if (fingertip) return { kind: "POINTING", fingertip };
    }
    return winner === "OTHER" ? { kind: "OTHER" } : { kind: "NO_HAND" };
  }

  clear(): void {
    this.window.length = 0;
  }

  private latestFingertip(): Point2D | undefined {
    for (let i = this.window.length - 1; i >= 0; i--) {
      const entry = this.window[i];
      if (entry.kind === "POINTING") return entry.fingertip;
    }
    return undefined;
  }
}
