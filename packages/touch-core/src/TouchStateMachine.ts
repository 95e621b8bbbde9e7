import type { PoseClassification } from "@touchless-calc/gesture-core";
import { distance2D } from "@touchless-calc/gesture-core";
import type { ButtonLayout } from "./ButtonLayout";
import type { TouchPress, TouchState, TouchStateMachineOptions } from "./types";

const DEFAULTS: Required<TouchStateMachineOptions> = {
  cooldownMs: 300,
  touchThreshold: 24,
};

/**
 * Two-tier touch: the fingertip anywhere inside a button hovers it, and only
 * within `touchThreshold` of its center presses it. A pressed button cannot be
 * pressed again until `cooldownMs` has elapsed.
 */
export class TouchStateMachine {
  private readonly options: Required<TouchStateMachineOptions>;
  private layout: ButtonLayout;
  private state: TouchState;

  constructor(layout: ButtonLayout, opts?: TouchStateMachineOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
    if (!(this.options.cooldownMs >= 0)) {
      throw new Error(`cooldownMs must be non-negative, got ${this.options.cooldownMs}`);
    }
    assertThresholdFits(layout, this.options.touchThreshold);
    this.layout = layout;
    this.state = { phase: "IDLE", cooldownMs: this.options.cooldownMs };
  }

  advance(pose: PoseClassification, now: number): TouchPress | null {
    if (pose.kind !== "POINTING") {
      this.toIdle();
      return null;
    }

    const button = this.layout.hitTest(pose.fingertip);
    if (!button) {
      this.toIdle();
      return null;
    }

    this.state.phase = "HOVER";
    this.state.hoveredId = button.id;

    const withinTouch = distance2D(pose.fingertip, button.center) < this.options.touchThreshold;
    if (!withinTouch || this.isCoolingDown(button.id, now)) {
      return null;
    }

    this.state.phase = "PRESSED";
    this.state.lastPressedId = button.id;
    this.state.lastPressAt = now;
    return { key: button.id, at: now };
  }

  setLayout(layout: ButtonLayout): void {
    assertThresholdFits(layout, this.options.touchThreshold);
    this.layout = layout;
    this.toIdle();
  }

  getLayout(): ButtonLayout {
    return this.layout;
  }

  getState(): TouchState {
    return { ...this.state };
  }

  reset(): void {
    this.state = { phase: "IDLE", cooldownMs: this.options.cooldownMs };
  }

  private isCoolingDown(id: TouchState["lastPressedId"], now: number): boolean {
    const { lastPressedId, lastPressAt } = this.state;
    if (lastPressedId !== id || lastPressAt === undefined) return false;
    return now - lastPressAt < this.options.cooldownMs;
  }

  private toIdle(): void {
    this.state.phase = "IDLE";
    this.state.hoveredId = undefined;
  }
}

function assertThresholdFits(layout: ButtonLayout, threshold: number): void {
  if (!(threshold > 0)) {
    throw new Error(`touchThreshold must be positive, got ${threshold}`);
  }
  for (const button of layout.buttons) {
    const halfWidth = (button.rect.right - button.rect.left) / 2;
    const halfHeight = (button.rect.bottom - button.rect.top) / 2;
    if (threshold >= Math.min(halfWidth, halfHeight)) {
      throw new Error(
        `touchThreshold ${threshold} must be smaller than half of button "${button.id}" (${Math.min(halfWidth, halfHeight)})`
      );
    }
  }
}

export { DEFAULTS as defaultTouchStateMachineOptions };
