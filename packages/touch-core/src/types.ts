import type { CalculatorKey } from "@touchless-calc/calculator-core";
import type { Point2D } from "@touchless-calc/gesture-core";

export type ButtonCategory = "digit" | "operator" | "command" | "equals";

/** Closed rectangle in display pixels; edges belong to the button. */
export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface Button {
  readonly id: CalculatorKey;
  readonly label: string;
  readonly category: ButtonCategory;
  readonly rect: Readonly<Rect>;
  readonly center: Readonly<Point2D>;
}

export interface ButtonLayoutOptions {
  /** Width of the calculator panel docked to the right edge of the display. */
  panelWidth?: number;
  paddingX?: number;
  top?: number;
  buttonWidth?: number;
  buttonHeight?: number;
  gutter?: number;
}

export type TouchPhase = "IDLE" | "HOVER" | "PRESSED";

export interface TouchState {
  phase: TouchPhase;
  hoveredId?: CalculatorKey;
  lastPressedId?: CalculatorKey;
  lastPressAt?: number;
  cooldownMs: number;
}

export interface TouchStateMachineOptions {
  cooldownMs?: number;
  /** Press radius around a button center, in display pixels. */
  touchThreshold?: number;
}

export interface TouchPress {
  key: CalculatorKey;
  at: number;
}
