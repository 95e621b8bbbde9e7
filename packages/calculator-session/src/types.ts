import type {
  CalculatorEngine,
  CalculatorEngineOptions,
  CalculatorKey,
  HistoryEntry,
  OperatorKey,
} from "@touchless-calc/calculator-core";
import type {
  DisplaySize,
  GestureClassifier,
  GestureClassifierOptions,
  Point2D,
  PoseClassification,
  PoseVoteWindow,
} from "@touchless-calc/gesture-core";
import type {
  Button,
  ButtonLayoutOptions,
  TouchPhase,
  TouchPress,
  TouchStateMachine,
  TouchStateMachineOptions,
} from "@touchless-calc/touch-core";

export type Theme = "dark" | "light";

export interface UiState {
  theme: Theme;
  showInstructions: boolean;
}

export interface CalculatorSessionOptions {
  display: DisplaySize;
  mirror?: boolean;
  classifier?: Omit<GestureClassifierOptions, "project">;
  /** Majority vote over this many frames; 1 disables smoothing. */
  voteWindow?: number;
  layout?: ButtonLayoutOptions;
  touch?: TouchStateMachineOptions;
  calculator?: CalculatorEngineOptions;
  theme?: Theme;
  showInstructions?: boolean;
  /** How long a press stays highlighted in render snapshots. */
  pressFeedbackMs?: number;
  debug?: boolean;
}

/** Everything one frame needs, passed explicitly through `processFrame`. */
export interface CalculatorSession {
  readonly options: CalculatorSessionOptions;
  display: DisplaySize;
  classifier: GestureClassifier;
  readonly votes: PoseVoteWindow;
  readonly touch: TouchStateMachine;
  readonly calculator: CalculatorEngine;
  readonly ui: UiState;
  lastPose: PoseClassification;
  /** Press emitted by the latest frame, if any. */
  lastPress: TouchPress | null;
  /** Most recent press, kept for the highlight. */
  recentPress: TouchPress | null;
  lastFrameAt: number;
  quitRequested: boolean;
}

export interface FrameReport {
  pose: PoseClassification;
  press: TouchPress | null;
  display: string;
}

export interface RenderSnapshot {
  phase: TouchPhase;
  hoveredId?: CalculatorKey;
  pressedId?: CalculatorKey;
  fingertip?: Point2D;
  display: string;
  pendingOperator?: OperatorKey;
  error: boolean;
  history: HistoryEntry[];
  buttons: readonly Button[];
  theme: Theme;
  showInstructions: boolean;
}

export type KeyCommand =
  | "quit"
  | "toggle-theme"
  | "toggle-instructions"
  | "reset-history"
  | "clear"
  | "delete";

export type FrameLoopError = { type: "source-failed"; error: unknown };

export interface FrameLoopStats {
  frames: number;
  presses: number;
}
