import { CalculatorEngine } from "@touchless-calc/calculator-core";
import type { CalculatorKey } from "@touchless-calc/calculator-core";
import {
  createDisplayProjection,
  GestureClassifier,
  PoseVoteWindow,
} from "@touchless-calc/gesture-core";
import type { DisplaySize, HandFrame } from "@touchless-calc/gesture-core";
import { buildButtonLayout, TouchStateMachine } from "@touchless-calc/touch-core";
import type { CalculatorSession, CalculatorSessionOptions, FrameReport, RenderSnapshot } from "./types";

const PRESS_FEEDBACK_MS = 200;

function buildClassifier(options: CalculatorSessionOptions, display: DisplaySize): GestureClassifier {
  return new GestureClassifier({
    ...(options.classifier ?? {}),
    project: createDisplayProjection(display, { mirror: options.mirror }),
  });
}

export function createCalculatorSession(options: CalculatorSessionOptions): CalculatorSession {
  const display = { ...options.display };
  const layout = buildButtonLayout(display, options.layout);
  return {
    options,
    display,
    classifier: buildClassifier(options, display),
    votes: new PoseVoteWindow(options.voteWindow ?? 1),
    touch: new TouchStateMachine(layout, options.touch),
    calculator: new CalculatorEngine(options.calculator),
    ui: {
      theme: options.theme ?? "dark",
      showInstructions: options.showInstructions ?? true,
    },
    lastPose: { kind: "NO_HAND" },
    lastPress: null,
    recentPress: null,
    lastFrameAt: 0,
    quitRequested: false,
  };
}

/**
 * Runs one frame to completion: classify, smooth, advance the touch machine
 * and feed any press to the calculator. `now` is a monotonic timestamp in ms.
 */
export function processFrame(session: CalculatorSession, frame: HandFrame | null, now: number): FrameReport {
  const pose = session.votes.push(session.classifier.classifyFrame(frame));
  const press = session.touch.advance(pose, now);
  if (press) {
    session.calculator.apply(press.key);
    if (session.options.debug) {
      console.debug(`[calculator-session] pressed ${press.key} -> ${session.calculator.getDisplay()}`);
    }
  }
  session.lastPose = pose;
  session.lastPress = press;
  session.lastFrameAt = now;
  if (press) session.recentPress = press;
  return { pose, press, display: session.calculator.getDisplay() };
}

export function resizeDisplay(session: CalculatorSession, display: DisplaySize): void {
  const next = { ...display };
  session.touch.setLayout(buildButtonLayout(next, session.options.layout));
  session.classifier = buildClassifier(session.options, next);
  session.votes.clear();
  session.display = next;
}

export function getRenderSnapshot(session: CalculatorSession): RenderSnapshot {
  const touch = session.touch.getState();
  const calculator = session.calculator.getState();
  const pose = session.lastPose;
  return {
    phase: touch.phase,
    hoveredId: touch.hoveredId,
    pressedId: pressHighlight(session),
    fingertip: pose.kind === "POINTING" ? { ...pose.fingertip } : undefined,
    display: calculator.display,
    pendingOperator: calculator.pendingOperator,
    error: calculator.error,
    history: session.calculator.getHistory(),
    buttons: session.touch.getLayout().buttons,
    theme: session.ui.theme,
    showInstructions: session.ui.showInstructions,
  };
}

function pressHighlight(session: CalculatorSession): CalculatorKey | undefined {
  const press = session.recentPress;
  if (!press) return undefined;
  const feedbackMs = session.options.pressFeedbackMs ?? PRESS_FEEDBACK_MS;
  const age = session.lastFrameAt - press.at;
  return age === 0 || age < feedbackMs ? press.key : undefined;
}
