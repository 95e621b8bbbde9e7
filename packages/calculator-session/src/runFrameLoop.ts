import { setTimeout as delay } from "node:timers/promises";
import type { HandFrame, LandmarkSource } from "@touchless-calc/gesture-core";
import { processFrame } from "./CalculatorSession";
import type { CalculatorSession, FrameLoopError, FrameLoopStats, FrameReport } from "./types";

export type FrameLoopOptions = {
  source: LandmarkSource;
  session: CalculatorSession;
  /** Upper bound on frames per second; unset runs as fast as the source delivers. */
  fps?: number;
  signal?: AbortSignal;
  /** Monotonic milliseconds, read once per frame. */
  clock?: () => number;
  onFrame?: (report: FrameReport, session: CalculatorSession) => void;
  onError?: (err: FrameLoopError) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal });
};

export async function runFrameLoop(options: FrameLoopOptions): Promise<FrameLoopStats> {
  const { source, session, fps, signal, onFrame } = options;
  const clock = options.clock ?? (() => performance.now());
  const sleep = options.sleep ?? defaultSleep;
  const stats: FrameLoopStats = { frames: 0, presses: 0 };
  const stopped = () => Boolean(signal?.aborted) || session.quitRequested;

  while (!stopped()) {
    let frame: HandFrame | null;
    try {
      const next = await source.read();
      if (next === undefined) break;
      frame = next;
    } catch (error) {
      handleError({ type: "source-failed", error });
      frame = null;
    }
    if (stopped()) break;

    const now = clock();
    const report = processFrame(session, frame, now);
    stats.frames += 1;
    if (report.press) stats.presses += 1;
    onFrame?.(report, session);

    if (fps && fps > 0) {
      const remaining = 1000 / fps - (clock() - now);
      if (remaining > 0) {
        try {
          await sleep(remaining, signal);
        } catch (err) {
          if (signal?.aborted) break;
          throw err;
        }
      }
    }
  }

  return stats;

  function handleError(err: FrameLoopError) {
    options.onError?.(err);
    console.error("[calculator-session] frame source failed", err.error);
  }
}
