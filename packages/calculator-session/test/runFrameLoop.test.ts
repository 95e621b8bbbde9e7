import { afterEach, describe, expect, it, vi } from "vitest";
import type { HandFrame, LandmarkSource } from "@touchless-calc/gesture-core";
import { createCalculatorSession, LatestFrameSlot, runFrameLoop } from "../src";
import type { FrameLoopError } from "../src";
import { fromFrames, norm, noHand, pointingAt } from "./frames";

const display = { width: 1280, height: 720 };
const NINE = norm(1116, 298);
const PERCENT = norm(1116, 230);

afterEach(() => {
  vi.restoreAllMocks();
});

describe("runFrameLoop", () => {
  it("processes every frame until the source ends", async () => {
    const session = createCalculatorSession({ display });
    const source = fromFrames([pointingAt(...NINE, 0), noHand(50), pointingAt(...PERCENT, 100)]);
    const displays: string[] = [];

    const stats = await runFrameLoop({
      source,
      session,
      clock: source.now,
      onFrame: (report) => displays.push(report.display),
    });

    expect(stats).toEqual({ frames: 3, presses: 2 });
    expect(displays).toEqual(["9", "9", "0.09"]);
  });

  it("reports source failures and carries on with no hand", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const session = createCalculatorSession({ display });
    const failure = new Error("camera unplugged");
    const frames: Array<HandFrame | Error> = [pointingAt(...NINE, 0), failure, pointingAt(...NINE, 400)];
    let index = 0;
    const source: LandmarkSource = {
      async read() {
        const next = frames[index++];
        if (next instanceof Error) throw next;
        return next;
      },
    };
    const errors: FrameLoopError[] = [];
    const kinds: string[] = [];
    let now = 0;

    const stats = await runFrameLoop({
      source,
      session,
      clock: () => (now += 200) - 200,
      onError: (err) => errors.push(err),
      onFrame: (report) => kinds.push(report.pose.kind),
    });

    expect(errors).toEqual([{ type: "source-failed", error: failure }]);
    expect(errorSpy).toHaveBeenCalledWith("[calculator-session] frame source failed", failure);
    expect(kinds).toEqual(["POINTING", "NO_HAND", "POINTING"]);
    expect(stats).toEqual({ frames: 3, presses: 2 });
    expect(session.calculator.getDisplay()).toBe("99");
  });

  it("stops between frames when aborted", async () => {
    const session = createCalculatorSession({ display });
    const controller = new AbortController();
    const source = fromFrames([noHand(0), noHand(10), noHand(20)]);

    const stats = await runFrameLoop({
      source,
      session,
      clock: source.now,
      signal: controller.signal,
      onFrame: () => controller.abort(),
    });

    expect(stats.frames).toBe(1);
  });

  it("stops when the session requests quit", async () => {
    const session = createCalculatorSession({ display });
    const source = fromFrames([noHand(0), noHand(10)]);

    const stats = await runFrameLoop({
      source,
      session,
      clock: source.now,
      onFrame: (_report, s) => {
        s.quitRequested = true;
      },
    });

    expect(stats.frames).toBe(1);
  });

  it("throttles to the requested frame rate", async () => {
    const session = createCalculatorSession({ display });
    const source = fromFrames([noHand(0), noHand(5)]);
    const sleep = vi.fn(async () => {});

    await runFrameLoop({ source, session, fps: 50, clock: () => 0, sleep });

    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(20, undefined);
  });

  it("reads frames handed off through a latest-frame slot", async () => {
    const session = createCalculatorSession({ display });
    const slot = new LatestFrameSlot<HandFrame>();
    slot.publish(noHand(0));
    slot.publish(pointingAt(...NINE, 10));
    slot.close();

    const stats = await runFrameLoop({ source: slot, session, clock: () => 10 });

    expect(stats).toEqual({ frames: 1, presses: 1 });
    expect(session.calculator.getDisplay()).toBe("9");
  });
});
