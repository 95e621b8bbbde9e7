import { readFile } from "node:fs/promises";
import { setImmediate as nextTurn } from "node:timers/promises";
import { z } from "zod";
import type { GestureClassifierOptions, HandFrame, LandmarkSource } from "@touchless-calc/gesture-core";
import type { TouchStateMachineOptions } from "@touchless-calc/touch-core";
import type { CalculatorSessionOptions } from "@touchless-calc/calculator-session";

const LandmarkSchema = z.tuple([z.number(), z.number()]);

const HandSchema = z.object({
  handedness: z.enum(["Left", "Right"]).default("Right"),
  score: z.number().min(0).max(1).optional(),
  landmarks: z.array(LandmarkSchema),
});

const FrameSchema = z.object({
  t: z.number().nonnegative(),
  hands: z.array(HandSchema),
});

export const ReplaySettingsSchema = z
  .object({
    cooldownMs: z.number().nonnegative(),
    touchThreshold: z.number().positive(),
    extensionMargin: z.number().nonnegative(),
    minHandScore: z.number().min(0).max(1),
    voteWindow: z.number().int().positive(),
    mirror: z.boolean(),
  })
  .partial()
  .strict();

export const ReplaySchema = z
  .object({
    display: z.object({
      width: z.number().positive(),
      height: z.number().positive(),
    }),
    settings: ReplaySettingsSchema.default({}),
    frames: z.array(FrameSchema),
  })
  .superRefine((replay, ctx) => {
    replay.frames.forEach((frame, i) => {
      if (i > 0 && frame.t < replay.frames[i - 1].t) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["frames", i, "t"],
          message: "Frame timestamps must not decrease",
        });
      }
    });
  });

export type Replay = z.infer<typeof ReplaySchema>;
export type ReplaySettings = z.infer<typeof ReplaySettingsSchema>;

export function parseReplay(json: unknown): Replay {
  return ReplaySchema.parse(json);
}

export async function loadReplay(path: string): Promise<Replay> {
  const text = await readFile(path, "utf8");
  return parseReplay(JSON.parse(text));
}

export function toHandFrame(frame: Replay["frames"][number]): HandFrame {
  return {
    timestamp: frame.t,
    hands: frame.hands.map((hand) => ({
      handedness: hand.handedness,
      score: hand.score,
      landmarks: hand.landmarks.map(([x, y]) => ({ x, y })),
    })),
  };
}

export function sessionOptionsFor(
  replay: Replay,
  overrides: { mirror?: boolean; debug?: boolean } = {}
): CalculatorSessionOptions {
  const { settings } = replay;
  // Only set keys the file provides so component defaults stay in effect.
  const classifier: GestureClassifierOptions = {};
  if (settings.extensionMargin !== undefined) classifier.extensionMargin = settings.extensionMargin;
  if (settings.minHandScore !== undefined) classifier.minHandScore = settings.minHandScore;
  const touch: TouchStateMachineOptions = {};
  if (settings.cooldownMs !== undefined) touch.cooldownMs = settings.cooldownMs;
  if (settings.touchThreshold !== undefined) touch.touchThreshold = settings.touchThreshold;

  return {
    display: replay.display,
    mirror: overrides.mirror ?? settings.mirror ?? false,
    debug: overrides.debug ?? false,
    voteWindow: settings.voteWindow ?? 1,
    classifier,
    touch,
  };
}

export interface ReplaySourceOptions {
  /** Give the event loop a turn before each frame, so input events can land mid-replay. */
  yieldEachFrame?: boolean;
}

/** Plays recorded frames back; `now()` is the timestamp of the last frame read. */
export class ReplayLandmarkSource implements LandmarkSource {
  private index = 0;
  private current = 0;

  constructor(
    private readonly frames: Replay["frames"],
    private readonly options: ReplaySourceOptions = {}
  ) {}

  async read(): Promise<HandFrame | undefined> {
    if (this.options.yieldEachFrame) await nextTurn();
    if (this.index >= this.frames.length) return undefined;
    const frame = this.frames[this.index++];
    this.current = frame.t;
    return toHandFrame(frame);
  }

  now(): number {
    return this.current;
  }
}
