import { parseArgs } from "node:util";
import { ZodError } from "zod";
import {
  applyKeyCommand,
  createCalculatorSession,
  getRenderSnapshot,
  keyCommandFor,
  runFrameLoop,
} from "@touchless-calc/calculator-session";
import type { CalculatorSession } from "@touchless-calc/calculator-session";
import { loadReplay, ReplayLandmarkSource, sessionOptionsFor } from "./replay";
import type { Replay } from "./replay";
import { renderText } from "./renderText";

export const USAGE = "usage: calculator-cli --frames <replay.json> [--fps <n>] [--mirror] [--debug]";

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export interface CliOptions {
  io?: CliIo;
  signal?: AbortSignal;
  /** Subscribes to key input; returns an unsubscribe function. */
  attachKeys?: (onKey: (input: string) => void) => () => void;
}

const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

type ParsedArgs = { frames: string; fps?: number; mirror?: boolean; debug: boolean };

function readFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      frames: { type: "string", short: "f" },
      fps: { type: "string" },
      mirror: { type: "boolean" },
      debug: { type: "boolean" },
    },
  }).values;
}

function parseCliArgs(argv: string[]): ParsedArgs | string {
  let values: ReturnType<typeof readFlags>;
  try {
    values = readFlags(argv);
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
  if (!values.frames) return "missing --frames";
  let fps: number | undefined;
  if (values.fps !== undefined) {
    fps = Number(values.fps);
    if (!Number.isFinite(fps) || fps <= 0) return `invalid --fps: ${values.fps}`;
  }
  return { frames: values.frames, fps, mirror: values.mirror, debug: values.debug ?? false };
}

function describeLoadError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("\n");
  }
  return err instanceof Error ? err.message : String(err);
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? consoleIo;
  if (argv.includes("--help") || argv.includes("-h")) {
    io.stdout(USAGE);
    return 0;
  }
  const args = parseCliArgs(argv);
  if (typeof args === "string") {
    io.stderr(`[calculator-cli] ${args}`);
    io.stderr(USAGE);
    return 1;
  }

  let session: CalculatorSession;
  let replay: Replay;
  try {
    replay = await loadReplay(args.frames);
    session = createCalculatorSession(sessionOptionsFor(replay, { mirror: args.mirror, debug: args.debug }));
  } catch (err) {
    io.stderr(`[calculator-cli] cannot load ${args.frames}`);
    io.stderr(describeLoadError(err));
    return 1;
  }

  // Key events need an event loop turn between frames.
  const source = new ReplayLandmarkSource(replay.frames, { yieldEachFrame: Boolean(options.attachKeys) });
  const detachKeys = options.attachKeys?.((input) => {
    const command = keyCommandFor(input);
    if (command) applyKeyCommand(session, command);
  });

  try {
    const stats = await runFrameLoop({
      source,
      session,
      fps: args.fps,
      signal: options.signal,
      clock: () => source.now(),
      onFrame: (report) => {
        if (report.press) {
          const label = session.touch.getLayout().getButton(report.press.key)?.label ?? report.press.key;
          io.stdout(`pressed ${label} -> ${report.display}`);
        }
        if (args.debug) io.stdout(renderText(getRenderSnapshot(session)));
      },
      onError: (err) => io.stderr(`[calculator-cli] ${err.type}`),
    });
    io.stdout(`display: ${session.calculator.getDisplay()}`);
    io.stdout(`frames: ${stats.frames}, presses: ${stats.presses}`);
  } finally {
    detachKeys?.();
  }
  return 0;
}
