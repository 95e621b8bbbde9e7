import { emitKeypressEvents } from "node:readline";
import { runCli } from "./cli";

type KeypressInfo = { name?: string; ctrl?: boolean };

function attachTerminalKeys(onKey: (input: string) => void): () => void {
  const stdin = process.stdin;
  if (!stdin.isTTY) return () => {};
  emitKeypressEvents(stdin);
  stdin.setRawMode(true);
  const listener = (str: string | undefined, key: KeypressInfo | undefined) => {
    // raw mode swallows Ctrl+C
    if (key?.ctrl && key.name === "c") {
      onKey("q");
      return;
    }
    onKey(key?.name ?? str ?? "");
  };
  stdin.on("keypress", listener);
  stdin.resume();
  return () => {
    stdin.off("keypress", listener);
    stdin.setRawMode(false);
    stdin.pause();
  };
}

runCli(process.argv.slice(2), { attachKeys: attachTerminalKeys }).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("[calculator-cli] unexpected failure", err);
    process.exitCode = 1;
  }
);
