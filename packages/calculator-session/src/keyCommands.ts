import type { CalculatorSession, KeyCommand } from "./types";

const KEY_BINDINGS: Record<string, KeyCommand> = {
  q: "quit",
  t: "toggle-theme",
  i: "toggle-instructions",
  r: "reset-history",
  c: "clear",
  backspace: "delete",
};

/** Accepts a single character or a key name such as "backspace". */
export function keyCommandFor(input: string): KeyCommand | undefined {
  const key = input.toLowerCase();
  return Object.prototype.hasOwnProperty.call(KEY_BINDINGS, key) ? KEY_BINDINGS[key] : undefined;
}

export function applyKeyCommand(session: CalculatorSession, command: KeyCommand): void {
  switch (command) {
    case "quit":
      session.quitRequested = true;
      break;
    case "toggle-theme":
      session.ui.theme = session.ui.theme === "dark" ? "light" : "dark";
      break;
    case "toggle-instructions":
      session.ui.showInstructions = !session.ui.showInstructions;
      break;
    case "reset-history":
      session.calculator.clearHistory();
      break;
    case "clear":
      session.calculator.apply("C");
      break;
    case "delete":
      session.calculator.apply("del");
      break;
  }
}
