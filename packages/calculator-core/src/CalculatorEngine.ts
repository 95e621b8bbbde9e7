import { ERROR_DISPLAY, evaluate, formatResult } from "./format";
import type {
  CalculatorEngineOptions,
  CalculatorKey,
  CalculatorState,
  DigitKey,
  HistoryEntry,
  OperatorKey,
} from "./types";

const DEFAULTS: Required<CalculatorEngineOptions> = {
  maxOperandLength: 12,
  historyLimit: 10,
};

const DIGITS: readonly string[] = ["0", "1", "2", "3", "4", "5", "6", "7", "8", "9"];
const OPERATORS: readonly string[] = ["+", "-", "×", "÷"];

export function isDigitKey(key: CalculatorKey): key is DigitKey {
  return DIGITS.includes(key);
}

export function isOperatorKey(key: CalculatorKey): key is OperatorKey {
  return OPERATORS.includes(key);
}

function initialState(): CalculatorState {
  return {
    display: "0",
    operand: "",
    leftOperand: "",
    pendingOperator: undefined,
    justEvaluated: false,
    error: false,
  };
}

/**
 * Immediate-execution calculator: operators chain left to right with no
 * precedence, so `2 + 3 × 4 =` yields 20.
 */
export class CalculatorEngine {
  private readonly options: Required<CalculatorEngineOptions>;
  private state: CalculatorState = initialState();
  private history: HistoryEntry[] = [];

  constructor(opts?: CalculatorEngineOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  apply(key: CalculatorKey): string {
    if (isDigitKey(key)) {
      this.inputDigit(key);
    } else if (isOperatorKey(key)) {
      this.inputOperator(key);
    } else {
      switch (key) {
        case ".":
          this.inputDecimalPoint();
          break;
        case "=":
          this.equals();
          break;
        case "C":
          this.reset();
          break;
        case "del":
          this.deleteLast();
          break;
        case "±":
          this.toggleSign();
          break;
        case "%":
          this.percent();
          break;
      }
    }
    return this.state.display;
  }

  getDisplay(): string {
    return this.state.display;
  }

  getState(): CalculatorState {
    return { ...this.state };
  }

  getHistory(): HistoryEntry[] {
    return this.history.map((entry) => ({ ...entry }));
  }

  clearHistory(): void {
    this.history = [];
  }

  reset(): void {
    this.state = initialState();
  }

  private startsFresh(): boolean {
    return this.state.error || this.state.justEvaluated;
  }

  private setOperand(operand: string): void {
    this.state.operand = operand;
    this.state.display = operand === "" || operand === "-" ? "0" : operand;
  }

  private inputDigit(digit: DigitKey): void {
    if (this.startsFresh()) {
      this.reset();
      this.setOperand(digit);
      return;
    }
    const { operand } = this.state;
    if (operand === "" || operand === "0") {
      this.setOperand(digit);
    } else if (operand === "-0") {
      this.setOperand(`-${digit}`);
    } else if (operand.length < this.options.maxOperandLength) {
      this.setOperand(operand + digit);
    }
  }

  private inputDecimalPoint(): void {
    if (this.startsFresh()) {
      this.reset();
      this.setOperand("0.");
      return;
    }
    const { operand } = this.state;
    if (operand.includes(".") || operand.length >= this.options.maxOperandLength) return;
    this.setOperand(operand === "" ? "0." : `${operand}.`);
  }

  private inputOperator(operator: OperatorKey): void {
    if (this.state.error) return;
    const { operand, leftOperand, pendingOperator } = this.state;

    if (operand === "" || operand === "-") {
      if (pendingOperator) this.state.pendingOperator = operator;
      return;
    }

    if (pendingOperator && leftOperand !== "") {
      const result = evaluate(Number(leftOperand), pendingOperator, Number(operand));
      if (result === null) {
        this.fail();
        return;
      }
      const formatted = formatResult(result);
      this.state.leftOperand = formatted;
      this.state.display = formatted;
    } else {
      this.state.leftOperand = operand;
    }
    this.state.pendingOperator = operator;
    this.state.operand = "";
    this.state.justEvaluated = false;
  }

  private equals(): void {
    const { operand, leftOperand, pendingOperator } = this.state;
    if (this.state.error || !pendingOperator || leftOperand === "" || operand === "" || operand === "-") return;

    const expression = `${leftOperand} ${pendingOperator} ${operand}`;
    const result = evaluate(Number(leftOperand), pendingOperator, Number(operand));
    const formatted = result === null ? ERROR_DISPLAY : formatResult(result);
    this.record({ expression, result: formatted });

    if (result === null) {
      this.fail();
      return;
    }
    this.state = {
      display: formatted,
      operand: formatted,
      leftOperand: "",
      pendingOperator: undefined,
      justEvaluated: true,
      error: false,
    };
  }

  private deleteLast(): void {
    if (this.state.error) {
      this.reset();
      return;
    }
    this.state.justEvaluated = false;
    const trimmed = this.state.operand.slice(0, -1);
    this.setOperand(trimmed === "-" ? "" : trimmed);
  }

  private toggleSign(): void {
    const { operand } = this.state;
    if (this.state.error || operand === "" || Number(operand) === 0) return;
    this.setOperand(operand.startsWith("-") ? operand.slice(1) : `-${operand}`);
  }

  private percent(): void {
    const { operand } = this.state;
    if (this.state.error || operand === "" || operand === "-") return;
    this.setOperand(formatResult(Number(operand) / 100));
  }

  private fail(): void {
    this.state = { ...initialState(), display: ERROR_DISPLAY, error: true };
  }

  private record(entry: HistoryEntry): void {
    this.history.push(entry);
    if (this.history.length > this.options.historyLimit) {
      this.history.shift();
    }
  }
}

export { DEFAULTS as defaultCalculatorEngineOptions };
