export type DigitKey = "0" | "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9";

export type OperatorKey = "+" | "-" | "×" | "÷";

export type CommandKey = "C" | "del" | "±" | "%";

export type CalculatorKey = DigitKey | "." | OperatorKey | CommandKey | "=";

export interface CalculatorState {
  display: string;
  /** Operand currently being typed; empty right after an operator press. */
  operand: string;
  leftOperand: string;
  pendingOperator?: OperatorKey;
  justEvaluated: boolean;
  error: boolean;
}

export interface HistoryEntry {
  expression: string;
  result: string;
}

export interface CalculatorEngineOptions {
  maxOperandLength?: number;
  historyLimit?: number;
}
