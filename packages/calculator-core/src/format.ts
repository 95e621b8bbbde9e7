import type { OperatorKey } from "./types";

export const ERROR_DISPLAY = "Error";

const EXPONENT_ABOVE = 999_999_999;
const EXPONENT_BELOW = 0.000001;
const MAX_FRACTION_DIGITS = 8;

export function evaluate(left: number, operator: OperatorKey, right: number): number | null {
  let result: number;
  switch (operator) {
    case "+":
      result = left + right;
      break;
    case "-":
      result = left - right;
      break;
    case "×":
      result = left * right;
      break;
    case "÷":
      if (right === 0) return null;
      result = left / right;
      break;
  }
  return Number.isFinite(result) ? result : null;
}

export function formatResult(value: number): string {
  if (!Number.isFinite(value)) return ERROR_DISPLAY;
  const magnitude = Math.abs(value);
  if (magnitude > EXPONENT_ABOVE || (magnitude < EXPONENT_BELOW && value !== 0)) {
    return padExponent(value.toExponential(2));
  }
  if (Number.isInteger(value)) {
    // avoids "-0"
    return String(value === 0 ? 0 : value);
  }
  return value
    .toFixed(MAX_FRACTION_DIGITS)
    .replace(/0+$/, "")
    .replace(/\.$/, "");
}

// "1.00e+9" -> "1.00e+09"
function padExponent(text: string): string {
  return text.replace(/e([+-])(\d)$/, (_match, sign: string, digit: string) => `e${sign}0${digit}`);
}
