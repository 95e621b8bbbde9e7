import { describe, expect, it } from "vitest";
import { CalculatorEngine } from "../src/CalculatorEngine";
import type { CalculatorKey } from "../src";

function press(engine: CalculatorEngine, keys: CalculatorKey[]): string {
  let display = engine.getDisplay();
  for (const key of keys) {
    display = engine.apply(key);
  }
  return display;
}

describe("CalculatorEngine", () => {
  it("starts at 0", () => {
    expect(new CalculatorEngine().getDisplay()).toBe("0");
  });

  it("adds two operands", () => {
    expect(press(new CalculatorEngine(), ["1", "+", "2", "="])).toBe("3");
  });

  it("evaluates left to right without precedence", () => {
    const engine = new CalculatorEngine();
    expect(press(engine, ["2", "+", "3", "×"])).toBe("5");
    expect(press(engine, ["4", "="])).toBe("20");
  });

  it("shows an error on division by zero and recovers on the next digit", () => {
    const engine = new CalculatorEngine();
    expect(press(engine, ["5", "÷", "0", "="])).toBe("Error");
    expect(engine.getState().error).toBe(true);

    expect(engine.apply("7")).toBe("7");
    expect(engine.getState()).toMatchObject({ error: false, operand: "7", leftOperand: "" });
    expect(press(engine, ["-", "2", "="])).toBe("5");
  });

  it("ignores operators while in error state", () => {
    const engine = new CalculatorEngine();
    press(engine, ["1", "÷", "0", "="]);
    expect(engine.apply("+")).toBe("Error");
    expect(engine.getState().pendingOperator).toBeUndefined();
  });

  it("divides the operand by 100 on %", () => {
    expect(press(new CalculatorEngine(), ["9", "%"])).toBe("0.09");
  });

  it("toggles the sign", () => {
    const engine = new CalculatorEngine();
    expect(press(engine, ["5", "±"])).toBe("-5");
    expect(engine.apply("±")).toBe("5");
  });

  it("does not toggle the sign of zero", () => {
    expect(press(new CalculatorEngine(), ["0", "±"])).toBe("0");
  });

  it("clears everything on C", () => {
    const engine = new CalculatorEngine();
    expect(press(engine, ["1", "2", "+", "7", "C"])).toBe("0");
    expect(engine.getState()).toEqual({
      display: "0",
      operand: "",
      leftOperand: "",
      pendingOperator: undefined,
      justEvaluated: false,
      error: false,
    });
  });

  it("keeps display at 0 on repeated del of an empty operand", () => {
    const engine = new CalculatorEngine();
    expect(press(engine, ["del", "del", "del"])).toBe("0");
    expect(engine.getState().operand).toBe("");
  });

  it("deletes characters back to a single digit", () => {
    expect(press(new CalculatorEngine(), ["1", "2", ".", "5", "del", "del", "del"])).toBe("1");
  });

  it("falls back to 0 when deleting the last digit of a negative operand", () => {
    expect(press(new CalculatorEngine(), ["5", "±", "del"])).toBe("0");
  });

  it("ignores a second decimal point", () => {
    expect(press(new CalculatorEngine(), ["1", ".", "2", ".", "3"])).toBe("1.23");
  });

  it("prefixes a leading decimal point with 0", () => {
    expect(press(new CalculatorEngine(), ["."])).toBe("0.");
  });

  it("replaces the pending operator when no operand was typed", () => {
    const engine = new CalculatorEngine();
    press(engine, ["8", "+", "-"]);
    expect(engine.getState().pendingOperator).toBe("-");
    expect(press(engine, ["3", "="])).toBe("5");
  });

  it("starts a new operand after a result", () => {
    const engine = new CalculatorEngine();
    press(engine, ["2", "×", "3", "="]);
    expect(engine.apply("4")).toBe("4");
  });

  it("chains an operator onto a result", () => {
    const engine = new CalculatorEngine();
    press(engine, ["2", "×", "3", "="]);
    expect(press(engine, ["+", "1", "="])).toBe("7");
  });

  it("caps operand length", () => {
    const engine = new CalculatorEngine({ maxOperandLength: 3 });
    expect(press(engine, ["1", "2", "3", "4"])).toBe("123");
  });

  it("does not let a decimal point exceed the length cap", () => {
    expect(press(new CalculatorEngine({ maxOperandLength: 3 }), ["1", "2", "3", "."])).toBe("123");
    expect(press(new CalculatorEngine({ maxOperandLength: 3 }), ["1", "2", ".", "5"])).toBe("12.");
  });

  it("starts a fresh decimal after a result", () => {
    expect(press(new CalculatorEngine(), ["2", "×", "3", "=", "."])).toBe("0.");
  });

  it("starts a fresh decimal after an error", () => {
    const engine = new CalculatorEngine();
    expect(press(engine, ["5", "÷", "0", "=", "."])).toBe("0.");
    expect(engine.getState().error).toBe(false);
  });

  it("clears the error on del", () => {
    const engine = new CalculatorEngine();
    expect(press(engine, ["5", "÷", "0", "=", "del"])).toBe("0");
    expect(engine.getState()).toMatchObject({ error: false, operand: "", display: "0" });
  });

  it("ignores ± and % in the error state", () => {
    const engine = new CalculatorEngine();
    press(engine, ["5", "÷", "0", "="]);
    expect(engine.apply("±")).toBe("Error");
    expect(engine.apply("%")).toBe("Error");
    expect(engine.getState().error).toBe(true);
  });

  it("records the most recent evaluations", () => {
    const engine = new CalculatorEngine({ historyLimit: 2 });
    press(engine, ["1", "+", "1", "="]);
    press(engine, ["2", "+", "2", "="]);
    press(engine, ["6", "÷", "0", "="]);
    expect(engine.getHistory()).toEqual([
      { expression: "2 + 2", result: "4" },
      { expression: "6 ÷ 0", result: "Error" },
    ]);

    engine.apply("C");
    expect(engine.getHistory()).toHaveLength(2);
    engine.clearHistory();
    expect(engine.getHistory()).toEqual([]);
  });
});
