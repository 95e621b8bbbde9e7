export * from "./types";
export * from "./format";
export * from "./CalculatorEngine";
