export * from "./types";
export * from "./CalculatorSession";
export * from "./keyCommands";
export * from "./LatestFrameSlot";
export * from "./runFrameLoop";
