export * from "./types";
export * from "./ButtonLayout";
export * from "./TouchStateMachine";
