export * from "./types";
export * from "./GestureClassifier";
export * from "./PoseVoteWindow";
export * from "./projection";
