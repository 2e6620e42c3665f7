export * from "./types";
export * from "./errors";
export * from "./landmarks";
export * from "./fold";
export * from "./pinch";
export * from "./SnapDetector";
export * from "./HandStateStore";
export * from "./GestureEngine";
export * from "./payload";
export * from "./HandPresenceTracker";
export * from "./palm";
