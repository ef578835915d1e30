export * from "./geometry/point";
export * from "./geometry/boundingBox";
export * from "./geometry/coordinate";
export * from "./filters/ema";
export * from "./filters/vectorFilter";
export * from "./selection/types";
export * from "./selection/targetSelector";
export * from "./control/config";
export * from "./control/types";
export * from "./control/aimController";
export * from "./session/trackingSession";
export * from "./config/schema";
