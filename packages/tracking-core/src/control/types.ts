import type { Point2D } from "../geometry/point";

export type ControllerPhase = "idle" | "active";

export type ControllerState = {
  previousError: Point2D;
  previousOutput: Point2D;
};
