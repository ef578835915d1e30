import type { ScaleFactors } from "./boundingBox";
import type { Point2D, Size } from "./point";

export const DEFAULT_MODEL_SIZE: Readonly<Size> = Object.freeze({ width: 640, height: 360 });
export const DEFAULT_SCREEN_SIZE: Readonly<Size> = Object.freeze({ width: 1920, height: 1080 });

export function getScaleFactors(from: Size, to: Size): ScaleFactors {
  return {
    x: to.width / from.width,
    y: to.height / from.height
  };
}

export function scaleCoordinates(point: Point2D, from: Size, to: Size): Point2D {
  const factors = getScaleFactors(from, to);
  return { x: point.x * factors.x, y: point.y * factors.y };
}

export function mapToScreen(
  point: Point2D,
  modelSize: Size = DEFAULT_MODEL_SIZE,
  screenSize: Size = DEFAULT_SCREEN_SIZE
): Point2D {
  return scaleCoordinates(point, modelSize, screenSize);
}

export function mapToModel(
  point: Point2D,
  screenSize: Size = DEFAULT_SCREEN_SIZE,
  modelSize: Size = DEFAULT_MODEL_SIZE
): Point2D {
  return scaleCoordinates(point, screenSize, modelSize);
}
