export type Point2D = {
  x: number;
  y: number;
};

export type Size = {
  width: number;
  height: number;
};

export const ZERO_POINT: Readonly<Point2D> = Object.freeze({ x: 0, y: 0 });

export function add(a: Point2D, b: Point2D): Point2D {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subtract(a: Point2D, b: Point2D): Point2D {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(point: Point2D, factor: number): Point2D {
  return { x: point.x * factor, y: point.y * factor };
}

export function magnitude(point: Point2D): number {
  return Math.sqrt(point.x * point.x + point.y * point.y);
}

export function distanceBetween(a: Point2D, b: Point2D): number {
  return magnitude(subtract(a, b));
}
