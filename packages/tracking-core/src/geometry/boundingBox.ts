import type { Point2D } from "./point";

/**
 * Axis-aligned detection box in cursor space. Corners are expected to satisfy
 * `x1 <= x2` and `y1 <= y2`; nothing here checks it.
 */
export type BoundingBox = Readonly<{
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  score: number;
  classId: number;
}>;

export type ScaleFactors = {
  x: number;
  y: number;
};

export function createBoundingBox(input: {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  score: number;
  classId: number;
}): BoundingBox {
  return Object.freeze({
    x1: input.x1,
    y1: input.y1,
    x2: input.x2,
    y2: input.y2,
    score: input.score,
    classId: input.classId
  });
}

export function boxCenter(box: BoundingBox): Point2D {
  return { x: (box.x1 + box.x2) / 2, y: (box.y1 + box.y2) / 2 };
}

export function boxWidth(box: BoundingBox): number {
  return box.x2 - box.x1;
}

export function boxHeight(box: BoundingBox): number {
  return box.y2 - box.y1;
}

// Edges count as inside.
export function containsPoint(box: BoundingBox, point: Point2D): boolean {
  return box.x1 <= point.x && point.x <= box.x2 && box.y1 <= point.y && point.y <= box.y2;
}

export function scaleBoundingBox(box: BoundingBox, factors: ScaleFactors): BoundingBox {
  return createBoundingBox({
    x1: box.x1 * factors.x,
    y1: box.y1 * factors.y,
    x2: box.x2 * factors.x,
    y2: box.y2 * factors.y,
    score: box.score,
    classId: box.classId
  });
}
