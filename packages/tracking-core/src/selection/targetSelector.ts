import { boxCenter, containsPoint } from "../geometry/boundingBox";
import type { BoundingBox } from "../geometry/boundingBox";
import { DEFAULT_SCREEN_SIZE } from "../geometry/coordinate";
import { distanceBetween } from "../geometry/point";
import type { Point2D } from "../geometry/point";
import type { Selection, SelectorConfig } from "./types";

export const DEFAULT_SELECTOR_CONFIG: SelectorConfig = {
  space: DEFAULT_SCREEN_SIZE
};

const NO_TARGET: Selection = { kind: "none" };

/**
 * Picks the detection whose center is nearest the cursor.
 *
 * Boxes containing the anchor point (by default the center of the tracked
 * space) are the tracked subject's own representation and are never picked.
 * Exact distance ties resolve to the earliest box in input order.
 */
export class TargetSelector {
  private readonly anchor: Point2D;
  private candidates: BoundingBox[] = [];
  private current: Selection = NO_TARGET;

  constructor(config: SelectorConfig = DEFAULT_SELECTOR_CONFIG) {
    this.anchor = config.anchor
      ? { x: config.anchor.x, y: config.anchor.y }
      : { x: config.space.width / 2, y: config.space.height / 2 };
  }

  select(detections: readonly BoundingBox[], cursor: Point2D): Selection {
    if (detections.length === 0) {
      this.candidates = [];
      this.current = NO_TARGET;
      return NO_TARGET;
    }

    const filtered = detections.filter((box) => !containsPoint(box, this.anchor));
    this.candidates = filtered;

    let nearest: BoundingBox | undefined;
    let minDistance = Infinity;
    for (const box of filtered) {
      const distance = distanceBetween(boxCenter(box), cursor);
      if (distance < minDistance) {
        minDistance = distance;
        nearest = box;
      }
    }

    this.current = nearest ? { kind: "locked", box: nearest } : NO_TARGET;
    return this.current;
  }

  getCandidates(): readonly BoundingBox[] {
    return [...this.candidates];
  }

  getCurrentTarget(): Selection {
    return this.current;
  }

  getAnchor(): Point2D {
    return { x: this.anchor.x, y: this.anchor.y };
  }
}
