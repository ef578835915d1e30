import type { BoundingBox } from "../geometry/boundingBox";
import type { Point2D, Size } from "../geometry/point";

export type Selection =
  | {
      kind: "none";
    }
  | {
      kind: "locked";
      box: BoundingBox;
    };

export type SelectorConfig = {
  space: Size;
  anchor?: Point2D;
};
