import type { Point2D } from "../geometry/point";
import { EmaFilter } from "./ema";

export class Vector2Filter {
  private xFilter = new EmaFilter();
  private yFilter = new EmaFilter();

  blend(point: Point2D, alpha: number): Point2D {
    return {
      x: this.xFilter.blend(point.x, alpha),
      y: this.yFilter.blend(point.y, alpha)
    };
  }

  commit(point: Point2D): void {
    this.xFilter.commit(point.x);
    this.yFilter.commit(point.y);
  }

  current(): Point2D {
    return { x: this.xFilter.current(), y: this.yFilter.current() };
  }

  reset(): void {
    this.xFilter.reset();
    this.yFilter.reset();
  }
}
