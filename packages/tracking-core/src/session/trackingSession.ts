import type { TrackingConfig } from "../config/schema";
import { AimController } from "../control/aimController";
import type { ControllerGains } from "../control/config";
import { boxCenter } from "../geometry/boundingBox";
import type { BoundingBox } from "../geometry/boundingBox";
import type { Point2D } from "../geometry/point";
import { TargetSelector } from "../selection/targetSelector";
import type { Selection, SelectorConfig } from "../selection/types";

export type TickPhase = "disengaged" | "no-target" | "idle" | "active";

export type TickInput = {
  detections: readonly BoundingBox[];
  cursor: Point2D;
  dt?: number;
};

export type TickResult = {
  frame: number;
  selection: Selection;
  delta: Point2D;
  phase: TickPhase;
  candidateCount: number;
};

export type SessionLogger = Pick<Console, "info">;

export type TrackingSessionOptions = {
  selector?: SelectorConfig;
  gains?: Partial<ControllerGains>;
  engaged?: boolean;
  logger?: SessionLogger;
};

/**
 * One tracking context: a selector feeding a controller, one `tick` per frame.
 *
 * The controller is reset on every engagement change so history from an
 * earlier engagement never carries into the next one.
 */
export class TrackingSession {
  readonly selector: TargetSelector;
  readonly controller: AimController;
  private engaged: boolean;
  private frames = 0;
  private readonly logger: SessionLogger;

  constructor(options: TrackingSessionOptions = {}) {
    this.selector = new TargetSelector(options.selector);
    this.controller = new AimController(options.gains);
    this.engaged = options.engaged ?? false;
    this.logger = options.logger ?? console;
  }

  tick(input: TickInput): TickResult {
    const selection = this.selector.select(input.detections, input.cursor);
    const candidateCount = this.selector.getCandidates().length;
    const frame = this.frames++;

    if (!this.engaged) {
      return { frame, selection, delta: { x: 0, y: 0 }, phase: "disengaged", candidateCount };
    }
    if (selection.kind === "none") {
      return { frame, selection, delta: { x: 0, y: 0 }, phase: "no-target", candidateCount };
    }

    const delta = this.controller.compute(input.cursor, boxCenter(selection.box), input.dt);
    return { frame, selection, delta, phase: this.controller.getPhase(), candidateCount };
  }

  engage(): void {
    if (this.engaged) return;
    this.controller.reset();
    this.engaged = true;
    this.logger.info("[TrackingSession] engaged");
  }

  disengage(): void {
    if (!this.engaged) return;
    this.controller.reset();
    this.engaged = false;
    this.logger.info("[TrackingSession] disengaged");
  }

  toggle(): boolean {
    if (this.engaged) {
      this.disengage();
    } else {
      this.engage();
    }
    return this.engaged;
  }

  isEngaged(): boolean {
    return this.engaged;
  }

  frameCount(): number {
    return this.frames;
  }
}

export function createTrackingSession(
  config: TrackingConfig,
  options: Omit<TrackingSessionOptions, "selector" | "gains"> = {}
): TrackingSession {
  return new TrackingSession({
    ...options,
    selector: { space: config.space, anchor: config.anchor },
    gains: config.controller
  });
}
