import { Vector2Filter } from "../filters/vectorFilter";
import { add, magnitude, scale, subtract } from "../geometry/point";
import type { Point2D } from "../geometry/point";
import { DEFAULT_CONTROLLER_GAINS } from "./config";
import type { ControllerGains } from "./config";
import type { ControllerPhase, ControllerState } from "./types";

/**
 * PD controller with exponential output smoothing and a speed clamp.
 *
 * Inside the dead zone the output is zero and only the stored error advances;
 * the smoothing baseline keeps the last active output so leaving the dead zone
 * does not start from a spurious zero.
 *
 * `dt` must be positive. Gains are not range-checked: a negative `maxSpeed`
 * flips the output, and with a zero smoothed output it yields NaN, which stays
 * in the smoothing baseline until `reset()`.
 */
export class AimController {
  private gains: Readonly<ControllerGains>;
  private previousError: Point2D = { x: 0, y: 0 };
  private readonly smoother = new Vector2Filter();
  private phase: ControllerPhase = "idle";

  constructor(gains: Partial<ControllerGains> = {}) {
    this.gains = Object.freeze({ ...DEFAULT_CONTROLLER_GAINS, ...stripUndefined(gains) });
  }

  compute(cursor: Point2D, target: Point2D, dt = 1): Point2D {
    const { kp, kd, alpha, deadZone, maxSpeed } = this.gains;

    const error = subtract(target, cursor);
    const distance = magnitude(error);

    if (distance < deadZone) {
      this.previousError = error;
      this.phase = "idle";
      return { x: 0, y: 0 };
    }

    const proportional = scale(error, kp);
    const derivative = {
      x: (kd * (error.x - this.previousError.x)) / dt,
      y: (kd * (error.y - this.previousError.y)) / dt
    };
    const raw = add(proportional, derivative);

    let smoothed = this.smoother.blend(raw, alpha);
    const speed = magnitude(smoothed);
    if (speed > maxSpeed) {
      smoothed = scale(smoothed, maxSpeed / speed);
    }

    this.previousError = error;
    this.smoother.commit(smoothed);
    this.phase = "active";
    return smoothed;
  }

  reset(): void {
    this.previousError = { x: 0, y: 0 };
    this.smoother.reset();
    this.phase = "idle";
  }

  updateParams(update: Partial<ControllerGains>): void {
    this.gains = Object.freeze({ ...this.gains, ...stripUndefined(update) });
  }

  getGains(): Readonly<ControllerGains> {
    return this.gains;
  }

  getState(): ControllerState {
    return {
      previousError: { x: this.previousError.x, y: this.previousError.y },
      previousOutput: this.smoother.current()
    };
  }

  getPhase(): ControllerPhase {
    return this.phase;
  }
}

function stripUndefined(update: Partial<ControllerGains>): Partial<ControllerGains> {
  const result: Partial<ControllerGains> = {};
  if (update.kp !== undefined) result.kp = update.kp;
  if (update.kd !== undefined) result.kd = update.kd;
  if (update.alpha !== undefined) result.alpha = update.alpha;
  if (update.deadZone !== undefined) result.deadZone = update.deadZone;
  if (update.maxSpeed !== undefined) result.maxSpeed = update.maxSpeed;
  return result;
}
