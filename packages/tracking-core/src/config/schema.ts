import { z } from "zod";

import { DEFAULT_CONTROLLER_GAINS } from "../control/config";
import type { ControllerGains } from "../control/config";
import { DEFAULT_SCREEN_SIZE } from "../geometry/coordinate";

// Only type and finiteness are checked; ranges (negative maxSpeed, alpha > 1) pass through.
const finite = z.number().finite();

export const controllerGainsSchema = z.object({
  kp: finite.default(DEFAULT_CONTROLLER_GAINS.kp),
  kd: finite.default(DEFAULT_CONTROLLER_GAINS.kd),
  alpha: finite.default(DEFAULT_CONTROLLER_GAINS.alpha),
  deadZone: finite.default(DEFAULT_CONTROLLER_GAINS.deadZone),
  maxSpeed: finite.default(DEFAULT_CONTROLLER_GAINS.maxSpeed)
});

export const gainsUpdateSchema = z
  .object({
    kp: finite,
    kd: finite,
    alpha: finite,
    deadZone: finite,
    maxSpeed: finite
  })
  .partial()
  .strict();

export const trackingConfigSchema = z.object({
  space: z
    .object({
      width: finite.default(DEFAULT_SCREEN_SIZE.width),
      height: finite.default(DEFAULT_SCREEN_SIZE.height)
    })
    .default({}),
  anchor: z.object({ x: finite, y: finite }).optional(),
  controller: controllerGainsSchema.default({})
});

export type TrackingConfig = z.infer<typeof trackingConfigSchema>;

export class TrackingConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid tracking config: ${issues.join("; ")}`);
    this.name = "TrackingConfigError";
    this.issues = issues;
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

export function parseTrackingConfig(input: unknown): TrackingConfig {
  const result = trackingConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new TrackingConfigError(describeIssues(result.error));
  }
  return result.data;
}

export function parseGainsUpdate(input: unknown): Partial<ControllerGains> {
  const result = gainsUpdateSchema.safeParse(input);
  if (!result.success) {
    throw new TrackingConfigError(describeIssues(result.error));
  }
  return result.data;
}
