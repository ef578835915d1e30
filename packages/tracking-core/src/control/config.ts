export type ControllerGains = {
  kp: number;
  kd: number;
  alpha: number;
  deadZone: number;
  maxSpeed: number;
};

export const DEFAULT_CONTROLLER_GAINS: ControllerGains = {
  kp: 0.15,
  kd: 0.05,
  alpha: 0.85,
  deadZone: 5,
  maxSpeed: 30
};
