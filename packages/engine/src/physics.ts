/** m/s² */
export const ACCELERATION = 2.0;
/** m/s² */
export const NORMAL_BRAKING = 3.0;
/** m/s² */
export const EMERGENCY_BRAKING = 5.0;
/** 40 km/h, in m/s. */
export const MAX_SPEED = 11.11;
/** Metres from a target that count as arrived. */
export const ARRIVAL_THRESHOLD = 0.5;

export function brakingDistance(speed: number, deceleration: number): number {
  return (speed * speed) / (2 * deceleration);
}

/** Distance covered over `deltaSeconds` at the mean of the two speeds. */
export function trapezoidDistance(fromSpeed: number, toSpeed: number, deltaSeconds: number): number {
  return ((fromSpeed + toSpeed) / 2) * deltaSeconds;
}
