import type { AutoTarget, PoseDelta, ViewPose } from "./types";
import { stabilizeHorizon } from "./math";

export interface BreakTolerance {
  location: number;
  rotation: number;
}

/** Per-tick motion above which auto-pilot yields to the user. Grows with sway intensity. */
export function breakTolerance(driftIntensity: number): BreakTolerance {
  return {
    location: 0.01 + driftIntensity * 0.2,
    rotation: 0.008 + driftIntensity * 0.1,
  };
}

export function exceedsTolerance(delta: PoseDelta, tolerance: BreakTolerance): boolean {
  return delta.locationSpeed > tolerance.location || delta.rotationSpeed > tolerance.rotation;
}

/**
 * One step of exponential approach toward `target`. Never lands exactly;
 * each tick covers `speed / 10` of the remaining gap.
 */
export function stepAutoPilot(pose: ViewPose, target: AutoTarget, speed: number): void {
  const t = speed / 10;
  pose.location.lerp(target.focus, t);
  pose.distance += (target.distance - pose.distance) * t;
  pose.orientation.copy(stabilizeHorizon(pose.orientation.clone().slerp(target.orientation, t)));
}
