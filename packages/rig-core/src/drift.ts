import { Vector3 } from "three";
import type { DriftOffset, ViewPose } from "./types";
import { eulerXYZ, identityQuaternion } from "./math";

const RAMP_RATE = 0.01;
const RAMP_EPSILON = 0.001;
const POSITION_SCALE = 0.05;
const ROTATION_SCALE = 0.2;

/**
 * Idle sway at time `t` (seconds). Frequencies are kept mutually
 * incommensurate so the motion never reads as a loop.
 */
export function sampleDrift(t: number, intensity: number, ramp: number): DriftOffset {
  const strength = intensity * POSITION_SCALE * ramp;
  const rotStrength = strength * ROTATION_SCALE;

  const position = new Vector3(
    (Math.sin(t * 1.2) + Math.cos(t * 2.1) * 0.5) * strength,
    (Math.cos(t * 1.4) + Math.sin(t * 2.4) * 0.5) * strength,
    Math.sin(t * 0.5) * 0.5 * strength
  );
  const rotation = eulerXYZ(
    Math.sin(t * 0.8) * rotStrength,
    Math.cos(t * 1.1) * rotStrength,
    Math.sin(t * 1.6) * rotStrength * 0.5
  );
  return { position, rotation };
}

export class DriftEngine {
  private ramp = 0;
  private lastOffset: DriftOffset = { position: new Vector3(), rotation: identityQuaternion() };

  /**
   * Advances the ramp toward 1 (`active`) or 0 and applies this tick's sway
   * increment to `pose`. Returns true when the pose was changed.
   */
  update(pose: ViewPose, active: boolean, intensity: number, t: number): boolean {
    const target = active ? 1 : 0;
    this.ramp = Math.min(1, Math.max(0, this.ramp + (target - this.ramp) * RAMP_RATE));

    if (this.ramp <= RAMP_EPSILON) {
      this.clearOffsets();
      return false;
    }

    const offset = sampleDrift(t, intensity, this.ramp);
    const deltaPosition = offset.position
      .clone()
      .sub(this.lastOffset.position)
      .applyQuaternion(pose.orientation);
    pose.location.add(deltaPosition);

    const deltaRotation = offset.rotation.clone().multiply(this.lastOffset.rotation.clone().invert());
    pose.orientation.premultiply(deltaRotation);

    this.lastOffset = offset;
    return true;
  }

  clearOffsets(): void {
    if (this.lastOffset.position.lengthSq() > 0 || this.lastOffset.rotation.w !== 1) {
      this.lastOffset = { position: new Vector3(), rotation: identityQuaternion() };
    }
  }

  getRamp(): number {
    return this.ramp;
  }

  getLastOffset(): DriftOffset {
    return { position: this.lastOffset.position.clone(), rotation: this.lastOffset.rotation.clone() };
  }
}
