import { Vector3 } from "three";
import type { PoseDelta, Velocity, ViewPose } from "./types";
import {
  averageQuaternions,
  averageScalars,
  averageVectors,
  identityQuaternion,
  rotationAngle,
  stabilizeHorizon,
} from "./math";

export const DEADZONE = 0.0005;
const BUFFER_CAPACITY = 3;
const MIN_LINEAR_SPEED = 0.001;
const MIN_ZOOM_SPEED = 0.001;
const MIN_ANGULAR_SPEED = 0.0001;
/** Angular release speed above which the translational velocity is dropped. */
const FLICK_ANGLE = 0.003;
const MIN_DISTANCE = 0.01;
const STABILIZE_RAMP_SECONDS = 0.5;
const STABILIZE_MAX_BLEND = 0.1;
/** Idle time after a drag before sway may resume when no coast started. */
export const SWAY_RESUME_DELAY = 0.5;

type BufferedDelta = Pick<PoseDelta, "location" | "distance" | "rotation">;

export type ReleaseResult = { velocity: Velocity; coasting: boolean };

export function isMoving(delta: PoseDelta): boolean {
  return delta.locationSpeed > DEADZONE || delta.distanceSpeed > DEADZONE || delta.rotationSpeed > DEADZONE;
}

export function coastFriction(friction: number): number {
  return Math.max(0, 0.98 - 0.08 * friction);
}

function hasEnergy(velocity: Velocity): boolean {
  return (
    velocity.linear.length() > MIN_LINEAR_SPEED ||
    Math.abs(velocity.zoom) > MIN_ZOOM_SPEED ||
    rotationAngle(velocity.angular) > MIN_ANGULAR_SPEED
  );
}

function zeroVelocity(): Velocity {
  return { linear: new Vector3(), zoom: 0, angular: identityQuaternion() };
}

export class ManualPhysics {
  private buffer: BufferedDelta[] = [];
  private velocity: Velocity = zeroVelocity();
  private coasting = false;
  private coastingStartTime = 0;
  private shakeSuppressed = false;
  private lastMoveTime = 0;

  /**
   * Feeds one tick of host-side motion. While dragging, deltas are buffered;
   * on the first still tick the buffer is turned into a release velocity.
   */
  observe(delta: PoseDelta, now: number): ReleaseResult | null {
    if (isMoving(delta)) {
      this.coasting = false;
      this.shakeSuppressed = true;
      this.lastMoveTime = now;
      this.buffer.push({
        location: delta.location.clone(),
        distance: delta.distance,
        rotation: delta.rotation.clone(),
      });
      if (this.buffer.length > BUFFER_CAPACITY) {
        this.buffer.shift();
      }
      return null;
    }

    if (this.coasting || !this.buffer.length) {
      if (this.shakeSuppressed && !this.coasting && now - this.lastMoveTime >= SWAY_RESUME_DELAY) {
        this.shakeSuppressed = false;
      }
      return null;
    }

    return this.release(now);
  }

  /**
   * Applies one tick of coasting to `pose`. Returns true when the pose moved.
   */
  integrate(pose: ViewPose, friction: number, now: number): boolean {
    if (!this.coasting) return false;

    const f = coastFriction(friction);
    this.velocity.linear.multiplyScalar(f);
    this.velocity.zoom *= f;
    this.velocity.angular.slerp(identityQuaternion(), 1 - f);

    if (!hasEnergy(this.velocity)) {
      this.coasting = false;
      return false;
    }

    pose.location.add(this.velocity.linear);

    const predicted = pose.distance + this.velocity.zoom;
    if (predicted < MIN_DISTANCE) {
      pose.distance = MIN_DISTANCE;
      this.velocity.zoom = 0;
    } else {
      pose.distance = predicted;
    }

    const raw = this.velocity.angular.clone().multiply(pose.orientation);
    const level = stabilizeHorizon(raw);
    const elapsed = now - this.coastingStartTime;
    const blend =
      elapsed < STABILIZE_RAMP_SECONDS ? (elapsed / STABILIZE_RAMP_SECONDS) * STABILIZE_MAX_BLEND : STABILIZE_MAX_BLEND;
    pose.orientation.copy(raw.slerp(level, blend));
    return true;
  }

  wipe(): void {
    this.buffer = [];
    this.velocity = zeroVelocity();
    this.coasting = false;
  }

  isCoasting(): boolean {
    return this.coasting;
  }

  isSwaySuppressed(): boolean {
    return this.shakeSuppressed;
  }

  getVelocity(): Velocity {
    return {
      linear: this.velocity.linear.clone(),
      zoom: this.velocity.zoom,
      angular: this.velocity.angular.clone(),
    };
  }

  getBufferedCount(): number {
    return this.buffer.length;
  }

  getCoastingStartTime(): number {
    return this.coastingStartTime;
  }

  getLastMoveTime(): number {
    return this.lastMoveTime;
  }

  private release(now: number): ReleaseResult {
    const velocity: Velocity = {
      linear: averageVectors(this.buffer.map((d) => d.location)),
      zoom: averageScalars(this.buffer.map((d) => d.distance)),
      angular: averageQuaternions(this.buffer.map((d) => d.rotation)),
    };
    this.buffer = [];
    this.velocity = velocity;

    const coasting = hasEnergy(velocity);
    if (coasting) {
      this.coasting = true;
      this.coastingStartTime = now;
      this.shakeSuppressed = false;
      if (rotationAngle(velocity.angular) > FLICK_ANGLE) {
        velocity.linear.set(0, 0, 0);
      }
    }
    return {
      velocity: { linear: velocity.linear.clone(), zoom: velocity.zoom, angular: velocity.angular.clone() },
      coasting,
    };
  }
}
