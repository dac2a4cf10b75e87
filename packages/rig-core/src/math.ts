import { Euler, Matrix4, Quaternion, Vector3 } from "three";
import type { PoseDelta, ViewPose } from "./types";

const WORLD_UP = new Vector3(0, 0, 1);
const LOCAL_X = new Vector3(1, 0, 0);
const LOCAL_Z = new Vector3(0, 0, 1);

/** Above this tilt the horizon is left alone. */
const STABILIZE_LIMIT = 0.99;
/** Tilt at which the levelled orientation starts blending back to the input. */
const STABILIZE_BLEND_START = 0.8;
const AXIS_ALIGNED_LIMIT = 0.9999;

export function identityQuaternion(): Quaternion {
  return new Quaternion(0, 0, 0, 1);
}

/** Shortest-arc rotation angle of a unit quaternion, in radians. */
export function rotationAngle(q: Quaternion): number {
  return 2 * Math.acos(Math.min(1, Math.abs(q.w)));
}

/** Camera +Z in world space (points from the focus point toward the eye). */
export function viewAxisZ(orientation: Quaternion): Vector3 {
  return LOCAL_Z.clone().applyQuaternion(orientation);
}

export function viewAxisX(orientation: Quaternion): Vector3 {
  return LOCAL_X.clone().applyQuaternion(orientation);
}

export function eyePosition(pose: ViewPose): Vector3 {
  return viewAxisZ(pose.orientation).multiplyScalar(pose.distance).add(pose.location);
}

export function clonePose(pose: ViewPose): ViewPose {
  return {
    location: pose.location.clone(),
    orientation: pose.orientation.clone(),
    distance: pose.distance,
    isPerspective: pose.isPerspective,
  };
}

export function posesEqual(a: ViewPose, b: ViewPose): boolean {
  return (
    a.location.equals(b.location) &&
    a.orientation.equals(b.orientation) &&
    a.distance === b.distance &&
    a.isPerspective === b.isPerspective
  );
}

export function measureDelta(last: ViewPose, current: ViewPose): PoseDelta {
  const location = current.location.clone().sub(last.location);
  const distance = current.distance - last.distance;
  const rotation = current.orientation.clone().multiply(last.orientation.clone().invert());
  if (rotation.w < 0) {
    rotation.set(-rotation.x, -rotation.y, -rotation.z, -rotation.w);
  }
  return {
    location,
    distance,
    rotation,
    locationSpeed: location.length(),
    distanceSpeed: Math.abs(distance),
    rotationSpeed: rotationAngle(rotation),
  };
}

/** True when the camera looks exactly along a world axis. */
export function isAxisAligned(orientation: Quaternion): boolean {
  const viewZ = viewAxisZ(orientation);
  return (
    Math.abs(viewZ.x) > AXIS_ALIGNED_LIMIT ||
    Math.abs(viewZ.y) > AXIS_ALIGNED_LIMIT ||
    Math.abs(viewZ.z) > AXIS_ALIGNED_LIMIT
  );
}

export function averageVectors(buffer: readonly Vector3[]): Vector3 {
  const total = new Vector3();
  if (!buffer.length) return total;
  for (const v of buffer) total.add(v);
  return total.divideScalar(buffer.length);
}

export function averageScalars(buffer: readonly number[]): number {
  if (!buffer.length) return 0;
  return buffer.reduce((acc, v) => acc + v, 0) / buffer.length;
}

/** Component-wise sum, renormalised. Identity when the sum vanishes. */
export function averageQuaternions(buffer: readonly Quaternion[]): Quaternion {
  const sum = new Quaternion(0, 0, 0, 0);
  for (const q of buffer) {
    sum.set(sum.x + q.x, sum.y + q.y, sum.z + q.z, sum.w + q.w);
  }
  if (sum.length() < 1e-8) return identityQuaternion();
  return sum.normalize();
}

/** Rotation whose application matches Euler angles applied about X, then Y, then Z. */
export function eulerXYZ(x: number, y: number, z: number): Quaternion {
  return new Quaternion().setFromEuler(new Euler(x, y, z, "ZYX"));
}

/**
 * Orientation whose local `axis` points along `direction` with local +Y kept
 * as close to world up as possible.
 */
export function trackQuaternion(direction: Vector3, axis: "Z" | "-Z"): Quaternion {
  const z = direction.clone().normalize();
  if (axis === "-Z") z.negate();
  const x = new Vector3().crossVectors(WORLD_UP, z);
  if (x.lengthSq() < 1e-10) {
    x.set(1, 0, 0);
  }
  x.normalize();
  const y = new Vector3().crossVectors(z, x).normalize();
  x.crossVectors(y, z);
  return new Quaternion().setFromRotationMatrix(new Matrix4().makeBasis(x, y, z));
}

/**
 * Rolls the camera so its right axis lies in the ground plane. Near-vertical
 * views blend back toward the input and pass through unchanged above 0.99 tilt.
 */
export function stabilizeHorizon(orientation: Quaternion): Quaternion {
  const viewZ = viewAxisZ(orientation);
  const tilt = Math.abs(viewZ.z);
  if (tilt > STABILIZE_LIMIT) return orientation.clone();

  const viewX = viewAxisX(orientation);
  const flatX = new Vector3(viewX.x, viewX.y, 0);
  if (flatX.lengthSq() < 0.001) return orientation.clone();

  // Horizontal right axis perpendicular to the view, on the same side as the current one.
  const levelX = new Vector3().crossVectors(WORLD_UP, viewZ).normalize();
  if (levelX.dot(flatX) < 0) levelX.negate();
  const levelY = new Vector3().crossVectors(viewZ, levelX);
  const levelled = new Quaternion().setFromRotationMatrix(new Matrix4().makeBasis(levelX, levelY, viewZ));

  if (tilt > STABILIZE_BLEND_START) {
    const factor = (tilt - STABILIZE_BLEND_START) / (STABILIZE_LIMIT - STABILIZE_BLEND_START);
    return levelled.slerp(orientation, factor);
  }
  return levelled;
}
