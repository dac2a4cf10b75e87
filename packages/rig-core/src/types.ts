import type { Matrix4, Quaternion, Vector3 } from "three";

export type RigMode = "MANUAL" | "AUTO";

/**
 * Camera pose as the host viewport exposes it. World is Z-up; the camera looks
 * down its local -Z, so local +Z points from the focus point toward the eye.
 */
export interface ViewPose {
  location: Vector3;
  orientation: Quaternion;
  distance: number;
  isPerspective: boolean;
}

export interface PoseDelta {
  location: Vector3;
  distance: number;
  rotation: Quaternion;
  locationSpeed: number;
  distanceSpeed: number;
  rotationSpeed: number;
}

export interface RigConfig {
  autoPilotEnabled: boolean;
  breakOnManual: boolean;
  distanceMultiplier: number;
  speed: number;
  friction: number;
  driftEnabled: boolean;
  driftIntensity: number;
}

export interface Velocity {
  linear: Vector3;
  zoom: number;
  angular: Quaternion;
}

export interface AutoTarget {
  focus: Vector3;
  distance: number;
  orientation: Quaternion;
}

export interface DriftOffset {
  position: Vector3;
  rotation: Quaternion;
}

export interface SelectedElement {
  index: number;
  /** Object-space position. */
  position: Vector3;
  /** Object-space normal, not necessarily unit length. */
  normal: Vector3;
}

export interface SelectionSnapshot {
  elements: SelectedElement[];
  matrixWorld: Matrix4;
}

export type PoseReadResult =
  | { ok: true; pose: ViewPose }
  | { ok: false; reason: "viewport-unavailable" };

export type SelectionReadResult =
  | { ok: true; selection: SelectionSnapshot }
  | { ok: false; reason: "not-editing" | "empty" };

export interface ViewportHost {
  listViewports(): string[];
  readPose(viewportId: string): PoseReadResult;
  writePose(viewportId: string, pose: ViewPose): void;
  requestRedraw(viewportId: string): void;
}

export interface SelectionSource {
  readSelection(): SelectionReadResult;
}

export interface Clock {
  /** Monotonic time in seconds. */
  now(): number;
}

export type ResetCause = "projection-flip" | "axis-aligned";

export type TickOutcome =
  | { status: "skipped"; reason: "viewport-unavailable" | "tick-failed" }
  | { status: "reset"; cause: ResetCause }
  | { status: "updated"; mode: RigMode; redraw: boolean; resting: boolean };

export interface RigStateSnapshot {
  mode: RigMode;
  isCoasting: boolean;
  coastingStartTime: number;
  velocity: Velocity;
  bufferedDeltas: number;
  autoTarget: AutoTarget;
  lastSelectionFingerprint: number;
  driftRamp: number;
  lastDriftOffset: DriftOffset;
  shakeSuppressed: boolean;
  lastMoveTime: number;
}
