import { Matrix3, Quaternion, Vector3 } from "three";
import type { SelectionReadResult, SelectionSnapshot, SelectionSource } from "./types";
import { SCAN_INTERVAL } from "./config";
import { eulerXYZ, trackQuaternion } from "./math";

const NORMAL_VIEW_OFFSET = eulerXYZ(0.463647, 0.785398, 0);
const LOOK_AT_OFFSET = eulerXYZ(0.349, 0.349, 0);
const MIN_AXIS_LENGTH_SQ = 0.001;

export interface SelectionTarget {
  fingerprint: number;
  centroid: Vector3;
  radius: number;
  orientation: Quaternion;
}

/**
 * Cheap order-independent summary of which elements are selected. Distinct
 * selections can collide (e.g. indices {1, 2} and {0, 3}).
 */
export function selectionFingerprint(selection: SelectionSnapshot): number {
  let indexSum = 0;
  for (const element of selection.elements) indexSum += element.index;
  return selection.elements.length + indexSum;
}

/**
 * Centroid, framing radius and viewing orientation for a selection. `eye`
 * and `current` are used when the selection has no usable normal.
 */
export function computeSelectionTarget(
  selection: SelectionSnapshot,
  eye: Vector3,
  current: Quaternion
): SelectionTarget | null {
  const { elements, matrixWorld } = selection;
  if (!elements.length) return null;

  const worldPoints = elements.map((e) => e.position.clone().applyMatrix4(matrixWorld));
  const centroid = new Vector3();
  for (const p of worldPoints) centroid.add(p);
  centroid.divideScalar(worldPoints.length);

  let radius = 0;
  for (const p of worldPoints) radius = Math.max(radius, p.distanceTo(centroid));

  const normalSum = new Vector3();
  for (const e of elements) normalSum.add(e.normal);
  normalSum.applyMatrix3(new Matrix3().setFromMatrix4(matrixWorld));

  let orientation: Quaternion;
  if (normalSum.lengthSq() > MIN_AXIS_LENGTH_SQ) {
    orientation = trackQuaternion(normalSum, "Z").multiply(NORMAL_VIEW_OFFSET);
  } else {
    const direction = centroid.clone().sub(eye);
    orientation =
      direction.lengthSq() > MIN_AXIS_LENGTH_SQ
        ? trackQuaternion(direction, "-Z").multiply(LOOK_AT_OFFSET)
        : current.clone();
  }

  return { fingerprint: selectionFingerprint(selection), centroid, radius, orientation };
}

/**
 * Rate-limited selection polling. Reports a target only when the selection
 * fingerprint differs from the last one seen.
 */
export class SelectionScanner {
  private lastScanTime = Number.NEGATIVE_INFINITY;
  private lastFingerprint = 0;

  scan(source: SelectionSource, now: number, eye: Vector3, current: Quaternion): SelectionTarget | null {
    if (now - this.lastScanTime <= SCAN_INTERVAL) return null;
    this.lastScanTime = now;

    const result: SelectionReadResult = source.readSelection();
    if (!result.ok) return null;

    const fingerprint = selectionFingerprint(result.selection);
    if (fingerprint === this.lastFingerprint) return null;

    const target = computeSelectionTarget(result.selection, eye, current);
    if (!target) return null;
    this.lastFingerprint = fingerprint;
    return target;
  }

  getLastFingerprint(): number {
    return this.lastFingerprint;
  }
}
