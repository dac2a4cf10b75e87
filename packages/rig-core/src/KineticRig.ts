import { Vector3 } from "three";
import type {
  AutoTarget,
  RigConfig,
  RigMode,
  RigStateSnapshot,
  SelectionSource,
  TickOutcome,
  ViewPose,
} from "./types";
import { DriftEngine } from "./drift";
import { ManualPhysics, isMoving } from "./ManualPhysics";
import { SelectionScanner } from "./selection";
import { breakTolerance, exceedsTolerance, stepAutoPilot } from "./autopilot";
import { clonePose, eyePosition, identityQuaternion, isAxisAligned, measureDelta, posesEqual } from "./math";

const DRIFT_MIN_INTENSITY = 0.001;
const RAMP_EPSILON = 0.001;

export interface RigTickInput {
  pose: ViewPose;
  config: RigConfig;
  now: number;
  selection?: SelectionSource;
}

export interface RigTickResult {
  outcome: TickOutcome;
  /** The pose to write back, or null when the host pose is left untouched. */
  pose: ViewPose | null;
}

/**
 * Per-viewport camera rig. Each tick compares the host pose with the pose the
 * rig last wrote, then runs auto-pilot or manual physics and layers idle sway
 * on top.
 */
export class KineticRig {
  private mode: RigMode = "MANUAL";
  private history: ViewPose | null = null;
  private autoTarget: AutoTarget = {
    focus: new Vector3(),
    distance: 10,
    orientation: identityQuaternion(),
  };
  private readonly physics = new ManualPhysics();
  private readonly drift = new DriftEngine();
  private readonly scanner = new SelectionScanner();

  tick({ pose, config, now, selection }: RigTickInput): RigTickResult {
    const current = clonePose(pose);
    if (!this.history) {
      this.history = clonePose(current);
    }
    const last = this.history;

    const resetCause =
      current.isPerspective !== last.isPerspective
        ? "projection-flip"
        : isAxisAligned(current.orientation)
          ? "axis-aligned"
          : null;
    if (resetCause) {
      this.physics.wipe();
      this.drift.clearOffsets();
      this.history = current;
      return { outcome: { status: "reset", cause: resetCause }, pose: null };
    }

    const delta = measureDelta(last, current);
    const moving = isMoving(delta);

    if (selection && config.autoPilotEnabled) {
      const target = this.scanner.scan(selection, now, eyePosition(current), current.orientation);
      if (target) {
        this.mode = "AUTO";
        this.autoTarget = {
          focus: target.centroid,
          distance: (target.radius + 0.5) * config.distanceMultiplier,
          orientation: target.orientation,
        };
        this.physics.wipe();
      }
    }

    if (this.mode === "AUTO" && !config.autoPilotEnabled) {
      this.mode = "MANUAL";
    }

    const next = clonePose(current);
    if (this.mode === "AUTO") {
      if (config.breakOnManual && exceedsTolerance(delta, breakTolerance(config.driftIntensity))) {
        this.mode = "MANUAL";
      } else {
        stepAutoPilot(next, this.autoTarget, config.speed);
      }
    } else {
      this.physics.observe(delta, now);
      this.physics.integrate(next, config.friction, now);
    }

    const swayActive =
      config.driftEnabled &&
      config.driftIntensity > DRIFT_MIN_INTENSITY &&
      this.mode === "MANUAL" &&
      !moving &&
      !this.physics.isSwaySuppressed();
    this.drift.update(next, swayActive, config.driftIntensity, now);

    const changed = !posesEqual(next, current);
    this.history = changed ? next : current;

    const resting =
      this.mode === "MANUAL" &&
      !moving &&
      !this.physics.isCoasting() &&
      !swayActive &&
      this.drift.getRamp() <= RAMP_EPSILON;

    return {
      outcome: { status: "updated", mode: this.mode, redraw: changed, resting },
      pose: changed ? clonePose(next) : null,
    };
  }

  getState(): RigStateSnapshot {
    return {
      mode: this.mode,
      isCoasting: this.physics.isCoasting(),
      coastingStartTime: this.physics.getCoastingStartTime(),
      velocity: this.physics.getVelocity(),
      bufferedDeltas: this.physics.getBufferedCount(),
      autoTarget: {
        focus: this.autoTarget.focus.clone(),
        distance: this.autoTarget.distance,
        orientation: this.autoTarget.orientation.clone(),
      },
      lastSelectionFingerprint: this.scanner.getLastFingerprint(),
      driftRamp: this.drift.getRamp(),
      lastDriftOffset: this.drift.getLastOffset(),
      shakeSuppressed: this.physics.isSwaySuppressed(),
      lastMoveTime: this.physics.getLastMoveTime(),
    };
  }
}
