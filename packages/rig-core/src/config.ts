import type { RigConfig } from "./types";

const DEFAULTS: RigConfig = {
  autoPilotEnabled: true,
  breakOnManual: true,
  distanceMultiplier: 3,
  speed: 0.03,
  friction: 0.12,
  driftEnabled: true,
  driftIntensity: 0.2,
};

type NumericKey = "distanceMultiplier" | "speed" | "friction" | "driftIntensity";

const RANGES: Record<NumericKey, [number, number]> = {
  distanceMultiplier: [0.5, 5],
  speed: [0, 3],
  friction: [0, 2],
  driftIntensity: [0, 1],
};

/** Seconds between selection scans. */
export const SCAN_INTERVAL = 0.1;
/** Nominal seconds between ticks while anything moves. */
export const TICK_INTERVAL = 0.01;
/** Seconds between ticks once every rig is at rest. */
export const IDLE_TICK_INTERVAL = 0.1;

function clampSetting(key: NumericKey, value: number): number {
  if (!Number.isFinite(value)) return DEFAULTS[key];
  const [min, max] = RANGES[key];
  return Math.min(Math.max(value, min), max);
}

export function resolveRigConfig(config?: Partial<RigConfig>): RigConfig {
  const merged: RigConfig = { ...DEFAULTS, ...(config ?? {}) };
  return {
    ...merged,
    distanceMultiplier: clampSetting("distanceMultiplier", merged.distanceMultiplier),
    speed: clampSetting("speed", merged.speed),
    friction: clampSetting("friction", merged.friction),
    driftIntensity: clampSetting("driftIntensity", merged.driftIntensity),
  };
}

export { DEFAULTS as defaultRigConfig };
