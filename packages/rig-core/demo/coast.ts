import { Vector3 } from "three";
import { KineticRig, eulerXYZ, resolveRigConfig } from "../src";
import type { ViewPose } from "../src";

const rig = new KineticRig();
const config = resolveRigConfig({ autoPilotEnabled: false, driftEnabled: false });
let pose: ViewPose = { location: new Vector3(), orientation: eulerXYZ(1, 0, 0.4), distance: 10, isPerspective: true };

for (let tick = 0; tick < 40; tick++) {
  // Three ticks of dragging to the right, then hands off.
  if (tick >= 1 && tick <= 3) {
    pose = { ...pose, location: pose.location.clone().add(new Vector3(0.1, 0, 0)) };
  }
  const result = rig.tick({ pose, config, now: tick * 0.01 });
  if (result.pose) pose = result.pose;
}

console.log("Focus after coasting:", pose.location.toArray(), rig.getState());
