export * from "./types";
export * from "./KineticRig";
export * from "./RigSession";
export * from "./ManualPhysics";
export * from "./autopilot";
export * from "./selection";
export * from "./drift";
export * from "./math";
export * from "./config";
export * from "./logger";
