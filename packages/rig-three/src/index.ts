export * from "./CameraViewport";
export * from "./ThreeViewportHost";
export * from "./MeshSelectionSource";
