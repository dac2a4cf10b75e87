import * as THREE from "three";
import type { ViewPose } from "@kinetic-viewport/rig-core";

export type ViewportCamera = THREE.PerspectiveCamera | THREE.OrthographicCamera;

export interface CameraViewportOptions {
  focus?: THREE.Vector3;
  distance?: number;
  /** Distance at which an orthographic camera renders at zoom 1. */
  orthoReferenceDistance?: number;
}

/**
 * A three.js camera orbiting a focus point at a distance, exposed as a
 * `ViewPose`. The camera's own quaternion is the view orientation.
 */
export class CameraViewport {
  private camera: ViewportCamera;
  private readonly focus: THREE.Vector3;
  private distance: number;
  private readonly orthoReferenceDistance: number;

  constructor(camera: ViewportCamera, options: CameraViewportOptions = {}) {
    this.camera = camera;
    this.focus = options.focus?.clone() ?? new THREE.Vector3();
    this.distance = options.distance ?? 10;
    this.orthoReferenceDistance = options.orthoReferenceDistance ?? 10;
    this.syncCamera();
  }

  readPose(): ViewPose {
    return {
      location: this.focus.clone(),
      orientation: this.camera.quaternion.clone(),
      distance: this.distance,
      isPerspective: this.camera instanceof THREE.PerspectiveCamera,
    };
  }

  writePose(pose: ViewPose): void {
    this.focus.copy(pose.location);
    this.distance = pose.distance;
    this.camera.quaternion.copy(pose.orientation);
    this.syncCamera();
  }

  /** Swaps the active camera, carrying the current orientation over. */
  setCamera(camera: ViewportCamera): void {
    camera.quaternion.copy(this.camera.quaternion);
    this.camera = camera;
    this.syncCamera();
  }

  getCamera(): ViewportCamera {
    return this.camera;
  }

  private syncCamera(): void {
    const camera = this.camera;
    const offset = new THREE.Vector3(0, 0, this.distance).applyQuaternion(camera.quaternion);
    camera.position.copy(this.focus).add(offset);
    if (camera instanceof THREE.OrthographicCamera) {
      camera.zoom = this.orthoReferenceDistance / this.distance;
      camera.updateProjectionMatrix();
    }
    camera.updateMatrixWorld();
  }
}
