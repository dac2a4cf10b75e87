import type { PoseReadResult, ViewPose, ViewportHost } from "@kinetic-viewport/rig-core";
import type { CameraViewport } from "./CameraViewport";

export class ThreeViewportHost implements ViewportHost {
  private readonly viewports = new Map<string, CameraViewport>();
  private readonly dirty = new Set<string>();

  constructor(private readonly onRedraw?: (viewportId: string) => void) {}

  add(viewportId: string, viewport: CameraViewport): void {
    this.viewports.set(viewportId, viewport);
  }

  remove(viewportId: string): void {
    this.viewports.delete(viewportId);
    this.dirty.delete(viewportId);
  }

  listViewports(): string[] {
    return [...this.viewports.keys()];
  }

  readPose(viewportId: string): PoseReadResult {
    const viewport = this.viewports.get(viewportId);
    if (!viewport) return { ok: false, reason: "viewport-unavailable" };
    return { ok: true, pose: viewport.readPose() };
  }

  writePose(viewportId: string, pose: ViewPose): void {
    this.viewports.get(viewportId)?.writePose(pose);
  }

  requestRedraw(viewportId: string): void {
    this.dirty.add(viewportId);
    this.onRedraw?.(viewportId);
  }

  /** True once per redraw request; the render loop calls this each frame. */
  consumeRedraw(viewportId: string): boolean {
    return this.dirty.delete(viewportId);
  }
}
