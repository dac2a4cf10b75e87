import * as THREE from "three";
import type { SelectedElement, SelectionReadResult, SelectionSource } from "@kinetic-viewport/rig-core";

/**
 * Vertex selection on a single mesh, as an editor's edit mode would expose
 * it. Indices past the end of the geometry are ignored.
 */
export class MeshSelectionSource implements SelectionSource {
  private editing = false;
  private readonly selected = new Set<number>();

  constructor(private readonly mesh: THREE.Mesh) {}

  setEditing(editing: boolean): void {
    this.editing = editing;
  }

  select(indices: Iterable<number>): void {
    for (const index of indices) this.selected.add(index);
  }

  deselectAll(): void {
    this.selected.clear();
  }

  readSelection(): SelectionReadResult {
    if (!this.editing) return { ok: false, reason: "not-editing" };

    const geometry = this.mesh.geometry;
    const positions = geometry.getAttribute("position");
    const normals = geometry.hasAttribute("normal") ? geometry.getAttribute("normal") : null;

    const elements: SelectedElement[] = [];
    for (const index of [...this.selected].sort((a, b) => a - b)) {
      if (index < 0 || index >= positions.count) continue;
      elements.push({
        index,
        position: new THREE.Vector3().fromBufferAttribute(positions, index),
        normal: normals ? new THREE.Vector3().fromBufferAttribute(normals, index) : new THREE.Vector3(),
      });
    }
    if (!elements.length) return { ok: false, reason: "empty" };

    this.mesh.updateMatrixWorld();
    return { ok: true, selection: { elements, matrixWorld: this.mesh.matrixWorld.clone() } };
  }
}
