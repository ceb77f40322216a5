/** In-process display surface for headless rendering and tests. */

import type { Rect } from '../models/geometry.js';
import type { DisplaySurface, SceneItemBase, ScenePrimitive } from '../models/scene.js';
import { unionRects } from '../utils/geometry.js';

export class MemorySurface implements DisplaySurface {
  private readonly contents = new Set<SceneItemBase>();

  add(item: SceneItemBase): void {
    this.contents.add(item);
  }

  remove(item: SceneItemBase): void {
    this.contents.delete(item);
  }

  clear(): void {
    this.contents.clear();
  }

  items(): SceneItemBase[] {
    return [...this.contents];
  }

  itemsBoundingRect(): Rect | null {
    return unionRects(this.items().map((item) => item.bounds()));
  }

  find(id: string): SceneItemBase | undefined {
    for (const item of this.contents) {
      if (item.id === id) return item;
    }
    return undefined;
  }

  get size(): number {
    return this.contents.size;
  }

  /** Plain-data view of everything on the surface, in insertion order. */
  snapshot(): ScenePrimitive[] {
    return this.items().map((item) => item.describe());
  }
}
