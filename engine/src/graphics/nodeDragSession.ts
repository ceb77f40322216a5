import type { Point } from '../models/geometry.js';
import type { InteractiveNode } from './interactiveNode.js';

/**
 * Moves a group of selected nodes together. Every `dragTo` repositions each
 * node by the total delta from where the drag began (edges follow through the
 * nodes' dependents); geometry is persisted once, on `release`.
 */
export class NodeDragSession {
  private readonly origins: Map<InteractiveNode, Point>;
  private readonly anchor: Point;
  private finished = false;

  constructor(nodes: InteractiveNode[], anchor: Point) {
    this.anchor = { ...anchor };
    this.origins = new Map(nodes.map((node): [InteractiveNode, Point] => {
      const { x, y } = node.getRect();
      return [node, { x, y }];
    }));
  }

  get size(): number {
    return this.origins.size;
  }

  dragTo(point: Point): void {
    if (this.finished) return;
    const dx = point.x - this.anchor.x;
    const dy = point.y - this.anchor.y;
    for (const [node, origin] of this.origins) {
      node.setPosition(origin.x + dx, origin.y + dy);
    }
  }

  release(): void {
    if (this.finished) return;
    this.finished = true;
    for (const node of this.origins.keys()) node.release();
  }
}
