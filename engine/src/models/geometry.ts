/** Geometry primitives and the records kept by the position store. */

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** `[dx, dy]` offset or `[x, y]` coordinate as persisted on disk. */
export type Vec2 = [number, number];

export interface NodeGeometry {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Persisted edge routing. Offsets are relative to the owning node's center;
 * control points are absolute scene coordinates.
 */
export interface EdgeGeometry {
  useBezier: boolean;
  startOffset?: Vec2;
  endOffset?: Vec2;
  control1?: Vec2;
  control2?: Vec2;
}

export interface PositionState {
  nodes: Record<string, NodeGeometry>;
  edges: Record<string, EdgeGeometry>;
}
