/** Pure geometry helpers shared by nodes, edges and sequence items. */

import type { Point, Rect, Vec2 } from '../models/geometry.js';
import {
  BEZIER_ALONG_RATIO,
  BEZIER_MIN_ALONG,
  BEZIER_NORMAL,
  POINT_TOLERANCE,
} from './constants.js';

export function rectCenter(rect: Rect): Point {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

export function midpoint(a: Point, b: Point): Point {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
}

export function offsetPoint(origin: Point, offset: Vec2): Point {
  return { x: origin.x + offset[0], y: origin.y + offset[1] };
}

export function toVec2(p: Point): Vec2 {
  return [p.x, p.y];
}

export function fromVec2(v: Vec2): Point {
  return { x: v[0], y: v[1] };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Where a ray from the rectangle's center toward `target` leaves the rectangle.
 * The dominant axis picks the crossed side; the other coordinate is clamped to
 * that side, so steep rays land on a corner. A target at the center returns the center.
 */
export function connectionPoint(rect: Rect, target: Point): Point {
  const center = rectCenter(rect);
  const dx = target.x - center.x;
  const dy = target.y - center.y;

  if (Math.abs(dx) < POINT_TOLERANCE && Math.abs(dy) < POINT_TOLERANCE) {
    return center;
  }

  const halfWidth = rect.width / 2;
  const halfHeight = rect.height / 2;

  if (Math.abs(dx) > Math.abs(dy)) {
    const x = dx > 0 ? rect.x + rect.width : rect.x;
    const y = center.y + clamp((dy * halfWidth) / Math.abs(dx), -halfHeight, halfHeight);
    return { x, y };
  }

  const y = dy > 0 ? rect.y + rect.height : rect.y;
  const x = center.x + clamp((dx * halfHeight) / Math.abs(dy), -halfWidth, halfWidth);
  return { x, y };
}

/** True when `p` lies on the rectangle's border within `tolerance`. */
export function isOnBoundary(rect: Rect, p: Point, tolerance = 1e-6): boolean {
  const left = rect.x;
  const right = rect.x + rect.width;
  const top = rect.y;
  const bottom = rect.y + rect.height;
  const withinX = p.x >= left - tolerance && p.x <= right + tolerance;
  const withinY = p.y >= top - tolerance && p.y <= bottom + tolerance;
  const onVertical = (Math.abs(p.x - left) <= tolerance || Math.abs(p.x - right) <= tolerance) && withinY;
  const onHorizontal = (Math.abs(p.y - top) <= tolerance || Math.abs(p.y - bottom) <= tolerance) && withinX;
  return onVertical || onHorizontal;
}

/** Cubic Bézier evaluated at `t`. */
export function cubicPoint(p0: Point, p1: Point, p2: Point, p3: Point, t: number): Point {
  const u = 1 - t;
  const a = u * u * u;
  const b = 3 * u * u * t;
  const c = 3 * u * t * t;
  const d = t * t * t;
  return {
    x: a * p0.x + b * p1.x + c * p2.x + d * p3.x,
    y: a * p0.y + b * p1.y + c * p2.y + d * p3.y,
  };
}

/** Control points for a symmetric S-curve between two endpoints. */
export function defaultControlPoints(start: Point, end: Point): [Point, Point] {
  const vx = end.x - start.x;
  const vy = end.y - start.y;
  const length = Math.hypot(vx, vy) || 1;
  const ux = vx / length;
  const uy = vy / length;
  const nx = -uy;
  const ny = ux;
  const along = Math.max(BEZIER_MIN_ALONG, length * BEZIER_ALONG_RATIO);
  return [
    { x: start.x + ux * along + nx * BEZIER_NORMAL, y: start.y + uy * along + ny * BEZIER_NORMAL },
    { x: end.x - ux * along + nx * BEZIER_NORMAL, y: end.y - uy * along + ny * BEZIER_NORMAL },
  ];
}

/** Direction of the vector `from -> to` in degrees. */
export function angleDegrees(from: Point, to: Point): number {
  return (Math.atan2(to.y - from.y, to.x - from.x) * 180) / Math.PI;
}

export function unionRects(rects: Rect[]): Rect | null {
  if (rects.length === 0) return null;
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const r of rects) {
    minX = Math.min(minX, r.x);
    minY = Math.min(minY, r.y);
    maxX = Math.max(maxX, r.x + r.width);
    maxY = Math.max(maxY, r.y + r.height);
  }
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/** Smallest rectangle containing every point. */
export function boundsOfPoints(points: Point[]): Rect {
  const xs = points.map((p) => p.x);
  const ys = points.map((p) => p.y);
  const minX = Math.min(...xs);
  const minY = Math.min(...ys);
  return { x: minX, y: minY, width: Math.max(...xs) - minX, height: Math.max(...ys) - minY };
}

export function snapToGrid(value: number, pitch: number): number {
  return Math.round(value / pitch) * pitch;
}
