/** Scene items, their plain-data descriptions, and the display surface contract. */

import type { EdgeStyle, EdgeType, MessageStyle } from './diagram.js';
import type { Point, Rect } from './geometry.js';

export type SceneItemKind = 'node' | 'edge' | 'participant' | 'message' | 'note' | 'title';

export type ResizeHandle = 'n' | 's' | 'e' | 'w' | 'ne' | 'nw' | 'se' | 'sw';

export const RESIZE_HANDLES: readonly ResizeHandle[] = ['se', 'sw', 'ne', 'nw', 'e', 'w', 's', 'n'];

export interface NodeStyle {
  fill: string;
  stroke: string;
  strokeWidth: number;
  /** Merged style properties as written in the source (base theme under classDef). */
  properties: Record<string, string>;
}

export interface NodePrimitive {
  kind: 'node';
  id: string;
  label: string;
  rect: Rect;
  style: NodeStyle;
  cssClass?: string;
  selected: boolean;
  handles: Record<ResizeHandle, Point>;
}

export interface ArrowHead {
  at: Point;
  /** Degrees, measured like atan2 (0 points along +x). */
  angle: number;
}

export interface EdgePrimitive {
  kind: 'edge';
  id: string;
  source: string;
  target: string;
  label: string;
  edgeType: EdgeType;
  style: EdgeStyle;
  start: Point;
  end: Point;
  /** Present only while the edge is routed as a cubic Bézier. */
  control1?: Point;
  control2?: Point;
  arrows: ArrowHead[];
  labelPosition?: Point;
  selected: boolean;
  /** Drag handles shown while selected: endpoints and both control points. */
  controlHandles?: { start: Point; end: Point; control1: Point; control2: Point };
}

export interface ParticipantPrimitive {
  kind: 'participant';
  id: string;
  participantId: string;
  label: string;
  header: Rect;
  lifeline: { x: number; top: number; bottom: number };
}

export interface MessagePrimitive {
  kind: 'message';
  id: string;
  source: string;
  target: string;
  text: string;
  style: MessageStyle;
  from: Point;
  to: Point;
  arrow: ArrowHead;
  labelPosition: Point;
}

export interface NotePrimitive {
  kind: 'note';
  id: string;
  participants: string[];
  text: string;
  rect: Rect;
}

export interface TitlePrimitive {
  kind: 'title';
  id: string;
  text: string;
  /** Top-center anchor of the title text. */
  anchor: Point;
}

export type ScenePrimitive =
  | NodePrimitive
  | EdgePrimitive
  | ParticipantPrimitive
  | MessagePrimitive
  | NotePrimitive
  | TitlePrimitive;

/** Common surface of every visual element the renderer places on a display surface. */
export interface SceneItemBase {
  readonly kind: SceneItemKind;
  readonly id: string;
  bounds(): Rect;
  describe(): ScenePrimitive;
}

/** Where visual elements live. The engine only adds, removes and measures. */
export interface DisplaySurface {
  add(item: SceneItemBase): void;
  remove(item: SceneItemBase): void;
  clear(): void;
  items(): SceneItemBase[];
  /** Union of all item bounds, or null when the surface is empty. */
  itemsBoundingRect(): Rect | null;
}

/** Emitted whenever an interactive element persists its geometry. */
export interface GeometryChange {
  id: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

export type GeometryListener = (change: GeometryChange) => void;
