/** A flowchart node: a movable, resizable rectangle that owns the geometry its edges derive from. */

import type { ClassDef } from '../models/diagram.js';
import type { Point, Rect } from '../models/geometry.js';
import type { NodePrimitive, NodeStyle, ResizeHandle, SceneItemBase } from '../models/scene.js';
import {
  DEFAULT_STROKE_WIDTH,
  FIT_MIN_HEIGHT,
  FIT_MIN_WIDTH,
  FIT_PADDING,
  MIN_NODE_SIZE,
  POINT_TOLERANCE,
} from '../utils/constants.js';
import { errorMessage } from '../utils/errors.js';
import { connectionPoint, rectCenter, snapToGrid } from '../utils/geometry.js';
import { measureText } from '../utils/textMeasure.js';
import type {
  Draggable,
  GeometryDependent,
  GeometryOwner,
  GraphicsContext,
  Selectable,
} from './capabilities.js';

export interface ThemeColors {
  nodeColor: string;
  borderColor: string;
}

/** Base theme under the node's classDef: class properties win. */
export function resolveNodeStyle(theme: ThemeColors, classDef?: ClassDef): NodeStyle {
  const properties: Record<string, string> = {
    fill: theme.nodeColor,
    stroke: theme.borderColor,
    ...(classDef ?? {}),
  };
  const strokeWidth = Number.parseFloat(properties['stroke-width'] ?? '');
  return {
    fill: properties.fill,
    stroke: properties.stroke,
    strokeWidth: Number.isFinite(strokeWidth) && strokeWidth > 0 ? strokeWidth : DEFAULT_STROKE_WIDTH,
    properties,
  };
}

export interface InteractiveNodeOptions {
  id: string;
  label: string;
  rect: Rect;
  style: NodeStyle;
  cssClass?: string;
}

export class InteractiveNode implements SceneItemBase, Selectable, Draggable, GeometryOwner {
  readonly kind = 'node';
  readonly id: string;
  label: string;
  cssClass?: string;
  style: NodeStyle;
  private rect: Rect;
  private _selected = false;
  private readonly dependents = new Set<GeometryDependent>();
  private readonly ctx: GraphicsContext;

  constructor(options: InteractiveNodeOptions, ctx: GraphicsContext) {
    this.id = options.id;
    this.label = options.label;
    this.rect = { ...options.rect };
    this.style = options.style;
    this.cssClass = options.cssClass;
    this.ctx = ctx;
  }

  get selected(): boolean {
    return this._selected;
  }

  setSelected(selected: boolean): void {
    this._selected = selected;
  }

  getRect(): Rect {
    return { ...this.rect };
  }

  center(): Point {
    return rectCenter(this.rect);
  }

  connectionPoint(target: Point): Point {
    return connectionPoint(this.rect, target);
  }

  /** Refresh what the text says about the node. Geometry is left alone. */
  setContent(label: string, style: NodeStyle, cssClass?: string): void {
    this.label = label;
    this.style = style;
    this.cssClass = cssClass;
  }

  setStyle(style: NodeStyle): void {
    this.style = style;
  }

  moveBy(dx: number, dy: number): void {
    this.rect.x += dx;
    this.rect.y += dy;
    this.notifyDependents();
  }

  setPosition(x: number, y: number): void {
    this.rect.x = x;
    this.rect.y = y;
    this.notifyDependents();
  }

  release(): void {
    this.persistGeometry();
  }

  /**
   * One step of a resize drag from `handle`. East and south handles grow the
   * rect; west and north handles move the origin so the opposite side stays
   * put, and are ignored past the minimum size.
   */
  resize(handle: ResizeHandle, dx: number, dy: number): void {
    const next = { ...this.rect };

    if (handle.includes('e')) {
      next.width = Math.max(MIN_NODE_SIZE, this.rect.width + dx);
    } else if (handle.includes('w')) {
      const width = this.rect.width - dx;
      if (width >= MIN_NODE_SIZE) {
        next.width = width;
        next.x = this.rect.x + dx;
      }
    }

    if (handle.includes('s')) {
      next.height = Math.max(MIN_NODE_SIZE, this.rect.height + dy);
    } else if (handle.includes('n')) {
      const height = this.rect.height - dy;
      if (height >= MIN_NODE_SIZE) {
        next.height = height;
        next.y = this.rect.y + dy;
      }
    }

    this.rect = next;
    this.notifyDependents();
    this.persistGeometry();
  }

  handlePositions(): Record<ResizeHandle, Point> {
    const { x, y, width, height } = this.rect;
    return {
      nw: { x, y },
      n: { x: x + width / 2, y },
      ne: { x: x + width, y },
      e: { x: x + width, y: y + height / 2 },
      se: { x: x + width, y: y + height },
      s: { x: x + width / 2, y: y + height },
      sw: { x, y: y + height },
      w: { x, y: y + height / 2 },
    };
  }

  /** Size that wraps the label with padding, not applied. */
  sizeToFitContent(): { width: number; height: number } {
    const text = measureText(this.label);
    return {
      width: Math.max(FIT_MIN_WIDTH, Math.round(text.width) + FIT_PADDING * 2),
      height: Math.max(FIT_MIN_HEIGHT, Math.round(text.height) + FIT_PADDING * 2),
    };
  }

  /** Fit to the label and align the origin to `pitch`. */
  normalize(pitch: number): void {
    const size = this.sizeToFitContent();
    this.rect.width = size.width;
    this.rect.height = size.height;
    const gx = snapToGrid(this.rect.x, pitch);
    const gy = snapToGrid(this.rect.y, pitch);
    if (Math.abs(gx - this.rect.x) > POINT_TOLERANCE || Math.abs(gy - this.rect.y) > POINT_TOLERANCE) {
      this.rect.x = gx;
      this.rect.y = gy;
    }
    this.notifyDependents();
    this.persistGeometry();
  }

  persistGeometry(): void {
    const { x, y, width, height } = this.rect;
    this.ctx.store.setNodeGeometry(this.id, x, y, width, height);
    this.ctx.geometryChanged({ id: this.id, x, y, width, height });
  }

  addDependent(dependent: GeometryDependent): void {
    this.dependents.add(dependent);
  }

  removeDependent(dependent: GeometryDependent): void {
    this.dependents.delete(dependent);
  }

  notifyDependents(): void {
    for (const dependent of this.dependents) {
      try {
        dependent.updateGeometry();
      } catch (err) {
        this.ctx.logger.error('Dependent update failed', { node: this.id, dependent: dependent.id, error: errorMessage(err) });
      }
    }
  }

  dependentIds(): string[] {
    return [...this.dependents].map((d) => d.id);
  }

  bounds(): Rect {
    return this.getRect();
  }

  describe(): NodePrimitive {
    return {
      kind: 'node',
      id: this.id,
      label: this.label,
      rect: this.getRect(),
      style: { ...this.style, properties: { ...this.style.properties } },
      ...(this.cssClass !== undefined ? { cssClass: this.cssClass } : {}),
      selected: this._selected,
      handles: this.handlePositions(),
    };
  }
}
