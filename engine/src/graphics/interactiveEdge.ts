/**
 * A flowchart edge. Holds its endpoints' node ids and resolves them through the
 * renderer's node arena; geometry is derived from the nodes plus whatever the
 * user customized (endpoint offsets, Bézier control points).
 */

import type { DiagramEdge, EdgeStyle, EdgeType } from '../models/diagram.js';
import type { EdgeGeometry, Point, Rect } from '../models/geometry.js';
import type { ArrowHead, EdgePrimitive, SceneItemBase } from '../models/scene.js';
import { edgeKeyOf } from '../utils/edgeKey.js';
import {
  angleDegrees,
  boundsOfPoints,
  cubicPoint,
  defaultControlPoints,
  fromVec2,
  midpoint,
  offsetPoint,
  toVec2,
} from '../utils/geometry.js';
import type { GeometryDependent, GraphicsContext, NodeLookup, Selectable } from './capabilities.js';
import type { InteractiveNode } from './interactiveNode.js';

interface Endpoints {
  start: Point;
  end: Point;
}

export type EdgeHandle = 'start' | 'end' | 'control1' | 'control2';

export class InteractiveEdge implements SceneItemBase, Selectable, GeometryDependent {
  readonly kind = 'edge';
  readonly id: string;
  readonly source: string;
  readonly target: string;
  readonly label: string;
  readonly edgeType: EdgeType;
  style: EdgeStyle;

  private useBezier = false;
  private startOffset?: Point;
  private endOffset?: Point;
  private control1?: Point;
  private control2?: Point;
  private _selected = false;

  private start: Point = { x: 0, y: 0 };
  private end: Point = { x: 0, y: 0 };

  private readonly nodes: NodeLookup;
  private readonly ctx: GraphicsContext;

  constructor(edge: DiagramEdge, nodes: NodeLookup, ctx: GraphicsContext) {
    this.id = edgeKeyOf(edge);
    this.source = edge.source;
    this.target = edge.target;
    this.label = edge.label;
    this.edgeType = edge.edgeType;
    this.style = edge.style;
    this.nodes = nodes;
    this.ctx = ctx;
  }

  /** Register with both endpoint nodes, load any stored routing and compute geometry. */
  /** Compute geometry, then register with both endpoints. Nothing is registered if geometry fails. */
  attach(): void {
    const source = this.sourceNode();
    const target = this.targetNode();
    this.applySavedState();
    this.updateGeometry();
    source.addDependent(this);
    if (target !== source) target.addDependent(this);
  }

  detach(): void {
    this.nodes.getNode(this.source)?.removeDependent(this);
    this.nodes.getNode(this.target)?.removeDependent(this);
  }

  get selected(): boolean {
    return this._selected;
  }

  setSelected(selected: boolean): void {
    this._selected = selected;
  }

  get isBezier(): boolean {
    return this.useBezier;
  }

  private sourceNode(): InteractiveNode {
    return this.requireNode(this.source);
  }

  private targetNode(): InteractiveNode {
    return this.requireNode(this.target);
  }

  private requireNode(id: string): InteractiveNode {
    const node = this.nodes.getNode(id);
    if (!node) throw new Error(`Edge ${this.id} references missing node ${id}`);
    return node;
  }

  applySavedState(): void {
    const saved = this.ctx.store.getEdgeGeometry(this.source, this.target, this.label, this.edgeType);
    if (!saved) return;
    this.useBezier = saved.useBezier;
    if (saved.startOffset) this.startOffset = fromVec2(saved.startOffset);
    if (saved.endOffset) this.endOffset = fromVec2(saved.endOffset);
    if (saved.control1) this.control1 = fromVec2(saved.control1);
    if (saved.control2) this.control2 = fromVec2(saved.control2);
  }

  private persistState(): void {
    const state: EdgeGeometry = { useBezier: this.useBezier };
    if (this.startOffset) state.startOffset = toVec2(this.startOffset);
    if (this.endOffset) state.endOffset = toVec2(this.endOffset);
    if (this.control1) state.control1 = toVec2(this.control1);
    if (this.control2) state.control2 = toVec2(this.control2);
    this.ctx.store.setEdgeGeometry(this.source, this.target, this.label, this.edgeType, state);
  }

  /** Border points, or custom offsets from each node's center when set. */
  computeEndpoints(): Endpoints {
    const source = this.sourceNode();
    const target = this.targetNode();
    const sourceCenter = source.center();
    const targetCenter = target.center();
    const start = this.startOffset
      ? offsetPoint(sourceCenter, toVec2(this.startOffset))
      : source.connectionPoint(targetCenter);
    const end = this.endOffset
      ? offsetPoint(targetCenter, toVec2(this.endOffset))
      : target.connectionPoint(sourceCenter);
    return { start, end };
  }

  updateGeometry(): void {
    const { start, end } = this.computeEndpoints();
    this.start = start;
    this.end = end;
    if (this.useBezier && (!this.control1 || !this.control2)) {
      this.initializeBezierPoints();
    }
  }

  toggleBezier(): void {
    this.useBezier = !this.useBezier;
    if (this.useBezier && (!this.control1 || !this.control2)) {
      this.initializeBezierPoints();
    }
    this.persistState();
    this.updateGeometry();
  }

  initializeBezierPoints(): void {
    const { start, end } = this.computeEndpoints();
    const [c1, c2] = defaultControlPoints(start, end);
    this.control1 = c1;
    this.control2 = c2;
    this.persistState();
  }

  /** Pin the start to the source border at the projection of `scenePoint`. */
  setCustomStartPoint(scenePoint: Point): void {
    const source = this.sourceNode();
    const onBorder = source.connectionPoint(scenePoint);
    const center = source.center();
    this.startOffset = { x: onBorder.x - center.x, y: onBorder.y - center.y };
    this.persistState();
    this.updateGeometry();
  }

  setCustomEndPoint(scenePoint: Point): void {
    const target = this.targetNode();
    const onBorder = target.connectionPoint(scenePoint);
    const center = target.center();
    this.endOffset = { x: onBorder.x - center.x, y: onBorder.y - center.y };
    this.persistState();
    this.updateGeometry();
  }

  moveControlPoint(which: 'control1' | 'control2', point: Point): void {
    if (which === 'control1') {
      this.control1 = { ...point };
    } else {
      this.control2 = { ...point };
    }
    this.persistState();
    this.updateGeometry();
  }

  /** Drag one of the edge's handles to `point`. */
  dragHandle(handle: EdgeHandle, point: Point): void {
    if (handle === 'start') this.setCustomStartPoint(point);
    else if (handle === 'end') this.setCustomEndPoint(point);
    else this.moveControlPoint(handle, point);
  }

  private curve(): { c1: Point; c2: Point } | null {
    if (!this.useBezier || !this.control1 || !this.control2) return null;
    return { c1: this.control1, c2: this.control2 };
  }

  arrows(): ArrowHead[] {
    const curve = this.curve();
    const endAngle = curve ? angleDegrees(curve.c2, this.end) : angleDegrees(this.start, this.end);
    const heads: ArrowHead[] = [{ at: { ...this.end }, angle: endAngle }];
    if (this.edgeType === 'bidirectional') {
      const startTangent = curve ? angleDegrees(this.start, curve.c1) : angleDegrees(this.start, this.end);
      heads.push({ at: { ...this.start }, angle: startTangent + 180 });
    }
    return heads;
  }

  labelPosition(): Point {
    const curve = this.curve();
    return curve ? cubicPoint(this.start, curve.c1, curve.c2, this.end, 0.5) : midpoint(this.start, this.end);
  }

  /** Endpoint and control handles; controls default to the thirds of the straight segment. */
  controlHandles(): { start: Point; end: Point; control1: Point; control2: Point } {
    const { start, end } = this;
    return {
      start: { ...start },
      end: { ...end },
      control1: this.control1
        ? { ...this.control1 }
        : { x: (start.x * 2 + end.x) / 3, y: (start.y * 2 + end.y) / 3 },
      control2: this.control2
        ? { ...this.control2 }
        : { x: (start.x + end.x * 2) / 3, y: (start.y + end.y * 2) / 3 },
    };
  }

  bounds(): Rect {
    const curve = this.curve();
    const points = curve ? [this.start, curve.c1, curve.c2, this.end] : [this.start, this.end];
    return boundsOfPoints(points);
  }

  describe(): EdgePrimitive {
    const curve = this.curve();
    return {
      kind: 'edge',
      id: this.id,
      source: this.source,
      target: this.target,
      label: this.label,
      edgeType: this.edgeType,
      style: this.style,
      start: { ...this.start },
      end: { ...this.end },
      ...(curve ? { control1: { ...curve.c1 }, control2: { ...curve.c2 } } : {}),
      arrows: this.arrows(),
      ...(this.label ? { labelPosition: this.labelPosition() } : {}),
      selected: this._selected,
      ...(this._selected ? { controlHandles: this.controlHandles() } : {}),
    };
  }
}
