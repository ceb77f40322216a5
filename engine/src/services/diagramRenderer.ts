/**
 * Incremental reconciliation of a parsed diagram against what is already on
 * the surface. New entities get visuals (stored geometry first, grid placement
 * otherwise), existing ones are updated in place and never moved, stale ones
 * are removed. Rendering the same diagram twice changes nothing.
 */

import type { ClassDef, DiagramEdge, Direction, FlowchartDiagram, SequenceDiagram } from '../models/diagram.js';
import type { Point } from '../models/geometry.js';
import type { DisplaySurface, GeometryChange, GeometryListener, NodeStyle } from '../models/scene.js';
import type { GraphicsContext, NodeLookup, ParticipantLookup } from '../graphics/capabilities.js';
import { InteractiveEdge } from '../graphics/interactiveEdge.js';
import { InteractiveNode, resolveNodeStyle, type ThemeColors } from '../graphics/interactiveNode.js';
import { NodeDragSession } from '../graphics/nodeDragSession.js';
import { Message, Note, Participant, Title } from '../graphics/sequenceItems.js';
import {
  DEFAULT_BORDER_COLOR,
  DEFAULT_NODE_COLOR,
  GRID_COLUMNS,
  MESSAGE_BASE_Y,
  MESSAGE_STEP_Y,
  NODE_HEIGHT,
  NODE_SPACING_X,
  NODE_SPACING_Y,
  NODE_WIDTH,
  NOTE_GAP_Y,
  NOTE_STEP_Y,
  PARTICIPANT_HEADER_HEIGHT,
  PARTICIPANT_SPACING,
  PARTICIPANT_WIDTH,
  POINT_TOLERANCE,
  SNAP_GRID,
  TITLE_Y,
} from '../utils/constants.js';
import { edgeKeyOf } from '../utils/edgeKey.js';
import { errorMessage } from '../utils/errors.js';
import type { LogSink } from '../utils/logger.js';
import type { PositionStore } from './positionStore.js';

export type RenderMode = 'flowchart' | 'sequence';

export interface RendererSettings {
  showGrid: boolean;
  antialiasing: boolean;
  nodeColor: string;
  borderColor: string;
}

export const DEFAULT_SETTINGS: RendererSettings = {
  showGrid: true,
  antialiasing: true,
  nodeColor: DEFAULT_NODE_COLOR,
  borderColor: DEFAULT_BORDER_COLOR,
};

export interface DiagramRendererOptions {
  store: PositionStore;
  logger: LogSink;
  settings?: Partial<RendererSettings>;
}

/** Default top-left corner for the node at `index` of `diagram.nodes`. */
export function gridPosition(index: number, direction: Direction): Point {
  if (direction === 'LR' || direction === 'RL') {
    return { x: index * NODE_SPACING_X, y: 0 };
  }
  const column = index % GRID_COLUMNS;
  const row = Math.floor(index / GRID_COLUMNS);
  return { x: column * NODE_SPACING_X, y: row * NODE_SPACING_Y };
}

export class DiagramRenderer implements NodeLookup, ParticipantLookup {
  private readonly store: PositionStore;
  private readonly logger: LogSink;
  private readonly ctx: GraphicsContext;
  private settings: RendererSettings;
  private readonly listeners = new Set<GeometryListener>();

  private mode: RenderMode = 'flowchart';
  private nodes = new Map<string, InteractiveNode>();
  private edges = new Map<string, InteractiveEdge>();
  private classDefs: Record<string, ClassDef> = {};

  private participants = new Map<string, Participant>();
  private messages = new Map<string, Message>();
  private notes = new Map<string, Note>();
  private title: Title | null = null;
  private lastSequenceSignature: string[] = [];

  constructor(options: DiagramRendererOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.ctx = {
      store: this.store,
      logger: this.logger,
      geometryChanged: (change) => this.emitGeometryChanged(change),
    };
  }

  get currentMode(): RenderMode {
    return this.mode;
  }

  get currentSettings(): RendererSettings {
    return { ...this.settings };
  }

  getNode(id: string): InteractiveNode | undefined {
    return this.nodes.get(id);
  }

  getEdge(key: string): InteractiveEdge | undefined {
    return this.edges.get(key);
  }

  getParticipant(id: string): Participant | undefined {
    return this.participants.get(id);
  }

  nodeIds(): string[] {
    return [...this.nodes.keys()];
  }

  edgeKeys(): string[] {
    return [...this.edges.keys()];
  }

  /** Subscribe to geometry persisted by interactive items. Returns the unsubscribe function. */
  onGeometryChanged(listener: GeometryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emitGeometryChanged(change: GeometryChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err) {
        this.logger.error('Geometry listener failed', { id: change.id, error: errorMessage(err) });
      }
    }
  }

  private theme(): ThemeColors {
    return { nodeColor: this.settings.nodeColor, borderColor: this.settings.borderColor };
  }

  private styleFor(cssClass: string | undefined): NodeStyle {
    const classDef = cssClass && Object.hasOwn(this.classDefs, cssClass) ? this.classDefs[cssClass] : undefined;
    return resolveNodeStyle(this.theme(), classDef);
  }

  /** Empty every cache and the surface. */
  clearAll(surface: DisplaySurface): void {
    surface.clear();
    this.nodes = new Map();
    this.edges = new Map();
    this.participants = new Map();
    this.messages = new Map();
    this.notes = new Map();
    this.title = null;
    this.lastSequenceSignature = [];
    this.mode = 'flowchart';
  }

  renderFlowchart(diagram: FlowchartDiagram, surface: DisplaySurface): void {
    if (this.mode !== 'flowchart') {
      this.clearAll(surface);
    }
    this.mode = 'flowchart';
    this.classDefs = diagram.classDefs;

    const wanted = new Set(diagram.nodes.map((n) => n.id));
    for (const [id, node] of [...this.nodes]) {
      if (wanted.has(id)) continue;
      for (const [key, edge] of [...this.edges]) {
        if (edge.source === id || edge.target === id) this.removeEdge(key, edge, surface);
      }
      surface.remove(node);
      this.nodes.delete(id);
    }

    diagram.nodes.forEach((spec, index) => {
      try {
        const style = this.styleFor(spec.cssClass);
        const existing = this.nodes.get(spec.id);
        if (existing) {
          existing.setContent(spec.label, style, spec.cssClass);
          return;
        }
        const saved = this.store.getNodeGeometry(spec.id);
        const rect = saved ?? { ...gridPosition(index, diagram.direction), width: NODE_WIDTH, height: NODE_HEIGHT };
        const node = new InteractiveNode({ id: spec.id, label: spec.label, rect, style, cssClass: spec.cssClass }, this.ctx);
        surface.add(node);
        this.nodes.set(spec.id, node);
      } catch (err) {
        this.logger.error('Node render failed', { id: spec.id, error: errorMessage(err) });
      }
    });

    // Identical keys collapse to one visual; the first occurrence wins.
    const needed = new Map<string, DiagramEdge>();
    for (const edge of diagram.edges) {
      const key = edgeKeyOf(edge);
      if (!needed.has(key)) needed.set(key, edge);
    }

    for (const [key, edge] of [...this.edges]) {
      if (!needed.has(key)) this.removeEdge(key, edge, surface);
    }

    for (const [key, spec] of needed) {
      let created: InteractiveEdge | undefined;
      try {
        const existing = this.edges.get(key);
        if (existing) {
          existing.style = spec.style;
          existing.updateGeometry();
          continue;
        }
        if (!this.nodes.has(spec.source) || !this.nodes.has(spec.target)) continue;
        created = new InteractiveEdge(spec, this, this.ctx);
        created.attach();
        surface.add(created);
        this.edges.set(key, created);
      } catch (err) {
        created?.detach();
        this.logger.error('Edge render failed', { key, error: errorMessage(err) });
      }
    }
  }

  private removeEdge(key: string, edge: InteractiveEdge, surface: DisplaySurface): void {
    edge.detach();
    surface.remove(edge);
    this.edges.delete(key);
  }

  renderSequence(diagram: SequenceDiagram, surface: DisplaySurface): void {
    const signature = diagram.participants.map((p) => p.id);
    const signatureChanged =
      this.lastSequenceSignature.length > 0 &&
      (signature.length !== this.lastSequenceSignature.length ||
        signature.some((id, i) => id !== this.lastSequenceSignature[i]));
    if (this.mode !== 'sequence' || signatureChanged) {
      this.clearAll(surface);
    }
    this.mode = 'sequence';

    const spacing = diagram.config.participant_spacing ?? PARTICIPANT_SPACING;
    const wanted = new Set(signature);
    for (const [id, participant] of [...this.participants]) {
      if (wanted.has(id)) continue;
      surface.remove(participant);
      this.participants.delete(id);
    }

    diagram.participants.forEach((spec, index) => {
      try {
        const saved = this.store.getNodeGeometry(spec.id);
        const x = saved?.x ?? index * spacing;
        const width = saved?.width ?? PARTICIPANT_WIDTH;
        const existing = this.participants.get(spec.id);
        if (existing) {
          if (Math.abs(existing.x - x) > POINT_TOLERANCE) existing.moveTo(x);
          if (existing.width !== width) existing.setWidth(width);
          existing.label = spec.label;
          return;
        }
        const participant = new Participant({ participantId: spec.id, label: spec.label, x, width }, this.ctx);
        surface.add(participant);
        this.participants.set(spec.id, participant);
      } catch (err) {
        this.logger.error('Participant render failed', { id: spec.id, error: errorMessage(err) });
      }
    });

    this.reconcileMessages(diagram, surface);
    this.reconcileNotes(diagram, surface);
    this.reconcileTitle(diagram, surface);

    for (const participant of this.participants.values()) {
      const stored = this.store.getNodeGeometry(participant.participantId);
      const unchanged =
        stored !== undefined &&
        stored.x === participant.x &&
        stored.y === 0 &&
        stored.width === participant.width &&
        stored.height === PARTICIPANT_HEADER_HEIGHT;
      if (!unchanged) {
        this.store.setNodeGeometry(participant.participantId, participant.x, 0, participant.width, PARTICIPANT_HEADER_HEIGHT);
      }
    }

    this.lastSequenceSignature = signature;
  }

  private reconcileMessages(diagram: SequenceDiagram, surface: DisplaySurface): void {
    const used = new Set<string>();
    diagram.messages.forEach((msg, index) => {
      const source = this.participants.get(msg.source);
      const target = this.participants.get(msg.target);
      if (!source || !target) return;
      const key = [index, msg.source, msg.target, msg.text, msg.style].join('|');
      used.add(key);
      try {
        const existing = this.messages.get(key);
        if (existing) {
          existing.updateGeometry();
          return;
        }
        const y = MESSAGE_BASE_Y + index * MESSAGE_STEP_Y;
        const message = new Message(`message:${key}`, source, target, msg.text, msg.style, y);
        surface.add(message);
        this.messages.set(key, message);
      } catch (err) {
        this.logger.error('Message render failed', { key, error: errorMessage(err) });
      }
    });

    for (const [key, message] of [...this.messages]) {
      if (used.has(key)) continue;
      message.detach();
      surface.remove(message);
      this.messages.delete(key);
    }
  }

  private reconcileNotes(diagram: SequenceDiagram, surface: DisplaySurface): void {
    const used = new Set<string>();
    const firstY = MESSAGE_BASE_Y + diagram.messages.length * MESSAGE_STEP_Y + NOTE_GAP_Y;
    diagram.notes.forEach((note, index) => {
      const owners = note.participants
        .map((id) => this.participants.get(id))
        .filter((p): p is Participant => p !== undefined);
      if (owners.length === 0) return;
      const key = [index, [...note.participants].sort().join('&'), note.text].join('|');
      used.add(key);
      try {
        const existing = this.notes.get(key);
        if (existing) {
          existing.updateGeometry();
          return;
        }
        const item = new Note(`note:${key}`, owners, note.text, firstY + index * NOTE_STEP_Y);
        surface.add(item);
        this.notes.set(key, item);
      } catch (err) {
        this.logger.error('Note render failed', { key, error: errorMessage(err) });
      }
    });

    for (const [key, item] of [...this.notes]) {
      if (used.has(key)) continue;
      item.detach();
      surface.remove(item);
      this.notes.delete(key);
    }
  }

  private reconcileTitle(diagram: SequenceDiagram, surface: DisplaySurface): void {
    if (!diagram.title) {
      if (this.title) {
        surface.remove(this.title);
        this.title = null;
      }
      return;
    }
    const centers = [...this.participants.values()].map((p) => p.centerX());
    const cx = centers.length > 0 ? (Math.min(...centers) + Math.max(...centers)) / 2 : 0;
    const anchor = { x: cx, y: TITLE_Y };
    if (this.title) {
      this.title.update(diagram.title, anchor);
    } else {
      this.title = new Title(diagram.title, anchor);
      surface.add(this.title);
    }
  }

  /** Fit every node on the surface to its label, snap it to the grid and persist it. */
  normalizeLayout(surface: DisplaySurface): number {
    let count = 0;
    for (const item of surface.items()) {
      if (item.kind !== 'node') continue;
      const node = this.nodes.get(item.id);
      if (!node) continue;
      try {
        node.normalize(SNAP_GRID);
        count++;
      } catch (err) {
        this.logger.error('Node normalize failed', { id: item.id, error: errorMessage(err) });
      }
    }
    for (const [key, edge] of this.edges) {
      try {
        edge.updateGeometry();
      } catch (err) {
        this.logger.error('Edge update failed', { key, error: errorMessage(err) });
      }
    }
    return count;
  }

  /** Re-apply base colours to every node; class properties still win. */
  updateSettings(settings: Partial<RendererSettings>): void {
    this.settings = { ...this.settings, ...settings };
    for (const node of this.nodes.values()) {
      node.setStyle(this.styleFor(node.cssClass));
    }
  }

  selectNode(id: string, additive = false): void {
    if (!additive) this.clearSelection();
    this.nodes.get(id)?.setSelected(true);
  }

  selectEdge(key: string, additive = false): void {
    if (!additive) this.clearSelection();
    this.edges.get(key)?.setSelected(true);
  }

  clearSelection(): void {
    for (const node of this.nodes.values()) node.setSelected(false);
    for (const edge of this.edges.values()) edge.setSelected(false);
  }

  selectedNodes(): InteractiveNode[] {
    return [...this.nodes.values()].filter((n) => n.selected);
  }

  /**
   * Start dragging from `nodeId`. An unselected node becomes the only
   * selection; a selected one drags the whole selection with it.
   */
  beginNodeDrag(nodeId: string, anchor: Point): NodeDragSession | null {
    const node = this.nodes.get(nodeId);
    if (!node) return null;
    if (!node.selected) this.selectNode(nodeId);
    return new NodeDragSession(this.selectedNodes(), anchor);
  }
}
