import { describe, it, expect, vi } from 'vitest';
import type { DiagramEdge } from '../models/diagram.js';
import { InteractiveEdge } from './interactiveEdge.js';
import { InteractiveNode, resolveNodeStyle } from './interactiveNode.js';
import type { GraphicsContext, NodeLookup } from './capabilities.js';
import { MemoryPositionBackend, PositionStore } from '../services/positionStore.js';
import { MemoryLogSink } from '../utils/logger.js';
import { isOnBoundary } from '../utils/geometry.js';

const style = resolveNodeStyle({ nodeColor: '#dcddff', borderColor: '#6464c8' });

function setup() {
  const logger = new MemoryLogSink();
  const store = new PositionStore({ backend: new MemoryPositionBackend(), logger });
  const ctx: GraphicsContext = { store, logger, geometryChanged: vi.fn() };
  const nodes = new Map<string, InteractiveNode>();
  for (const [id, x] of [['A', 0], ['B', 400]] as const) {
    nodes.set(id, new InteractiveNode({ id, label: id, rect: { x, y: 0, width: 160, height: 60 }, style }, ctx));
  }
  const lookup: NodeLookup = { getNode: (id) => nodes.get(id) };
  const edgeFor = (partial: Partial<DiagramEdge> = {}) => {
    const edge = new InteractiveEdge(
      { source: 'A', target: 'B', label: '', edgeType: 'arrow', style: 'solid', ...partial },
      lookup,
      ctx,
    );
    edge.attach();
    return edge;
  };
  return { ctx, store, nodes, lookup, edgeFor, node: (id: string) => nodes.get(id) };
}

describe('InteractiveEdge', () => {
  it('connects the facing borders of its nodes', () => {
    const { edgeFor } = setup();
    const primitive = edgeFor().describe();
    expect(primitive.id).toBe('A|B||arrow');
    expect(primitive.start).toEqual({ x: 160, y: 30 });
    expect(primitive.end).toEqual({ x: 400, y: 30 });
    expect(primitive.arrows).toEqual([{ at: { x: 400, y: 30 }, angle: 0 }]);
    expect(primitive.control1).toBeUndefined();
    expect(primitive.labelPosition).toBeUndefined();
  });

  it('adds a reversed arrow head for bidirectional edges', () => {
    const { edgeFor } = setup();
    const arrows = edgeFor({ edgeType: 'bidirectional' }).arrows();
    expect(arrows).toEqual([
      { at: { x: 400, y: 30 }, angle: 0 },
      { at: { x: 160, y: 30 }, angle: 180 },
    ]);
  });

  it('places a label at the midpoint of a straight edge', () => {
    const { edgeFor } = setup();
    expect(edgeFor({ label: 'go' }).describe().labelPosition).toEqual({ x: 280, y: 30 });
  });

  it('offers control handles at the thirds when selected', () => {
    const { edgeFor } = setup();
    const edge = edgeFor();
    expect(edge.describe().controlHandles).toBeUndefined();
    edge.setSelected(true);
    expect(edge.describe().controlHandles).toEqual({
      start: { x: 160, y: 30 },
      end: { x: 400, y: 30 },
      control1: { x: 240, y: 30 },
      control2: { x: 320, y: 30 },
    });
  });

  it('follows its nodes when they move', () => {
    const { edgeFor, node } = setup();
    const edge = edgeFor();
    node('B')?.moveBy(0, 100);
    expect(edge.describe().end).toEqual({ x: 400, y: 110 });
  });

  it('synthesizes and persists control points when switched to a curve', () => {
    const { edgeFor, store } = setup();
    const edge = edgeFor();
    edge.toggleBezier();
    expect(edge.isBezier).toBe(true);
    expect(store.getEdgeGeometry('A', 'B', '', 'arrow')).toEqual({
      useBezier: true,
      control1: [220, 70],
      control2: [340, 70],
    });
    const primitive = edge.describe();
    expect(primitive.control1).toEqual({ x: 220, y: 70 });
    expect(primitive.arrows[0].angle).toBeCloseTo((Math.atan2(-40, 60) * 180) / Math.PI);
  });

  it('keeps control points but drops the curve when toggled back', () => {
    const { edgeFor, store } = setup();
    const edge = edgeFor();
    edge.toggleBezier();
    edge.toggleBezier();
    expect(edge.describe().control1).toBeUndefined();
    expect(store.getEdgeGeometry('A', 'B', '', 'arrow')?.useBezier).toBe(false);
    expect(store.getEdgeGeometry('A', 'B', '', 'arrow')?.control1).toEqual([220, 70]);
  });

  it('projects a dragged endpoint onto the node border and restores it later', () => {
    const { edgeFor, store, lookup, ctx } = setup();
    const edge = edgeFor();
    edge.dragHandle('start', { x: 80, y: -100 });
    expect(edge.describe().start).toEqual({ x: 80, y: 0 });
    expect(store.getEdgeGeometry('A', 'B', '', 'arrow')?.startOffset).toEqual([0, -30]);

    const reloaded = new InteractiveEdge(
      { source: 'A', target: 'B', label: '', edgeType: 'arrow', style: 'solid' },
      lookup,
      ctx,
    );
    reloaded.attach();
    expect(reloaded.describe().start).toEqual({ x: 80, y: 0 });
  });

  it('keeps a custom end point on the border', () => {
    const { edgeFor, nodes } = setup();
    const edge = edgeFor();
    edge.setCustomEndPoint({ x: 700, y: 300 });
    const rect = nodes.get('B')?.getRect();
    expect(rect).toBeDefined();
    if (rect) expect(isOnBoundary(rect, edge.describe().end)).toBe(true);
  });

  it('moves a control point and persists it', () => {
    const { edgeFor, store } = setup();
    const edge = edgeFor();
    edge.toggleBezier();
    edge.dragHandle('control2', { x: 300, y: 200 });
    expect(store.getEdgeGeometry('A', 'B', '', 'arrow')?.control2).toEqual([300, 200]);
    expect(edge.describe().control2).toEqual({ x: 300, y: 200 });
  });

  it('registers a self-loop with its node once', () => {
    const { edgeFor, node } = setup();
    edgeFor({ target: 'A' });
    expect(node('A')?.dependentIds()).toEqual(['A|A||arrow']);
  });

  it('refuses to attach to a missing node', () => {
    const { edgeFor } = setup();
    expect(() => edgeFor({ target: 'Z' })).toThrow('Edge A|Z||arrow references missing node Z');
  });

  it('unregisters from its nodes on detach', () => {
    const { edgeFor, node } = setup();
    const edge = edgeFor();
    edge.detach();
    expect(node('A')?.dependentIds()).toEqual([]);
    expect(node('B')?.dependentIds()).toEqual([]);
  });
});
