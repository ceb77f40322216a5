import { describe, it, expect, vi, afterEach } from 'vitest';
import { DiagramEngine, type RenderResult } from './diagramEngine.js';
import { MemoryPositionBackend, PositionStore } from './positionStore.js';
import { MemorySurface } from '../scene/memorySurface.js';
import { MemoryLogSink } from '../utils/logger.js';

function setup() {
  const logger = new MemoryLogSink();
  const store = new PositionStore({ backend: new MemoryPositionBackend(), logger });
  const engine = new DiagramEngine({ store, logger, debounceMs: 200 });
  return { logger, store, engine, surface: new MemorySurface() };
}

describe('DiagramEngine', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('reports what a render produced', () => {
    const { engine, surface } = setup();
    expect(engine.render('', surface).status).toBe('Empty diagram');
    expect(engine.render('flowchart TD\nA --> B', surface).status).toBe('Rendered 2 nodes');
    const result = engine.render('sequence\nA->B: hi\nB->C: yo', surface);
    expect(result.status).toBe('Rendered 3 participants');
    expect(result.ok && result.diagram.type).toBe('sequence');
    expect(engine.lastRender).toBe(result);
  });

  it('turns a failed pass into an error status', () => {
    const { engine, logger } = setup();
    const surface = new MemorySurface();
    surface.clear = () => {
      throw new Error('surface gone');
    };
    const result = engine.render('sequence\nA->B: hi', surface);
    expect(result).toEqual({ ok: false, status: 'Error: surface gone' });
    expect(logger.events('error')).toEqual(['Render failed']);
  });

  it('debounces scheduled renders and reports each pass that runs', () => {
    vi.useFakeTimers();
    const { engine, surface } = setup();
    const results: RenderResult[] = [];
    engine.scheduleRender('flowchart TD\nA', surface, (r) => results.push(r));
    engine.scheduleRender('flowchart TD\nA --> B', surface, (r) => results.push(r));
    vi.advanceTimersByTime(199);
    expect(results).toEqual([]);
    vi.advanceTimersByTime(1);
    expect(results.map((r) => r.status)).toEqual(['Rendered 2 nodes']);
    engine.dispose();
  });

  it('renders a pending pass on flush', () => {
    vi.useFakeTimers();
    const { engine, surface } = setup();
    engine.scheduleRender('flowchart TD\nA --> B', surface);
    engine.flushScheduled();
    expect(engine.renderer.nodeIds()).toEqual(['A', 'B']);
    engine.dispose();
  });

  it('resets stored positions and visuals', () => {
    const { engine, store, surface, logger } = setup();
    engine.render('flowchart TD\nA --> B', surface);
    engine.renderer.getNode('A')?.resize('se', 10, 10);
    expect(store.hasCustomLayout()).toBe(true);

    engine.resetPositions(surface);
    expect(store.hasCustomLayout()).toBe(false);
    expect(surface.size).toBe(0);
    expect(logger.events('info')).toEqual(['Positions reset']);

    engine.render('flowchart TD\nA --> B', surface);
    expect(engine.renderer.getNode('A')?.getRect()).toEqual({ x: 0, y: 0, width: 160, height: 60 });
  });

  it('normalizes through the renderer', () => {
    const { engine, surface, store } = setup();
    engine.render('flowchart TD\nA --> B', surface);
    expect(engine.normalize(surface)).toBe(2);
    expect(store.getNodeGeometry('A')).toEqual({ x: 0, y: 0, width: 80, height: 50 });
  });
});
