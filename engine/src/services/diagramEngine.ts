/**
 * Parse + render facade. Owns the renderer and the debounced scheduler, and
 * is the one place where a failed pass is turned into a status instead of an
 * exception.
 */

import type { Diagram } from '../models/diagram.js';
import type { DisplaySurface } from '../models/scene.js';
import { parseDiagram } from '../parser/diagramParser.js';
import { RENDER_DEBOUNCE_MS } from '../utils/constants.js';
import { errorMessage } from '../utils/errors.js';
import type { LogSink } from '../utils/logger.js';
import { DiagramRenderer, type RendererSettings } from './diagramRenderer.js';
import type { PositionStore } from './positionStore.js';
import { RenderScheduler } from './renderScheduler.js';

export type RenderResult =
  | { ok: true; status: string; diagram: Diagram }
  | { ok: false; status: string };

export interface DiagramEngineOptions {
  store: PositionStore;
  logger: LogSink;
  debounceMs?: number;
  settings?: Partial<RendererSettings>;
}

function describeResult(diagram: Diagram): string {
  const count = diagram.type === 'flowchart' ? diagram.nodes.length : diagram.participants.length;
  if (count === 0) return 'Empty diagram';
  return diagram.type === 'flowchart' ? `Rendered ${count} nodes` : `Rendered ${count} participants`;
}

export class DiagramEngine {
  readonly store: PositionStore;
  readonly renderer: DiagramRenderer;
  private readonly logger: LogSink;
  private readonly debounceMs: number;
  private scheduler: RenderScheduler | null = null;
  private scheduledSurface: DisplaySurface | null = null;
  private scheduledCallback?: (result: RenderResult) => void;
  private lastResult: RenderResult | null = null;

  constructor(options: DiagramEngineOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.debounceMs = options.debounceMs ?? RENDER_DEBOUNCE_MS;
    this.renderer = new DiagramRenderer({ store: options.store, logger: options.logger, settings: options.settings });
  }

  get lastRender(): RenderResult | null {
    return this.lastResult;
  }

  parse(text: string): Diagram {
    return parseDiagram(text, this.logger);
  }

  /** Parse and reconcile. Never throws; on failure the surface is left as it was. */
  render(text: string, surface: DisplaySurface): RenderResult {
    let result: RenderResult;
    try {
      const diagram = this.parse(text);
      if (diagram.type === 'sequence') {
        this.renderer.renderSequence(diagram, surface);
      } else {
        this.renderer.renderFlowchart(diagram, surface);
      }
      result = { ok: true, status: describeResult(diagram), diagram };
      this.logger.debug('Render complete', { status: result.status });
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error('Render failed', { error: message });
      result = { ok: false, status: `Error: ${message}` };
    }
    this.lastResult = result;
    return result;
  }

  /** Debounced `render`; `onResult` hears about each pass that actually runs. */
  scheduleRender(text: string, surface: DisplaySurface, onResult?: (result: RenderResult) => void): void {
    this.scheduledSurface = surface;
    this.scheduledCallback = onResult;
    if (!this.scheduler) {
      this.scheduler = new RenderScheduler((pending) => this.runScheduled(pending), this.debounceMs, this.logger);
    }
    this.scheduler.schedule(text);
  }

  private runScheduled(text: string): void {
    if (!this.scheduledSurface) return;
    const result = this.render(text, this.scheduledSurface);
    this.scheduledCallback?.(result);
  }

  flushScheduled(): void {
    this.scheduler?.flush();
  }

  /** Fit and snap every node, persisting the result. */
  normalize(surface: DisplaySurface): number {
    return this.renderer.normalizeLayout(surface);
  }

  /** Forget all stored geometry and visuals; the next render uses default placement. */
  resetPositions(surface: DisplaySurface): void {
    this.store.clear();
    this.renderer.clearAll(surface);
    this.logger.info('Positions reset');
  }

  dispose(): void {
    this.scheduler?.dispose();
    this.scheduler = null;
  }
}
