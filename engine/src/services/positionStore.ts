/**
 * Persisted node and edge geometry. The store is the single source of truth for
 * user-placed geometry: every mutation is written through to its backend
 * immediately, and the in-memory state stays authoritative if a write fails.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { EdgeType } from '../models/diagram.js';
import type { EdgeGeometry, NodeGeometry, PositionState, Vec2 } from '../models/geometry.js';
import { errorMessage } from '../utils/errors.js';
import { edgeKey, hasAmbiguousKeyPart } from '../utils/edgeKey.js';
import type { LogSink } from '../utils/logger.js';
import {
  EdgeRecordSchema,
  LegacyPositionFileSchema,
  NodeRecordSchema,
  PositionFileSchema,
  type EdgeRecord,
  type NodeRecord,
} from '../utils/stateValidator.js';

/** Raw storage for the serialized store. */
export interface PositionBackend {
  /** Serialized state, or null when nothing has been stored yet. */
  read(): string | null;
  write(data: string): void;
}

/** JSON file on disk, replaced atomically through a temp file. */
export class FilePositionBackend implements PositionBackend {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  read(): string | null {
    if (!fs.existsSync(this.filePath)) return null;
    return fs.readFileSync(this.filePath, 'utf-8');
  }

  write(data: string): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmp = this.filePath + '.tmp';
    fs.writeFileSync(tmp, data);
    fs.renameSync(tmp, this.filePath);
  }
}

export class MemoryPositionBackend implements PositionBackend {
  data: string | null;
  writes = 0;

  constructor(initial: string | null = null) {
    this.data = initial;
  }

  read(): string | null {
    return this.data;
  }

  write(data: string): void {
    this.data = data;
    this.writes++;
  }
}

export interface PositionStoreOptions {
  backend: PositionBackend;
  logger: LogSink;
}

export type EdgeGeometryPatch = Partial<EdgeGeometry>;

function copyVec(v: Vec2): Vec2 {
  return [v[0], v[1]];
}

function toEdgeGeometry(record: EdgeRecord): EdgeGeometry {
  const geometry: EdgeGeometry = { useBezier: record.use_bezier ?? false };
  if (record.start_offset) geometry.startOffset = copyVec(record.start_offset);
  if (record.end_offset) geometry.endOffset = copyVec(record.end_offset);
  if (record.control1) geometry.control1 = copyVec(record.control1);
  if (record.control2) geometry.control2 = copyVec(record.control2);
  return geometry;
}

function toEdgeRecord(geometry: EdgeGeometry): EdgeRecord {
  const record: EdgeRecord = { use_bezier: geometry.useBezier };
  if (geometry.startOffset) record.start_offset = geometry.startOffset;
  if (geometry.endOffset) record.end_offset = geometry.endOffset;
  if (geometry.control1) record.control1 = geometry.control1;
  if (geometry.control2) record.control2 = geometry.control2;
  return record;
}

export interface PositionRecords {
  nodes: Record<string, NodeRecord>;
  edges: Record<string, EdgeRecord>;
}

/** Position state in the snake_case shape used by the store file and saved diagrams. */
export function toPositionRecords(state: PositionState): PositionRecords {
  return {
    nodes: Object.fromEntries(Object.entries(state.nodes).map(([id, geometry]): [string, NodeRecord] => [id, { ...geometry }])),
    edges: Object.fromEntries(Object.entries(state.edges).map(([key, geometry]): [string, EdgeRecord] => [key, toEdgeRecord(geometry)])),
  };
}

function copyEdgeGeometry(geometry: EdgeGeometry): EdgeGeometry {
  return toEdgeGeometry(toEdgeRecord(geometry));
}

export class PositionStore {
  private readonly backend: PositionBackend;
  private readonly logger: LogSink;
  private nodes = new Map<string, NodeGeometry>();
  private edges = new Map<string, EdgeGeometry>();
  private loaded = false;

  constructor(options: PositionStoreOptions) {
    this.backend = options.backend;
    this.logger = options.logger;
  }

  getNodeGeometry(id: string): NodeGeometry | undefined {
    this.ensureLoaded();
    const geometry = this.nodes.get(id);
    return geometry ? { ...geometry } : undefined;
  }

  setNodeGeometry(id: string, x: number, y: number, width: number, height: number): void {
    this.ensureLoaded();
    this.nodes.set(id, { x, y, width, height });
    this.save();
  }

  getEdgeGeometry(source: string, target: string, label: string, edgeType: EdgeType): EdgeGeometry | undefined {
    this.ensureLoaded();
    const geometry = this.edges.get(edgeKey(source, target, label, edgeType));
    return geometry ? copyEdgeGeometry(geometry) : undefined;
  }

  /** Merge `patch` into the stored record for the edge. Fields left out of the patch are kept. */
  setEdgeGeometry(source: string, target: string, label: string, edgeType: EdgeType, patch: EdgeGeometryPatch): void {
    this.ensureLoaded();
    const key = edgeKey(source, target, label, edgeType);
    if (hasAmbiguousKeyPart(source, target, label)) {
      this.logger.warn('Edge key contains the separator and may collide', { key });
    }
    const existing = this.edges.get(key) ?? { useBezier: false };
    const merged: EdgeGeometry = { ...existing };
    if (patch.useBezier !== undefined) merged.useBezier = patch.useBezier;
    if (patch.startOffset) merged.startOffset = copyVec(patch.startOffset);
    if (patch.endOffset) merged.endOffset = copyVec(patch.endOffset);
    if (patch.control1) merged.control1 = copyVec(patch.control1);
    if (patch.control2) merged.control2 = copyVec(patch.control2);
    this.edges.set(key, merged);
    this.save();
  }

  /** True when at least one node has stored geometry. */
  hasCustomLayout(): boolean {
    this.ensureLoaded();
    return this.nodes.size > 0;
  }

  snapshot(): PositionState {
    this.ensureLoaded();
    return {
      nodes: Object.fromEntries([...this.nodes].map(([id, geometry]): [string, NodeGeometry] => [id, { ...geometry }])),
      edges: Object.fromEntries([...this.edges].map(([key, geometry]): [string, EdgeGeometry] => [key, copyEdgeGeometry(geometry)])),
    };
  }

  /** Swap the whole state, e.g. when a saved diagram is opened. */
  replace(state: PositionState): void {
    this.loaded = true;
    this.nodes = new Map(Object.entries(state.nodes).map(([id, g]): [string, NodeGeometry] => [id, { ...g }]));
    this.edges = new Map(Object.entries(state.edges).map(([key, g]): [string, EdgeGeometry] => [key, copyEdgeGeometry(g)]));
    this.save();
  }

  clear(): void {
    this.loaded = true;
    this.nodes.clear();
    this.edges.clear();
    this.save();
  }

  /** On-disk form: snake_case records under `nodes` and `edges`. */
  serialize(): string {
    return JSON.stringify(toPositionRecords(this.snapshot()), null, 2);
  }

  private ensureLoaded(): void {
    if (this.loaded) return;
    this.loaded = true;
    this.load();
  }

  private load(): void {
    let raw: string | null;
    try {
      raw = this.backend.read();
    } catch (err) {
      this.logger.warn('Position store read failed', { error: errorMessage(err) });
      return;
    }
    if (raw === null || raw.trim() === '') return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.warn('Position store is not valid JSON', { error: errorMessage(err) });
      return;
    }

    const state = readPositionState(parsed, this.logger);
    this.nodes = new Map(Object.entries(state.nodes));
    this.edges = new Map(Object.entries(state.edges));
    this.logger.debug('Position store loaded', { nodes: this.nodes.size, edges: this.edges.size });
  }

  private save(): void {
    try {
      this.backend.write(this.serialize());
    } catch (err) {
      this.logger.warn('Position store write failed', { error: errorMessage(err) });
    }
  }
}

/** Own entries of a plain object, including keys such as `__proto__`; anything else has none. */
export function recordEntries(value: unknown): Array<[string, unknown]> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return [];
  return Object.entries(value);
}

/**
 * Validate a parsed store file. Records are checked one at a time and bad ones
 * dropped with a warning. A file with neither `nodes` nor `edges` is the
 * older flat map of node records.
 */
export function readPositionState(parsed: unknown, logger: LogSink): PositionState {
  const legacy = LegacyPositionFileSchema.safeParse(parsed);
  if (!legacy.success) {
    logger.warn('Position store has unexpected shape');
    return { nodes: {}, edges: {} };
  }

  // Entries come from the raw object: schema output leaves out a `__proto__` key.
  const sections = new Map(recordEntries(parsed));
  const isLegacy = !sections.has('nodes') && !sections.has('edges');
  let nodeEntries: Array<[string, unknown]>;
  let edgeEntries: Array<[string, unknown]> = [];
  if (isLegacy) {
    nodeEntries = [...sections];
  } else {
    if (!PositionFileSchema.safeParse(parsed).success) {
      logger.warn('Position store has unexpected shape');
      return { nodes: {}, edges: {} };
    }
    nodeEntries = recordEntries(sections.get('nodes'));
    edgeEntries = recordEntries(sections.get('edges'));
  }

  const nodes: Array<[string, NodeGeometry]> = [];
  for (const [id, value] of nodeEntries) {
    const record = NodeRecordSchema.safeParse(value);
    if (record.success) {
      nodes.push([id, record.data]);
    } else {
      logger.warn('Dropped invalid node record', { id });
    }
  }
  const edges: Array<[string, EdgeGeometry]> = [];
  for (const [key, value] of edgeEntries) {
    const record = EdgeRecordSchema.safeParse(value);
    if (record.success) {
      edges.push([key, toEdgeGeometry(record.data)]);
    } else {
      logger.warn('Dropped invalid edge record', { key });
    }
  }
  return { nodes: Object.fromEntries(nodes), edges: Object.fromEntries(edges) };
}
