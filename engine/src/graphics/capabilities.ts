/**
 * What a scene item can do, answered from its `kind` tag rather than by
 * inspecting its class, plus the collaborators every interactive item shares.
 */

import type { GeometryChange, SceneItemBase, SceneItemKind } from '../models/scene.js';
import type { PositionStore } from '../services/positionStore.js';
import type { LogSink } from '../utils/logger.js';
import type { InteractiveNode } from './interactiveNode.js';
import type { Participant } from './sequenceItems.js';

export interface Selectable {
  readonly selected: boolean;
  setSelected(selected: boolean): void;
}

export interface Draggable {
  /** Move during a drag. Nothing is persisted until `release()`. */
  moveBy(dx: number, dy: number): void;
  release(): void;
}

/** Something whose geometry other items derive from. */
export interface GeometryOwner {
  addDependent(dependent: GeometryDependent): void;
  removeDependent(dependent: GeometryDependent): void;
  notifyDependents(): void;
}

export interface GeometryDependent {
  readonly id: string;
  updateGeometry(): void;
}

export interface ItemCapabilities {
  selectable: boolean;
  draggable: boolean;
  geometryOwner: boolean;
}

const CAPABILITIES: Record<SceneItemKind, ItemCapabilities> = {
  node: { selectable: true, draggable: true, geometryOwner: true },
  edge: { selectable: true, draggable: false, geometryOwner: false },
  participant: { selectable: false, draggable: true, geometryOwner: true },
  message: { selectable: false, draggable: false, geometryOwner: false },
  note: { selectable: false, draggable: false, geometryOwner: false },
  title: { selectable: false, draggable: false, geometryOwner: false },
};

export function capabilitiesOf(item: Pick<SceneItemBase, 'kind'>): ItemCapabilities {
  return CAPABILITIES[item.kind];
}

/** Shared by every interactive item: where geometry goes and who hears about it. */
export interface GraphicsContext {
  store: PositionStore;
  logger: LogSink;
  geometryChanged(change: GeometryChange): void;
}

/** Node arena: edges hold ids and resolve nodes on demand. */
export interface NodeLookup {
  getNode(id: string): InteractiveNode | undefined;
}

export interface ParticipantLookup {
  getParticipant(id: string): Participant | undefined;
}
