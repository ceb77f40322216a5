/** Composite identity of a flowchart edge, as used in memory and on disk. */

import type { EdgeType } from '../models/diagram.js';

export const EDGE_KEY_SEPARATOR = '|';

export interface EdgeIdentity {
  source: string;
  target: string;
  label: string;
  edgeType: EdgeType;
}

/**
 * `source|target|label|edgeType`. Injective only while no part contains the
 * separator; see `hasAmbiguousKeyPart`.
 */
export function edgeKey(source: string, target: string, label = '', edgeType: EdgeType = 'arrow'): string {
  return [source, target, label, edgeType].join(EDGE_KEY_SEPARATOR);
}

export function edgeKeyOf(edge: EdgeIdentity): string {
  return edgeKey(edge.source, edge.target, edge.label, edge.edgeType);
}

/** True when any part contains the separator, so the key may collide with another tuple's. */
export function hasAmbiguousKeyPart(source: string, target: string, label: string): boolean {
  return [source, target, label].some((part) => part.includes(EDGE_KEY_SEPARATOR));
}
