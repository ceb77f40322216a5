/** Saved-diagram files: diagram text, stored geometry and display settings in one JSON document. */

import fs from 'node:fs';
import path from 'node:path';
import type { PositionState } from '../models/geometry.js';
import { DiagramFileError, errorMessage } from '../utils/errors.js';
import type { LogSink } from '../utils/logger.js';
import { DiagramFileSchema, formatIssues } from '../utils/stateValidator.js';
import { DEFAULT_SETTINGS, type RendererSettings } from './diagramRenderer.js';
import { readPositionState, recordEntries, toPositionRecords } from './positionStore.js';

export interface DiagramDocument {
  text: string;
  positions: PositionState;
  settings: RendererSettings;
}

export function serializeDiagramFile(doc: DiagramDocument): string {
  const { nodes, edges } = toPositionRecords(doc.positions);
  return JSON.stringify(
    {
      text: doc.text,
      nodes,
      edges,
      settings: {
        show_grid: doc.settings.showGrid,
        antialiasing: doc.settings.antialiasing,
        node_color: doc.settings.nodeColor,
        border_color: doc.settings.borderColor,
      },
    },
    null,
    2,
  );
}

/**
 * Validate a saved document. The outer shape must match or the whole file is
 * rejected; individual geometry records that fail validation are dropped.
 */
export function parseDiagramFile(raw: string, filePath: string, logger: LogSink): DiagramDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new DiagramFileError(filePath, `invalid JSON: ${errorMessage(err)}`);
  }

  const result = DiagramFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new DiagramFileError(filePath, formatIssues(result.error).join('; '));
  }

  const data = result.data;
  const sections = new Map(recordEntries(parsed));
  const positions = readPositionState({ nodes: sections.get('nodes') ?? {}, edges: sections.get('edges') ?? {} }, logger);
  const settings = data.settings ?? {};
  return {
    text: data.text,
    positions,
    settings: {
      showGrid: settings.show_grid ?? DEFAULT_SETTINGS.showGrid,
      antialiasing: settings.antialiasing ?? DEFAULT_SETTINGS.antialiasing,
      nodeColor: settings.node_color ?? DEFAULT_SETTINGS.nodeColor,
      borderColor: settings.border_color ?? DEFAULT_SETTINGS.borderColor,
    },
  };
}

export function saveDiagramFile(filePath: string, doc: DiagramDocument): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmp = filePath + '.tmp';
    fs.writeFileSync(tmp, serializeDiagramFile(doc));
    fs.renameSync(tmp, filePath);
  } catch (err) {
    throw new DiagramFileError(filePath, `write failed: ${errorMessage(err)}`);
  }
}

export function loadDiagramFile(filePath: string, logger: LogSink): DiagramDocument {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new DiagramFileError(filePath, `read failed: ${errorMessage(err)}`);
  }
  return parseDiagramFile(raw, filePath, logger);
}
