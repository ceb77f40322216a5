/**
 * Entry point of the DSL: config block, comment stripping, then dispatch to
 * the flowchart or sequence parser. Never throws on text that merely fails to
 * match; unrecognized lines are skipped.
 */

import type { Diagram } from '../models/diagram.js';
import { extractConfigBlock } from '../utils/configBlock.js';
import type { LogSink } from '../utils/logger.js';
import { parseFlowchart } from './flowchartParser.js';
import { parseSequence } from './sequenceParser.js';

const SEQUENCE_HEADER_RE = /^sequence/i;

function isComment(line: string): boolean {
  return line.startsWith('#') || line.startsWith('%%');
}

/** Trimmed, non-blank, non-comment lines of the diagram body. */
export function significantLines(body: string): string[] {
  return body
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !isComment(line));
}

export function parseDiagram(text: string, logger?: LogSink): Diagram {
  const { config, body } = extractConfigBlock(text, logger);
  const lines = significantLines(body);

  if (lines.length > 0 && SEQUENCE_HEADER_RE.test(lines[0])) {
    return parseSequence(lines.slice(1), config, logger);
  }
  return parseFlowchart(lines, config, logger);
}
