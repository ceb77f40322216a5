/** Reading and rewriting the leading `---` configuration block of diagram text. */

import type { ConfigValue, DiagramConfig } from '../models/diagram.js';
import type { LogSink } from './logger.js';
import { DiagramConfigSchema, formatIssues } from './stateValidator.js';

export interface ConfigBlock {
  config: DiagramConfig;
  /** Diagram text with the block removed. */
  body: string;
  hasBlock: boolean;
}

interface BlockBounds {
  open: number;
  /** -1 when the block is never closed. */
  close: number;
}

const DELIMITER = '---';
const SEQUENCE_HEADER_RE = /^sequence/i;
const LAYOUT_LINE_RE = /^\s*layout\s*:\s*(.*)$/i;

function findBlock(lines: string[]): BlockBounds | null {
  const open = lines.findIndex((line) => line.trim() !== '');
  if (open === -1 || lines[open].trim() !== DELIMITER) return null;
  let close = -1;
  for (let i = open + 1; i < lines.length; i++) {
    if (lines[i].trim() === DELIMITER) {
      close = i;
      break;
    }
  }
  return { open, close };
}

function coerceValue(raw: string): ConfigValue {
  const quoted = raw.match(/^(['"])(.*)\1$/);
  if (quoted) return quoted[2];
  const lower = raw.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(raw)) return Number(raw);
  return raw;
}

/**
 * Split a leading `key: value` block from the diagram text. Malformed blocks
 * are logged and yield an empty config; the block is removed either way.
 */
export function extractConfigBlock(text: string, logger?: LogSink): ConfigBlock {
  const lines = text.split(/\r?\n/);
  const block = findBlock(lines);
  if (!block) return { config: {}, body: text, hasBlock: false };

  if (block.close === -1) {
    logger?.warn('Config block is not closed', { line: block.open + 1 });
    return { config: {}, body: lines.slice(block.open + 1).join('\n'), hasBlock: true };
  }

  const body = lines.slice(block.close + 1).join('\n');
  const raw: Record<string, ConfigValue> = {};
  const malformed: string[] = [];
  for (const line of lines.slice(block.open + 1, block.close)) {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;
    const colon = trimmed.indexOf(':');
    if (colon <= 0) {
      malformed.push(trimmed);
      continue;
    }
    raw[trimmed.slice(0, colon).trim()] = coerceValue(trimmed.slice(colon + 1).trim());
  }

  if (malformed.length > 0) {
    logger?.warn('Malformed config block ignored', { lines: malformed });
    return { config: {}, body, hasBlock: true };
  }

  const parsed = DiagramConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logger?.warn('Invalid config block ignored', { issues: formatIssues(parsed.error) });
    return { config: {}, body, hasBlock: true };
  }
  return { config: parsed.data, body, hasBlock: true };
}

function isSequenceText(text: string): boolean {
  const body = extractConfigBlock(text).body;
  const first = body.split(/\r?\n/).find((line) => line.trim() !== '');
  return first !== undefined && SEQUENCE_HEADER_RE.test(first.trim());
}

/**
 * Make the text carry `layout: fixed`, replacing another layout value or
 * adding a block. Sequence diagrams are returned unchanged.
 */
export function ensureFixedLayoutConfig(text: string): string {
  if (isSequenceText(text)) return text;

  const lines = text.split('\n');
  const block = findBlock(lines);
  if (!block || block.close === -1) {
    return `${DELIMITER}\nlayout: fixed\n${DELIMITER}\n\n${text}`;
  }

  const header = lines.slice(block.open + 1, block.close);
  const layoutIdx = header.findIndex((line) => LAYOUT_LINE_RE.test(line));
  if (layoutIdx === -1) {
    header.push('layout: fixed');
  } else {
    const current = header[layoutIdx].match(LAYOUT_LINE_RE);
    if (current && current[1].trim().toLowerCase() === 'fixed') return text;
    header[layoutIdx] = 'layout: fixed';
  }
  return [...lines.slice(0, block.open + 1), ...header, ...lines.slice(block.close)].join('\n');
}

/** Drop the leading config block and the blank lines that follow it. */
export function removeConfigBlock(text: string): string {
  const lines = text.split('\n');
  const block = findBlock(lines);
  if (!block || block.close === -1) return text;
  const rest = lines.slice(block.close + 1);
  while (rest.length > 0 && rest[0].trim() === '') rest.shift();
  return rest.join('\n');
}
