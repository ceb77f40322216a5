/** Sequence diagram parsing. Participant order is first-seen order. */

import type {
  DiagramConfig,
  MessageStyle,
  SequenceDiagram,
  SequenceMessage,
  SequenceNote,
  SequenceParticipant,
} from '../models/diagram.js';
import type { LogSink } from '../utils/logger.js';

const TITLE_RE = /^title\s+(.+)$/i;
const PARTICIPANT_RE = /^(?:participant|actor)\s+(\w+)(?:\s+as\s+(.+))?$/i;
const NOTE_OVER_RE = /^note\s+over\s+([\w,\s]+?)\s*:\s*(.+)$/i;
const MESSAGE_RE = /^(\w+)\s*(-{1,2}>{1,2})\s*(\w+)\s*:\s*(.+)$/;

export function messageStyle(arrow: string): MessageStyle {
  if (arrow.includes('>>')) return 'async';
  if (arrow.includes('-->')) return 'dashed';
  return 'solid';
}

/** `lines` excludes the `sequence` header line. */
export function parseSequence(lines: string[], config: DiagramConfig, logger?: LogSink): SequenceDiagram {
  const participants = new Map<string, SequenceParticipant>();
  const messages: SequenceMessage[] = [];
  const notes: SequenceNote[] = [];
  let title = '';

  const ensureParticipant = (id: string, label?: string): void => {
    const existing = participants.get(id);
    if (!existing) {
      participants.set(id, { id, label: label || id });
    } else if (label) {
      existing.label = label;
    }
  };

  for (const line of lines) {
    const titleMatch = line.match(TITLE_RE);
    if (titleMatch) {
      title = titleMatch[1].trim();
      continue;
    }

    const participant = line.match(PARTICIPANT_RE);
    if (participant) {
      const id = participant[1];
      ensureParticipant(id, participant[2] ? participant[2].trim() : id);
      continue;
    }

    const note = line.match(NOTE_OVER_RE);
    if (note) {
      const ids = note[1].split(',').map((s) => s.trim()).filter(Boolean);
      for (const id of ids) ensureParticipant(id);
      notes.push({ participants: ids, text: note[2].trim() });
      continue;
    }

    const message = line.match(MESSAGE_RE);
    if (message) {
      const [, source, arrow, target, text] = message;
      ensureParticipant(source);
      ensureParticipant(target);
      messages.push({ source, target, text: text.trim(), style: messageStyle(arrow) });
      continue;
    }

    logger?.debug('Skipped unrecognized sequence line', { line });
  }

  return {
    type: 'sequence',
    title,
    participants: [...participants.values()],
    messages,
    notes,
    config,
  };
}
