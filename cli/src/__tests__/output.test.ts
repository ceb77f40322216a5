import { describe, it, expect } from 'vitest';
import { formatPrimitive } from '../output.js';

describe('formatPrimitive', () => {
  it('formats a curved bidirectional edge with a label', () => {
    expect(
      formatPrimitive({
        kind: 'edge',
        id: 'A|B|go|bidirectional',
        source: 'A',
        target: 'B',
        label: 'go',
        edgeType: 'bidirectional',
        style: 'solid',
        start: { x: 160, y: 30 },
        end: { x: 400.04, y: 30 },
        control1: { x: 220, y: 70 },
        control2: { x: 340, y: 70 },
        arrows: [],
        selected: false,
      }),
    ).toBe('edge A <-> B "go" (160, 30) -> (400, 30) curved');
  });

  it('formats sequence items', () => {
    expect(
      formatPrimitive({
        kind: 'participant',
        id: 'participant:U',
        participantId: 'U',
        label: 'User',
        header: { x: 220, y: 0, width: 140, height: 42 },
        lifeline: { x: 290, top: 42, bottom: 1000 },
      }),
    ).toBe('participant U "User" at x=220');
    expect(
      formatPrimitive({
        kind: 'note',
        id: 'note:0|U|hi',
        participants: ['U', 'S'],
        text: 'hi',
        rect: { x: 0, y: 310, width: 360, height: 32 },
      }),
    ).toBe('note over U,S "hi" at y=310');
    expect(formatPrimitive({ kind: 'title', id: 'title', text: 'Chat', anchor: { x: 0, y: 8 } })).toBe('title "Chat"');
  });
});
