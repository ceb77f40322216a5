/** Label measurement by character count, for hosts without a font engine. */

import { CHAR_WIDTH, LINE_HEIGHT } from './constants.js';

const BREAK_RE = /\\n|<br\s*\/?>/gi;
const TAG_RE = /<[^>]+>/g;

/** Visible lines of a label: `\n` escapes and `<br>` tags break lines, other tags are dropped. */
export function labelLines(label: string): string[] {
  const unquoted = label.replace(/^"+|"+$/g, '');
  return unquoted.split(BREAK_RE).map((line) => line.replace(TAG_RE, ''));
}

export function measureText(label: string): { width: number; height: number } {
  const lines = labelLines(label);
  const longest = lines.reduce((max, line) => Math.max(max, line.length), 0);
  return { width: longest * CHAR_WIDTH, height: lines.length * LINE_HEIGHT };
}
