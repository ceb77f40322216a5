import type { MemorySurface, RenderResult, ScenePrimitive } from 'flowscribe-engine';

function num(value: number): string {
  return String(Math.round(value * 10) / 10);
}

function point(p: { x: number; y: number }): string {
  return `(${num(p.x)}, ${num(p.y)})`;
}

/** One human-readable line per scene item. */
export function formatPrimitive(item: ScenePrimitive): string {
  switch (item.kind) {
    case 'node':
      return `node ${item.id} "${item.label}" at ${point(item.rect)} ${num(item.rect.width)}x${num(item.rect.height)}`;
    case 'edge': {
      const arrow = item.edgeType === 'bidirectional' ? '<->' : '->';
      const label = item.label ? ` "${item.label}"` : '';
      const curve = item.control1 ? ' curved' : '';
      return `edge ${item.source} ${arrow} ${item.target}${label} ${point(item.start)} -> ${point(item.end)}${curve}`;
    }
    case 'participant':
      return `participant ${item.participantId} "${item.label}" at x=${num(item.header.x)}`;
    case 'message':
      return `message ${item.source} -> ${item.target} "${item.text}" at y=${num(item.from.y)}`;
    case 'note':
      return `note over ${item.participants.join(',')} "${item.text}" at y=${num(item.rect.y)}`;
    case 'title':
      return `title "${item.text}"`;
  }
}

export function writeLine(text: string): void {
  process.stdout.write(text + '\n');
}

export function writeError(text: string): void {
  process.stderr.write(text + '\n');
}

export function writeJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n');
}

/** Print a render pass. Returns false when the pass failed. */
export function reportRender(result: RenderResult, surface: MemorySurface, json = false): boolean {
  if (!result.ok) {
    writeError(result.status);
    return false;
  }
  if (json) {
    writeJson({ status: result.status, items: surface.snapshot() });
    return true;
  }
  writeLine(result.status);
  for (const item of surface.snapshot()) writeLine(formatPrimitive(item));
  return true;
}
