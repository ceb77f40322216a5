import { createContext, readDiagramText } from '../context.js';
import { writeError, writeLine } from '../output.js';

export interface LayoutOptions {
  positions?: string;
}

/** Render, then fit every node to its label and snap it to the grid. */
export function runNormalize(file: string, options: LayoutOptions): void {
  const ctx = createContext({ positions: options.positions });
  const result = ctx.engine.render(readDiagramText(file), ctx.surface);
  if (!result.ok) {
    writeError(result.status);
    process.exitCode = 1;
    return;
  }
  const count = ctx.engine.normalize(ctx.surface);
  writeLine(`Normalized ${count} nodes`);
}

/** Forget every stored position. */
export function runReset(options: LayoutOptions): void {
  const ctx = createContext({ positions: options.positions });
  ctx.engine.resetPositions(ctx.surface);
  writeLine('Positions reset');
}
