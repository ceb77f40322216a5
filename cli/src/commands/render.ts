import { createContext, readDiagramText } from '../context.js';
import { reportRender } from '../output.js';

export interface RenderOptions {
  positions?: string;
  json?: boolean;
}

export function runRender(file: string, options: RenderOptions): void {
  const ctx = createContext({ positions: options.positions });
  const result = ctx.engine.render(readDiagramText(file), ctx.surface);
  if (!reportRender(result, ctx.surface, options.json)) process.exitCode = 1;
}
