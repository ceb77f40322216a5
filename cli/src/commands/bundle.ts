import fs from 'node:fs';
import path from 'node:path';
import {
  DiagramError,
  ensureFixedLayoutConfig,
  errorMessage,
  loadDiagramFile,
  removeConfigBlock,
  saveDiagramFile,
} from 'flowscribe-engine';
import { createContext, readDiagramText } from '../context.js';
import { reportRender, writeError, writeLine } from '../output.js';

export interface SaveOptions {
  out: string;
  positions?: string;
  fixedLayout?: boolean;
}

export interface OpenOptions {
  positions?: string;
  textOut?: string;
  stripConfig?: boolean;
  json?: boolean;
}

/** Render the diagram, then write its text, stored geometry and settings to one file. */
export function runSave(file: string, options: SaveOptions): void {
  const ctx = createContext({ positions: options.positions });
  let text = readDiagramText(file);
  if (options.fixedLayout) text = ensureFixedLayoutConfig(text);

  const result = ctx.engine.render(text, ctx.surface);
  if (!result.ok) {
    writeError(result.status);
    process.exitCode = 1;
    return;
  }

  const out = path.resolve(options.out);
  saveDiagramFile(out, {
    text,
    positions: ctx.store.snapshot(),
    settings: ctx.engine.renderer.currentSettings,
  });
  writeLine(`Saved ${out}`);
}

/** Load a saved file into the position store and render it. */
export function runOpen(bundle: string, options: OpenOptions): void {
  const ctx = createContext({ positions: options.positions });
  const doc = loadDiagramFile(path.resolve(bundle), ctx.logger);
  ctx.store.replace(doc.positions);
  ctx.engine.renderer.updateSettings(doc.settings);

  if (options.textOut) {
    const text = options.stripConfig ? removeConfigBlock(doc.text) : doc.text;
    try {
      fs.writeFileSync(options.textOut, text);
    } catch (err) {
      throw new DiagramError(`Cannot write ${options.textOut}: ${errorMessage(err)}`);
    }
  }

  const result = ctx.engine.render(doc.text, ctx.surface);
  if (!reportRender(result, ctx.surface, options.json)) process.exitCode = 1;
}
