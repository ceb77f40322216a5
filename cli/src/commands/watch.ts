import fs from 'node:fs';
import { errorMessage } from 'flowscribe-engine';
import { createContext, readDiagramText, type CommandContext } from '../context.js';
import { reportRender, writeError } from '../output.js';

export interface WatchOptions {
  positions?: string;
  json?: boolean;
}

export interface DiagramWatcher {
  /** Call on every change to the file; renders once edits pause. */
  onChange(): void;
  close(): void;
}

export function createWatcher(file: string, ctx: CommandContext, json = false): DiagramWatcher {
  return {
    onChange() {
      let text: string;
      try {
        text = readDiagramText(file);
      } catch (err) {
        writeError(`Error: ${errorMessage(err)}`);
        return;
      }
      ctx.engine.scheduleRender(text, ctx.surface, (result) => {
        reportRender(result, ctx.surface, json);
      });
    },
    close() {
      ctx.engine.dispose();
    },
  };
}

/** Watch `file` for edits; watch errors are reported and the handle stays open. */
export function watchFile(file: string, watcher: DiagramWatcher): fs.FSWatcher {
  const fsWatcher = watchFile(file, watcher);
  fsWatcher.on('error', (err) => writeError(`Error: watching ${file} failed: ${errorMessage(err)}`));
  return fsWatcher;
}

/** Render now and again after every edit, until interrupted. */
export async function runWatch(file: string, options: WatchOptions): Promise<void> {
  const ctx = createContext({ positions: options.positions });
  if (!reportRender(ctx.engine.render(readDiagramText(file), ctx.surface), ctx.surface, options.json)) {
    process.exitCode = 1;
  }

  const watcher = createWatcher(file, ctx, options.json);
  const fsWatcher = watchFile(file, watcher);
  writeError(`Watching ${file} (Ctrl+C to stop)`);

  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => resolve());
  });
  fsWatcher.close();
  watcher.close();
}
