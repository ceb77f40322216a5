#!/usr/bin/env node

import { Command } from 'commander';
import { errorMessage } from 'flowscribe-engine';
import type { OpenOptions, SaveOptions } from './commands/bundle.js';
import type { LayoutOptions } from './commands/layout.js';
import type { RenderOptions } from './commands/render.js';
import type { WatchOptions } from './commands/watch.js';

const POSITIONS_HELP = 'Position store file (default: $FLOWSCRIBE_POSITIONS or ~/.flowscribe/positions.json)';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('flowscribe')
    .description('Render flowchart and sequence diagram text with layouts that survive edits')
    .version('0.1.0');

  program
    .command('parse <file>')
    .description('Print the parsed diagram as JSON')
    .action(async (file: string) => {
      const { runParse } = await import('./commands/parse.js');
      runParse(file);
    });

  program
    .command('render <file>')
    .description('Render a diagram and list where every item was placed')
    .option('--positions <path>', POSITIONS_HELP)
    .option('--json', 'Output the scene as JSON')
    .action(async (file: string, options: RenderOptions) => {
      const { runRender } = await import('./commands/render.js');
      runRender(file, options);
    });

  program
    .command('normalize <file>')
    .description('Fit nodes to their labels, snap them to the grid and store the result')
    .option('--positions <path>', POSITIONS_HELP)
    .action(async (file: string, options: LayoutOptions) => {
      const { runNormalize } = await import('./commands/layout.js');
      runNormalize(file, options);
    });

  program
    .command('reset')
    .description('Forget all stored positions')
    .option('--positions <path>', POSITIONS_HELP)
    .action(async (options: LayoutOptions) => {
      const { runReset } = await import('./commands/layout.js');
      runReset(options);
    });

  program
    .command('save <file>')
    .description('Save diagram text, stored geometry and settings to one JSON file')
    .requiredOption('--out <path>', 'Saved diagram file to write')
    .option('--positions <path>', POSITIONS_HELP)
    .option('--fixed-layout', 'Add "layout: fixed" to the config block of a flowchart')
    .action(async (file: string, options: SaveOptions) => {
      const { runSave } = await import('./commands/bundle.js');
      runSave(file, options);
    });

  program
    .command('open <bundle>')
    .description('Load a saved diagram file into the position store and render it')
    .option('--positions <path>', POSITIONS_HELP)
    .option('--text-out <file>', 'Also write the diagram text to this file')
    .option('--strip-config', 'Leave the config block out of --text-out')
    .option('--json', 'Output the scene as JSON')
    .action(async (bundle: string, options: OpenOptions) => {
      const { runOpen } = await import('./commands/bundle.js');
      runOpen(bundle, options);
    });

  program
    .command('watch <file>')
    .description('Re-render whenever the file changes')
    .option('--positions <path>', POSITIONS_HELP)
    .option('--json', 'Output each scene as JSON')
    .action(async (file: string, options: WatchOptions) => {
      const { runWatch } = await import('./commands/watch.js');
      await runWatch(file, options);
    });

  return program;
}

const isDirectRun = process.argv[1]?.endsWith('cli.js') || process.argv[1]?.endsWith('cli.ts');
if (isDirectRun) {
  createProgram()
    .parseAsync()
    .catch((err: unknown) => {
      process.stderr.write(`Error: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    });
}
