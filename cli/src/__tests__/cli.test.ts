import { describe, it, expect } from 'vitest';
import { createProgram } from '../cli.js';

function command(name: string) {
  return createProgram().commands.find((c) => c.name() === name);
}

describe('CLI program', () => {
  it('creates a commander program with name "flowscribe"', () => {
    const program = createProgram();
    expect(program.name()).toBe('flowscribe');
    expect(program.version()).toBe('0.1.0');
  });

  it('registers every command', () => {
    const names = createProgram().commands.map((c) => c.name());
    expect(names).toEqual(['parse', 'render', 'normalize', 'reset', 'save', 'open', 'watch']);
  });

  it('render command has --positions and --json options', () => {
    const longs = command('render')?.options.map((o) => o.long);
    expect(longs).toEqual(['--positions', '--json']);
  });

  it('save command requires --out', () => {
    const out = command('save')?.options.find((o) => o.long === '--out');
    expect(out?.mandatory).toBe(true);
  });

  it('open command has --text-out and --strip-config options', () => {
    const open = command('open');
    expect(open?.options.find((o) => o.long === '--text-out')).toBeDefined();
    expect(open?.options.find((o) => o.long === '--strip-config')).toBeDefined();
  });
});
