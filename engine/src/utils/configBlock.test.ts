import { describe, it, expect } from 'vitest';
import { ensureFixedLayoutConfig, extractConfigBlock, removeConfigBlock } from './configBlock.js';
import { MemoryLogSink } from './logger.js';

describe('extractConfigBlock', () => {
  it('returns the text untouched when there is no block', () => {
    const result = extractConfigBlock('flowchart TD\nA --> B');
    expect(result).toEqual({ config: {}, body: 'flowchart TD\nA --> B', hasBlock: false });
  });

  it('coerces booleans, numbers and quoted strings', () => {
    const { config } = extractConfigBlock('---\nflag: true\nsize: 12.5\nname: "quoted: yes"\n---\nA');
    expect(config).toEqual({ flag: true, size: 12.5, name: 'quoted: yes' });
  });

  it('lowercases the layout value', () => {
    expect(extractConfigBlock('---\nlayout: FIXED\n---\n').config).toEqual({ layout: 'fixed' });
  });

  it('drops a block with a malformed line but still strips it', () => {
    const logger = new MemoryLogSink();
    const result = extractConfigBlock('---\nlayout fixed\n---\nflowchart TD', logger);
    expect(result.config).toEqual({});
    expect(result.body).toBe('flowchart TD');
    expect(logger.events('warn')).toEqual(['Malformed config block ignored']);
  });

  it('drops a block that fails validation', () => {
    const logger = new MemoryLogSink();
    const result = extractConfigBlock('---\nlayout: sideways\n---\nflowchart TD', logger);
    expect(result.config).toEqual({});
    expect(result.body).toBe('flowchart TD');
    expect(logger.events('warn')).toEqual(['Invalid config block ignored']);
  });

  it('treats an unclosed block as body text after the opener', () => {
    const logger = new MemoryLogSink();
    const result = extractConfigBlock('---\nflowchart TD\nA --> B', logger);
    expect(result.config).toEqual({});
    expect(result.body).toBe('flowchart TD\nA --> B');
    expect(logger.events('warn')).toEqual(['Config block is not closed']);
  });
});

describe('ensureFixedLayoutConfig', () => {
  it('prepends a block when there is none', () => {
    expect(ensureFixedLayoutConfig('flowchart TD\nA --> B')).toBe('---\nlayout: fixed\n---\n\nflowchart TD\nA --> B');
  });

  it('adds the key to an existing block', () => {
    expect(ensureFixedLayoutConfig('---\ntheme: dark\n---\nflowchart TD')).toBe('---\ntheme: dark\nlayout: fixed\n---\nflowchart TD');
  });

  it('replaces another layout value', () => {
    expect(ensureFixedLayoutConfig('---\nlayout: auto\n---\nA')).toBe('---\nlayout: fixed\n---\nA');
  });

  it('is a no-op when the layout is already fixed', () => {
    const text = '---\nlayout: fixed\n---\nA --> B';
    expect(ensureFixedLayoutConfig(text)).toBe(text);
  });

  it('leaves sequence diagrams alone', () => {
    const text = 'sequence\nA->B: hi';
    expect(ensureFixedLayoutConfig(text)).toBe(text);
  });
});

describe('removeConfigBlock', () => {
  it('drops the block and the blank lines after it', () => {
    expect(removeConfigBlock('---\nlayout: fixed\n---\n\nflowchart TD')).toBe('flowchart TD');
  });

  it('returns text without a block unchanged', () => {
    expect(removeConfigBlock('flowchart TD')).toBe('flowchart TD');
  });
});
