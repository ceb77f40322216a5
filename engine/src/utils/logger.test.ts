import { describe, it, expect, vi, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DiagramLogger, MemoryLogSink, formatData } from './logger.js';

describe('DiagramLogger', () => {
  let tmpDir: string | null = null;

  afterEach(() => {
    vi.restoreAllMocks();
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = null;
  });

  it('routes levels to the matching console method', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new DiagramLogger();
    logger.info('Rendered', { nodes: 2 });
    logger.warn('Careful');
    logger.error('Broken', { error: 'x' });
    expect(log).toHaveBeenCalledWith('[flowscribe] Rendered nodes=2');
    expect(warn).toHaveBeenCalledWith('[flowscribe] Careful');
    expect(error).toHaveBeenCalledWith('[flowscribe] Broken error=x');
  });

  it('keeps debug entries off the console by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    new DiagramLogger().debug('Noise');
    expect(log).not.toHaveBeenCalled();
  });

  it('writes every entry to the JSONL and text logs', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flowscribe-log-'));
    const logger = new DiagramLogger({ logDir: tmpDir });
    logger.debug('Parsed', { lines: 3 });
    logger.info('Rendered');

    const entries = fs
      .readFileSync(path.join(tmpDir, 'flowscribe.jsonl'), 'utf-8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));
    expect(entries.map((e) => [e.level, e.event, e.data])).toEqual([
      ['debug', 'Parsed', { lines: 3 }],
      ['info', 'Rendered', undefined],
    ]);

    const text = fs.readFileSync(path.join(tmpDir, 'flowscribe.log'), 'utf-8').trim().split('\n');
    expect(text[0]).toMatch(/^\[.+\] \[DEBUG\] Parsed lines=3$/);
  });

  it('falls back to the console when the log files cannot be written', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flowscribe-log-'));
    const logger = new DiagramLogger({ logDir: tmpDir });
    // A directory where the log file should be makes every append fail.
    fs.mkdirSync(path.join(tmpDir, 'flowscribe.jsonl'));
    logger.info('First');
    logger.info('Second');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\[flowscribe\] log file write failed: /);
  });
});

describe('formatData', () => {
  it('abbreviates long strings and serializes objects', () => {
    expect(formatData({ text: 'x'.repeat(201), pos: { x: 1 }, ok: true })).toBe('text=[201 chars], pos={"x":1}, ok=true');
  });
});

describe('MemoryLogSink', () => {
  it('filters events by level', () => {
    const sink = new MemoryLogSink();
    sink.info('a');
    sink.warn('b');
    sink.info('c');
    expect(sink.events('info')).toEqual(['a', 'c']);
  });
});
