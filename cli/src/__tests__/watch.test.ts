import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createContext } from '../context.js';
import { createWatcher, watchFile } from '../commands/watch.js';

describe('createWatcher', () => {
  let tmpDir: string;
  let diagram: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    vi.useFakeTimers();
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flowscribe-watch-'));
    diagram = path.join(tmpDir, 'diagram.mmd');
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function watcher() {
    const ctx = createContext({
      positions: path.join(tmpDir, 'positions.json'),
      env: { FLOWSCRIBE_DEBOUNCE_MS: '50' },
    });
    return createWatcher(diagram, ctx);
  }

  it('renders the latest text once edits pause', () => {
    const w = watcher();
    fs.writeFileSync(diagram, 'flowchart TD\nA');
    w.onChange();
    fs.writeFileSync(diagram, 'sequence\nA->B: hi');
    w.onChange();
    vi.advanceTimersByTime(49);
    expect(stdout).toEqual([]);
    vi.advanceTimersByTime(1);
    expect(stdout.join('').split('\n')[0]).toBe('Rendered 2 participants');
    w.close();
  });

  it('reports a file that disappeared without stopping', () => {
    const w = watcher();
    w.onChange();
    expect(stderr.join('')).toMatch(/^Error: Cannot read /);
    w.close();
  });

  it('reports watch errors instead of throwing', () => {
    fs.writeFileSync(diagram, 'flowchart TD\nA');
    const w = watcher();
    const handle = watchFile(diagram, w);
    handle.emit('error', new Error('disk gone'));
    expect(stderr).toEqual([`Error: watching ${diagram} failed: disk gone\n`]);
    handle.close();
    w.close();
  });
});
