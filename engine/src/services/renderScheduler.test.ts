import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RenderScheduler } from './renderScheduler.js';
import { MemoryLogSink } from '../utils/logger.js';

describe('RenderScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs once with the latest text after the quiet period', () => {
    const task = vi.fn();
    const scheduler = new RenderScheduler(task, 800);
    scheduler.schedule('a');
    vi.advanceTimersByTime(500);
    scheduler.schedule('ab');
    vi.advanceTimersByTime(500);
    expect(task).not.toHaveBeenCalled();
    vi.advanceTimersByTime(300);
    expect(task).toHaveBeenCalledTimes(1);
    expect(task).toHaveBeenCalledWith('ab');
    expect(scheduler.pending).toBe(false);
  });

  it('flushes a pending pass immediately', () => {
    const task = vi.fn();
    const scheduler = new RenderScheduler(task, 800);
    scheduler.flush();
    expect(task).not.toHaveBeenCalled();
    scheduler.schedule('x');
    expect(scheduler.pending).toBe(true);
    scheduler.flush();
    expect(task).toHaveBeenCalledWith('x');
    vi.advanceTimersByTime(1000);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('drops the pending pass on cancel', () => {
    const task = vi.fn();
    const scheduler = new RenderScheduler(task, 800);
    scheduler.schedule('x');
    scheduler.cancel();
    vi.advanceTimersByTime(1000);
    expect(task).not.toHaveBeenCalled();
  });

  it('logs a failing pass and keeps scheduling', () => {
    const logger = new MemoryLogSink();
    const task = vi.fn((text: string) => {
      if (text === 'bad') throw new Error('parse exploded');
    });
    const scheduler = new RenderScheduler(task, 100, logger);
    scheduler.schedule('bad');
    vi.advanceTimersByTime(100);
    expect(logger.entries[0]).toMatchObject({ level: 'error', event: 'Scheduled render failed', data: { error: 'parse exploded' } });

    scheduler.schedule('good');
    vi.advanceTimersByTime(100);
    expect(task).toHaveBeenLastCalledWith('good');
  });
});
