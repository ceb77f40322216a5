/** Debounces text changes so a render pass only runs once typing pauses. */

import { RENDER_DEBOUNCE_MS } from '../utils/constants.js';
import { errorMessage } from '../utils/errors.js';
import type { LogSink } from '../utils/logger.js';

export type RenderTask = (text: string) => void;

export class RenderScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pendingText: string | null = null;
  private readonly task: RenderTask;
  private readonly delayMs: number;
  private readonly logger?: LogSink;

  constructor(task: RenderTask, delayMs: number = RENDER_DEBOUNCE_MS, logger?: LogSink) {
    this.task = task;
    this.delayMs = delayMs;
    this.logger = logger;
  }

  get pending(): boolean {
    return this.timer !== null;
  }

  /** Replace any pending pass with one for `text`. */
  schedule(text: string): void {
    if (this.timer) clearTimeout(this.timer);
    this.pendingText = text;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.run();
    }, this.delayMs);
  }

  /** Run the pending pass now, if there is one. */
  flush(): void {
    if (!this.timer) return;
    clearTimeout(this.timer);
    this.timer = null;
    this.run();
  }

  cancel(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.pendingText = null;
  }

  dispose(): void {
    this.cancel();
  }

  private run(): void {
    const text = this.pendingText;
    this.pendingText = null;
    if (text === null) return;
    try {
      this.task(text);
    } catch (err) {
      this.logger?.error('Scheduled render failed', { error: errorMessage(err) });
    }
  }
}
