import { REDRAW_DEBOUNCE_MS } from '../../constants/theme';

/**
 * Coalesces redraw requests: every request restarts the timer, and `draw`
 * runs once after `delayMs` without further requests.
 */
export class RedrawScheduler {
  private timer: ReturnType<typeof setTimeout> | undefined;

  constructor(
    private readonly draw: () => void,
    private readonly delayMs: number = REDRAW_DEBOUNCE_MS
  ) {}

  request(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.draw();
    }, this.delayMs);
  }

  get pending(): boolean {
    return this.timer !== undefined;
  }

  /** Draw now if a request is waiting */
  flush(): void {
    if (!this.pending) return;
    this.cancel();
    this.draw();
  }

  cancel(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
  }
}
