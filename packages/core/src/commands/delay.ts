/**
 * @module commands/delay
 * Cancellable command that completes after a fixed delay.
 */

import type { CancellableCommand, CompletionCallback } from '@cmdtree/types';

/** Completes `ms` milliseconds after `execute()`. */
export class DelayCommand implements CancellableCommand {
  readonly description: string;
  readonly ms: number;
  onComplete: CompletionCallback | null = null;

  private timer: ReturnType<typeof setTimeout> | null = null;

  /** @param ms - Delay in milliseconds; a finite number >= 0. */
  constructor(ms: number) {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new RangeError('ms must be a finite number >= 0');
    }
    this.ms = ms;
    this.description = `delay ${ms}ms`;
  }

  /** Whether a timer is armed. */
  get isPending(): boolean {
    return this.timer !== null;
  }

  /** Arm the timer. Ignored while one is already pending. */
  execute(): void {
    if (this.timer !== null) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.onComplete?.();
    }, this.ms);
  }

  /** Disarm the timer; the callback will not fire. */
  cancel(): void {
    if (this.timer === null) {
      return;
    }
    clearTimeout(this.timer);
    this.timer = null;
  }
}
