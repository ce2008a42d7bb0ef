/**
 * @module commands/async-block
 * Asynchronous command wrapping a callback-style function.
 */

import type {
  CancellableCommand,
  CompletionCallback,
  ContextAware,
  SharedContext,
} from '@cmdtree/types';

/**
 * Body of an {@link AsyncBlockCommand}. Call `done` once when finished. May
 * return a teardown function, which is called if the command is cancelled.
 */
export type AsyncBlock = (
  done: () => void,
  context: SharedContext | null,
) => void | (() => void);

/**
 * Adapts a callback-style function to the cancellable command contract.
 *
 * `done` is bound to one run: calls after cancellation, after a later run
 * has started, or beyond the first are dropped.
 */
export class AsyncBlockCommand implements CancellableCommand, ContextAware {
  readonly description: string;
  onComplete: CompletionCallback | null = null;
  context: SharedContext | null = null;

  private readonly block: AsyncBlock;
  private run = 0;
  private running = false;
  /** Run that was last cancelled, so a late teardown can still be honoured. */
  private cancelledRun = 0;
  private teardown: (() => void) | null = null;

  constructor(block: AsyncBlock, description = 'async block') {
    this.block = block;
    this.description = description;
  }

  get isRunning(): boolean {
    return this.running;
  }

  execute(): void {
    if (this.running) {
      return;
    }
    const run = ++this.run;
    this.running = true;
    let teardown: void | (() => void);
    try {
      teardown = this.block(() => this.finish(run), this.context);
    } catch (error) {
      if (this.run === run) {
        this.running = false;
      }
      throw error;
    }
    if (typeof teardown !== 'function') {
      return;
    }
    // `done` or `cancel()` may already have been called synchronously.
    if (this.running && this.run === run) {
      this.teardown = teardown;
    } else if (this.cancelledRun === run) {
      teardown();
    }
  }

  cancel(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.cancelledRun = this.run;
    const teardown = this.teardown;
    this.teardown = null;
    teardown?.();
  }

  private finish(run: number): void {
    if (!this.running || this.run !== run) {
      return;
    }
    this.running = false;
    this.teardown = null;
    this.onComplete?.();
  }
}
