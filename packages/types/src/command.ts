/**
 * @module command
 * Command contracts for composable units of work.
 *
 * Capabilities are layered as separate interfaces rather than a class
 * hierarchy, so a leaf command opts into each one by exposing the member.
 */

import type { SharedContext } from './context';

/** Invoked once by an asynchronous command when its work is finished. */
export type CompletionCallback = () => void;

/** A unit of work. Synchronous commands are done when `execute()` returns. */
export interface Command {
  /** Human-readable label used in logs and lifecycle events. */
  readonly description?: string;
  /** Begin the unit of work. */
  execute(): void;
}

/**
 * A command whose `execute()` returns immediately and that signals completion
 * later through the `onComplete` slot.
 *
 * The slot is written by whoever starts the command (usually its owning group)
 * before `execute()` is called.
 */
export interface AsyncCommand extends Command {
  /** Callback to invoke exactly once per run. */
  onComplete: CompletionCallback | null;
}

/** An asynchronous command that accepts an early-termination request. */
export interface CancellableCommand extends AsyncCommand {
  /**
   * Request early termination. After this returns the command must not invoke
   * its completion callback for the current run.
   */
  cancel(): void;
}

/** A command that reads or writes the shared context of the tree it runs in. */
export interface ContextAware {
  /** Context injected by the owning group before `execute()`. */
  context: SharedContext | null;
}
