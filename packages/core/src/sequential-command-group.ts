/**
 * @module sequential-command-group
 * Sequential command group: runs children one at a time in list order.
 *
 * The next child is read from the live list at the moment of advance, so
 * commands appended mid-cycle run after everything already queued.
 */

import { describeCommand, isCancellableCommand } from './capabilities';
import { CommandGroup } from './command-group';
import type { CancelSummary, CycleToken } from './command-group';
import { DEFAULT_GROUP_OPTIONS } from './config';
import type { Command } from '@cmdtree/types';

interface Step {
  readonly command: Command;
  readonly index: number;
  done: boolean;
}

/**
 * Runs its children strictly in sequence with no overlap.
 *
 * With auto-start off the list is kept and every cycle replays it from the
 * start. With auto-start on the group behaves as a work queue: each child is
 * removed once it completes, and appending to an exhausted group starts a
 * fresh cycle holding only the new commands, even when the previous cycle
 * replayed the list. The mode is fixed per cycle.
 */
export class SequentialCommandGroup extends CommandGroup {
  /** Position of the current child in the list. */
  private cursor = 0;
  private step: Step | null = null;
  private steps = 0;
  private consuming = false;
  private launching = false;
  /** Leading children that completed in the last replayable cycle. */
  private finished = 0;

  /** Children not yet completed in the current cycle, including late appends. */
  override get outstanding(): number {
    return this.running ? this.children.length - this.cursor : 0;
  }

  protected override run(cycle: number): void {
    this.cursor = 0;
    this.steps = 0;
    this.consuming = this.autoStart;
    this.advance(cycle);
  }

  protected override completeChild(token: CycleToken): void {
    const step = this.step;
    if (step === null || step.index !== token.index || step.done) {
      this.logger.warn({ ...token }, 'child completed more than once; ignored');
      return;
    }
    step.done = true;
    if (this.consuming) {
      this.children.splice(this.cursor, 1);
    } else {
      this.cursor++;
    }
    this.emitChild('command:completed', token, step.command);

    // Inline completions are picked up by the loop in advance().
    if (!this.launching) {
      this.advance(token.cycle);
    }
  }

  protected override cancelRunning(): CancelSummary {
    const step = this.step;
    this.step = null;
    const inFlight = step !== null && !step.done;

    let cancelled = 0;
    let abandoned = 0;
    if (step !== null && inFlight) {
      if (isCancellableCommand(step.command)) {
        step.command.cancel();
        cancelled = 1;
      } else {
        this.logger.debug(
          { child: describeCommand(step.command) },
          'child cannot be cancelled; forgetting it',
        );
        abandoned = 1;
      }
    }

    const discarded = Math.max(0, this.children.length - this.cursor - (inFlight ? 1 : 0));
    // A queue forgets its current child; a replayable list keeps it.
    const keep = inFlight && !this.consuming ? this.cursor + 1 : this.cursor;
    this.children.splice(keep);
    this.finished = this.cursor;
    return { cancelled, abandoned, discarded };
  }

  protected override finishCycle(cycle: number): void {
    this.step = null;
    // A queue has consumed everything; a replayable list finished it all.
    this.finished = this.children.length;
    super.finishCycle(cycle);
  }

  /**
   * Switching auto-start on turns a replayable list into a queue. Children
   * that already ran are dropped so the new cycle starts with the appended ones.
   */
  protected override prepareAutoStart(): void {
    if (this.finished > 0) {
      this.logger.debug({ dropped: this.finished }, 'dropping children finished before auto-start');
      this.children.splice(0, this.finished);
      this.finished = 0;
    }
  }

  protected override defaultDescription(): string {
    return DEFAULT_GROUP_OPTIONS.sequentialDescription;
  }

  /** Start children until one is still pending or the list is exhausted. */
  private advance(cycle: number): void {
    while (this.isCurrent(cycle)) {
      if (this.cursor >= this.children.length) {
        this.finishCycle(cycle);
        return;
      }

      const step: Step = { command: this.children[this.cursor], index: this.steps++, done: false };
      this.step = step;
      this.launching = true;
      try {
        this.launch(step.command, { cycle, index: step.index });
      } finally {
        this.launching = false;
      }

      if (!step.done) {
        return;
      }
    }
  }
}
