/**
 * @module run-command
 * Promise bridge for awaiting any command.
 */

import type { AsyncCommand, Command } from '@cmdtree/types';
import { describeCommand, isAsyncCommand } from './capabilities';
import { CommandGroup } from './command-group';
import { CommandCancelledError } from './errors';

/**
 * Execute a command and resolve when it completes.
 *
 * For an asynchronous command the completion slot is taken over for one run;
 * the previous callback is chained and then restored. Rejects when
 * `execute()` throws, and, for a group, with {@link CommandCancelledError}
 * when its cycle is cancelled. A cancelled leaf never signals anything, so
 * the promise for it stays pending.
 */
export function runCommand(command: Command): Promise<void> {
  if (!isAsyncCommand(command)) {
    return new Promise((resolve) => {
      command.execute();
      resolve();
    });
  }
  return runAsync(command);
}

function runAsync(command: AsyncCommand): Promise<void> {
  return new Promise((resolve, reject) => {
    const previous = command.onComplete;
    let unsubscribe: () => void = () => {};

    const release = (): void => {
      unsubscribe();
      command.onComplete = previous;
    };

    command.onComplete = () => {
      release();
      previous?.();
      resolve();
    };

    let executing = true;
    let cancelled = false;
    const rejectCancelled = (): void => {
      release();
      reject(new CommandCancelledError(describeCommand(command)));
    };

    if (command instanceof CommandGroup) {
      unsubscribe = command.events.on(
        'cycle:cancelled',
        () => {
          // A throwing child also cancels the cycle; the thrown error wins.
          if (executing) {
            cancelled = true;
          } else {
            rejectCancelled();
          }
        },
        { groupId: command.id },
      );
    }

    try {
      command.execute();
    } catch (error) {
      release();
      reject(error);
      return;
    } finally {
      executing = false;
    }
    if (cancelled) {
      rejectCancelled();
    }
  });
}
