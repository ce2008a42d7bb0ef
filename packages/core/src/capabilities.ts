/**
 * @module capabilities
 * Capability queries over the command contracts.
 *
 * Commands are classified by the members they expose, so a leaf never has to
 * extend a library base class.
 */

import type {
  AsyncCommand,
  CancellableCommand,
  Command,
  ContextAware,
} from '@cmdtree/types';

/** Whether the command reports completion through an `onComplete` slot. */
export function isAsyncCommand(command: Command): command is AsyncCommand {
  return 'onComplete' in command;
}

/** Whether the command is asynchronous and exposes `cancel()`. */
export function isCancellableCommand(command: Command): command is CancellableCommand {
  return isAsyncCommand(command) && 'cancel' in command && typeof command.cancel === 'function';
}

/** Whether the command accepts an injected shared context. */
export function isContextAware<T extends Command>(command: T): command is T & ContextAware {
  return 'context' in command;
}

/** Label used for a command in logs and events. */
export function describeCommand(command: Command): string {
  return command.description ?? command.constructor.name;
}
