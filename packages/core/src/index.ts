/**
 * @cmdtree/core
 *
 * Concurrent and sequential command groups, leaf commands, and the
 * supporting logger, configuration and event bus.
 *
 * @packageDocumentation
 */

// Capability queries
export {
  describeCommand,
  isAsyncCommand,
  isCancellableCommand,
  isContextAware,
} from './capabilities';

// Groups
export { CommandGroup } from './command-group';
export type { CancelSummary, CommandGroupOptions, CycleToken } from './command-group';
export { SequentialCommandGroup } from './sequential-command-group';

// Shared context
export { createSharedContext, readContext } from './shared-context';

// Awaiting commands
export { runCommand } from './run-command';

// Lifecycle events
export { GroupEventBusImpl } from './event-bus';

// Leaf commands
export {
  AsyncBlockCommand,
  BlockCommand,
  DelayCommand,
  PrintCommand,
  PromiseCommand,
} from './commands';
export type {
  AsyncBlock,
  Block,
  LineWriter,
  PromiseCommandOptions,
  PromiseFactory,
} from './commands';

// Errors
export { CallbackOverwriteError, CommandCancelledError, CommandError } from './errors';

// Configuration & logging
export { DEFAULT_GROUP_OPTIONS, DEFAULT_LOG_LEVEL, LOG_LEVELS, loadConfig } from './config';
export type { CmdtreeConfig, LogLevel } from './config';
export { createLogger, rootLogger } from './logger';
export type { Logger } from './logger';

// Identity
export { generateId } from './uuid';
