/**
 * @cmdtree/types
 *
 * Shared type definitions for cmdtree.
 * This package contains zero runtime code — only TypeScript interfaces and
 * types that serve as the contract between leaf commands and the group engine.
 *
 * @packageDocumentation
 */

// Command contracts
export type {
  AsyncCommand,
  CancellableCommand,
  Command,
  CompletionCallback,
  ContextAware,
} from './command';

// Shared context
export type { SharedContext } from './context';

// Events
export type {
  GroupEventBus,
  GroupEventCallback,
  GroupEventFilter,
  GroupEventMap,
  GroupEventSource,
} from './events';
