/**
 * @module events
 * Type-safe lifecycle events emitted by command groups.
 */

/** Fields carried by every group event. */
export interface GroupEventSource {
  /** Unique id of the emitting group instance. */
  groupId: string;
  /** Description of the emitting group. */
  group: string;
}

/** Map of event names to their payload types. */
export interface GroupEventMap {
  /** Fired when a command is appended to a group. */
  'command:appended': GroupEventSource & { index: number; description: string };
  /** Fired when a group starts a cycle. */
  'cycle:started': GroupEventSource & { cycle: number; size: number };
  /** Fired right before a child's `execute()` is called. */
  'command:started': GroupEventSource & { cycle: number; index: number; description: string };
  /** Fired when a child's completion is accepted. */
  'command:completed': GroupEventSource & { cycle: number; index: number; description: string };
  /** Fired when a cycle finishes, right before the group's callback. */
  'cycle:completed': GroupEventSource & { cycle: number };
  /**
   * Fired when a running cycle is cancelled.
   * `cancelled` children received `cancel()`, `abandoned` ones could not be
   * cancelled and were forgotten, `discarded` ones never started.
   */
  'cycle:cancelled': GroupEventSource & {
    cycle: number;
    cancelled: number;
    abandoned: number;
    discarded: number;
  };
}

/** Callback function type for event listeners. */
export type GroupEventCallback<K extends keyof GroupEventMap> = (payload: GroupEventMap[K]) => void;

/** Narrows a subscription to the events of one group on a shared bus. */
export interface GroupEventFilter {
  /** Only deliver events whose `groupId` matches. */
  groupId?: string;
}

/** Type-safe event bus for group lifecycle events. */
export interface GroupEventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof GroupEventMap>(
    event: K,
    callback: GroupEventCallback<K>,
    filter?: GroupEventFilter,
  ): () => void;
  /** Subscribe for the first matching emission only. */
  once<K extends keyof GroupEventMap>(
    event: K,
    callback: GroupEventCallback<K>,
    filter?: GroupEventFilter,
  ): () => void;
  /** Remove every subscription of `callback` to an event, filtered or not. */
  off<K extends keyof GroupEventMap>(event: K, callback: GroupEventCallback<K>): void;
  /** Emit an event with its payload. */
  emit<K extends keyof GroupEventMap>(event: K, payload: GroupEventMap[K]): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
