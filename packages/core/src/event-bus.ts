/**
 * @module event-bus
 * Type-safe pub/sub emitter for group lifecycle events.
 *
 * One bus is typically shared by a whole command tree, so every payload
 * carries the emitting group's id and subscriptions may be scoped to it.
 *
 * @see {@link @cmdtree/types#GroupEventBus} for the interface contract
 * @see {@link @cmdtree/types#GroupEventMap} for the event catalogue
 */

import type {
  GroupEventBus,
  GroupEventCallback,
  GroupEventFilter,
  GroupEventMap,
} from '@cmdtree/types';

/** Generic callback type used internally by the event bus. */
type Callback = (payload: unknown) => void;

type EventName = keyof GroupEventMap;

interface Subscription {
  readonly callback: Callback;
  /** Undefined means every group. */
  readonly groupId: string | undefined;
  readonly once: boolean;
}

/**
 * Concrete implementation of {@link GroupEventBus}.
 *
 * Subscription lists are replaced rather than mutated, so an emission walks
 * the list as it was when the emission began.
 */
export class GroupEventBusImpl implements GroupEventBus {
  private subscriptions = new Map<EventName, readonly Subscription[]>();

  /** @inheritdoc */
  on<K extends EventName>(
    event: K,
    callback: GroupEventCallback<K>,
    filter: GroupEventFilter = {},
  ): () => void {
    return this.subscribe(event, callback as Callback, filter, false);
  }

  /** @inheritdoc */
  once<K extends EventName>(
    event: K,
    callback: GroupEventCallback<K>,
    filter: GroupEventFilter = {},
  ): () => void {
    return this.subscribe(event, callback as Callback, filter, true);
  }

  /** @inheritdoc */
  off<K extends EventName>(event: K, callback: GroupEventCallback<K>): void {
    const list = this.subscriptions.get(event);
    if (!list) return;
    this.replace(
      event,
      list.filter((subscription) => subscription.callback !== callback),
    );
  }

  /** @inheritdoc */
  emit<K extends EventName>(event: K, payload: GroupEventMap[K]): void {
    const list = this.subscriptions.get(event);
    if (!list) return;

    for (const subscription of list) {
      if (subscription.groupId !== undefined && subscription.groupId !== payload.groupId) {
        continue;
      }
      // Removed before the call so a nested emit cannot fire it again.
      if (subscription.once) {
        this.remove(event, subscription);
      }
      subscription.callback(payload);
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.subscriptions.clear();
  }

  /**
   * Number of subscriptions registered for `event`.
   * @param groupId - Count only subscriptions scoped to this group.
   */
  listenerCount(event: EventName, groupId?: string): number {
    const list = this.subscriptions.get(event) ?? [];
    if (groupId === undefined) {
      return list.length;
    }
    return list.filter((subscription) => subscription.groupId === groupId).length;
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private subscribe(
    event: EventName,
    callback: Callback,
    filter: GroupEventFilter,
    once: boolean,
  ): () => void {
    const subscription: Subscription = { callback, groupId: filter.groupId, once };
    this.replace(event, [...(this.subscriptions.get(event) ?? []), subscription]);
    return () => this.remove(event, subscription);
  }

  private remove(event: EventName, subscription: Subscription): void {
    const list = this.subscriptions.get(event);
    if (!list) return;
    this.replace(
      event,
      list.filter((candidate) => candidate !== subscription),
    );
  }

  /** Install a new list, dropping the entry once it is empty. */
  private replace(event: EventName, list: readonly Subscription[]): void {
    if (list.length === 0) {
      this.subscriptions.delete(event);
    } else {
      this.subscriptions.set(event, list);
    }
  }
}
