/**
 * @module shared-context
 * Helpers for building and reading a {@link SharedContext}.
 */

import type { SharedContext } from '@cmdtree/types';

type ContextEntries = Iterable<readonly [string, unknown]>;

function isEntryList(
  entries: Record<string, unknown> | ContextEntries,
): entries is ContextEntries {
  return Symbol.iterator in entries;
}

/**
 * Create a new shared context.
 * @param entries - Initial key/value pairs, as an object or entry list.
 */
export function createSharedContext(
  entries?: Record<string, unknown> | ContextEntries,
): SharedContext {
  if (entries === undefined) {
    return new Map();
  }
  if (isEntryList(entries)) {
    return new Map(entries);
  }
  return new Map(Object.entries(entries));
}

/**
 * Read a value and narrow it with a type guard.
 * Returns `undefined` when the key is missing or the guard rejects the value.
 */
export function readContext<T>(
  context: SharedContext | null,
  key: string,
  guard: (value: unknown) => value is T,
): T | undefined {
  const value = context?.get(key);
  return guard(value) ? value : undefined;
}
