/**
 * @module context
 * Shared context passed by reference through a command tree.
 */

/**
 * Mutable key/value store shared by every context-aware command in one tree.
 * Commands mutate its contents; they never replace the instance.
 */
export type SharedContext = Map<string, unknown>;
