/**
 * @module commands
 * Re-exports the leaf command implementations.
 */

export { PrintCommand } from './print';
export type { LineWriter } from './print';
export { DelayCommand } from './delay';
export { BlockCommand } from './block';
export type { Block } from './block';
export { AsyncBlockCommand } from './async-block';
export type { AsyncBlock } from './async-block';
export { PromiseCommand } from './promise';
export type { PromiseCommandOptions, PromiseFactory } from './promise';
