/**
 * @module commands/block
 * Synchronous command wrapping a function.
 */

import type { Command, ContextAware, SharedContext } from '@cmdtree/types';

/** Body of a {@link BlockCommand}. */
export type Block = (context: SharedContext | null) => void;

/**
 * Runs a function synchronously, handing it the injected shared context.
 * Useful for reading and writing context between other commands.
 */
export class BlockCommand implements Command, ContextAware {
  readonly description: string;
  context: SharedContext | null = null;
  private readonly block: Block;

  constructor(block: Block, description = 'block') {
    this.block = block;
    this.description = description;
  }

  execute(): void {
    this.block(this.context);
  }
}
