/**
 * @module commands/promise
 * Asynchronous command backed by a promise-returning function.
 */

import type {
  CancellableCommand,
  CompletionCallback,
  ContextAware,
  SharedContext,
} from '@cmdtree/types';
import { createLogger } from '../logger';
import type { Logger } from '../logger';

/** Starts the work. `signal` aborts when the command is cancelled. */
export type PromiseFactory = (
  signal: AbortSignal,
  context: SharedContext | null,
) => Promise<unknown>;

/** Options for {@link PromiseCommand}. */
export interface PromiseCommandOptions {
  description?: string;
  /** Receives a rejection. Defaults to logging it. */
  onError?: (error: unknown) => void;
  logger?: Logger;
}

const defaultLogger = createLogger('promise-command');

/**
 * Bridges promise-based work into a command tree.
 *
 * A rejection is reported through `onError` and the command still completes,
 * so the owning group can proceed. Cancelling aborts the signal and
 * suppresses both the error report and the completion.
 *
 * Completion is signalled from a promise reaction, so nothing can catch what
 * the completion callback throws (the next sequential sibling failing, for
 * instance). Such errors are logged instead of becoming unhandled rejections.
 */
export class PromiseCommand implements CancellableCommand, ContextAware {
  readonly description: string;
  onComplete: CompletionCallback | null = null;
  context: SharedContext | null = null;

  private readonly factory: PromiseFactory;
  private readonly onError: ((error: unknown) => void) | undefined;
  private readonly logger: Logger;
  private controller: AbortController | null = null;

  constructor(factory: PromiseFactory, options: PromiseCommandOptions = {}) {
    this.factory = factory;
    this.description = options.description ?? 'promise';
    this.onError = options.onError;
    this.logger = (options.logger ?? defaultLogger).child({ command: this.description });
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  execute(): void {
    if (this.controller !== null) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;

    let work: Promise<unknown>;
    try {
      work = this.factory(controller.signal, this.context);
    } catch (error) {
      work = Promise.reject(error);
    }
    work
      .then(
        () => this.settle(controller),
        (error: unknown) => {
          try {
            if (this.controller === controller) {
              this.report(error);
            }
          } finally {
            this.settle(controller);
          }
        },
      )
      .catch((error: unknown) => {
        this.logger.error({ err: error }, 'completion handling threw');
      });
  }

  cancel(): void {
    const controller = this.controller;
    if (controller === null) {
      return;
    }
    this.controller = null;
    controller.abort();
  }

  private settle(controller: AbortController): void {
    if (this.controller !== controller) {
      return;
    }
    this.controller = null;
    this.onComplete?.();
  }

  private report(error: unknown): void {
    if (this.onError) {
      this.onError(error);
    } else {
      this.logger.error({ err: error }, 'promise command rejected');
    }
  }
}
