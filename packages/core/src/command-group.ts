/**
 * @module command-group
 * Concurrent command group: starts every child in list order and completes
 * once the last one has finished.
 *
 * Children never receive a closure over group internals. Each one gets a
 * callback bound to a {@link CycleToken}, and every token is routed through
 * a single completion method that discards stale or repeated signals.
 */

import type {
  CancellableCommand,
  Command,
  CompletionCallback,
  ContextAware,
  GroupEventBus,
  GroupEventSource,
  SharedContext,
} from '@cmdtree/types';
import { describeCommand, isAsyncCommand, isCancellableCommand, isContextAware } from './capabilities';
import { DEFAULT_GROUP_OPTIONS } from './config';
import { CallbackOverwriteError } from './errors';
import { GroupEventBusImpl } from './event-bus';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { generateId } from './uuid';

/** Construction options shared by every group type. */
export interface CommandGroupOptions {
  /** Initial children, in execution order. Never triggers auto-start. */
  commands?: Iterable<Command>;
  /** Start a cycle whenever a command is appended to an idle group. */
  autoStart?: boolean;
  /** Context injected into every context-aware descendant. */
  context?: SharedContext | null;
  /** Label used in logs and lifecycle events. */
  description?: string;
  /** Bus to emit lifecycle events on; pass one instance to observe a whole tree. */
  events?: GroupEventBus;
  /** Parent logger; a child tagged with the group description is derived from it. */
  logger?: Logger;
}

/** Identifies one child slot in one cycle. */
export interface CycleToken {
  readonly cycle: number;
  readonly index: number;
}

/** Counts reported when a running cycle is cancelled. */
export interface CancelSummary {
  /** Children that received `cancel()`. */
  cancelled: number;
  /** Running children that cannot be cancelled and were forgotten. */
  abandoned: number;
  /** Children removed before they were started. */
  discarded: number;
}

interface ChildSlot {
  readonly command: Command;
  started: boolean;
  done: boolean;
}

const defaultLogger = createLogger('command-group');

/**
 * Runs all of its children concurrently.
 *
 * A group is itself an asynchronous, cancellable, context-aware command, so
 * groups nest to any depth.
 */
export class CommandGroup implements CancellableCommand, ContextAware {
  /** Unique per instance; identifies this group's events on a shared bus. */
  readonly id: string = generateId();
  readonly description: string;
  readonly events: GroupEventBus;
  /** Takes effect on the next append; a running cycle is unaffected. */
  autoStart: boolean;
  context: SharedContext | null;

  protected readonly logger: Logger;
  protected children: Command[] = [];
  /** Generation counter, incremented at the start of every cycle. */
  protected cycle = 0;
  protected running = false;

  private callback: CompletionCallback | null = null;
  private slots: ChildSlot[] = [];
  private remaining = 0;
  private issuing = false;

  constructor(options: CommandGroupOptions = {}) {
    this.description = options.description ?? this.defaultDescription();
    this.autoStart = options.autoStart ?? DEFAULT_GROUP_OPTIONS.autoStart;
    this.context = options.context ?? null;
    this.events = options.events ?? new GroupEventBusImpl();
    this.logger = (options.logger ?? defaultLogger).child({ group: this.description });
    if (options.commands) {
      this.children.push(...options.commands);
    }
  }

  /** Callback fired once at the end of every completed cycle. */
  get onComplete(): CompletionCallback | null {
    return this.callback;
  }

  /**
   * @throws CallbackOverwriteError if a different callback is set while a
   *   cycle is pending.
   */
  set onComplete(callback: CompletionCallback | null) {
    if (this.running && this.callback !== null && callback !== this.callback) {
      throw new CallbackOverwriteError(this.description);
    }
    this.callback = callback;
  }

  /** Number of children currently held. */
  get size(): number {
    return this.children.length;
  }

  /** Whether a cycle is in progress. */
  get isRunning(): boolean {
    return this.running;
  }

  /** Snapshot of the children, in list order. */
  get commands(): readonly Command[] {
    return [...this.children];
  }

  /** Children of the current cycle that have not completed yet. */
  get outstanding(): number {
    return this.running ? this.remaining : 0;
  }

  /** Add a command; starts a cycle if auto-start is on and the group is idle. */
  append(command: Command): this {
    this.push(command);
    this.maybeAutoStart();
    return this;
  }

  /** Add several commands, then apply auto-start once. */
  appendAll(commands: Iterable<Command>): this {
    let added = 0;
    for (const command of commands) {
      this.push(command);
      added++;
    }
    if (added > 0) {
      this.maybeAutoStart();
    }
    return this;
  }

  /**
   * Start a cycle. An empty group completes before this returns.
   * Calling it while a cycle is running is ignored.
   */
  execute(): void {
    if (this.running) {
      this.logger.warn({ cycle: this.cycle }, 'execute() called while running; ignored');
      return;
    }

    const cycle = ++this.cycle;
    this.running = true;
    this.events.emit('cycle:started', {
      ...this.source(),
      cycle,
      size: this.children.length,
    });

    if (this.children.length === 0) {
      this.finishCycle(cycle);
      return;
    }
    this.run(cycle);
  }

  /**
   * Cancel the running cycle. Cancellable children receive `cancel()`,
   * others are forgotten and left to finish on their own. The group's
   * callback is not invoked. No-op when idle.
   */
  cancel(): void {
    if (!this.running) {
      return;
    }
    const cycle = this.cycle;
    // Cleared first so that callbacks fired from inside cancel() are stale.
    this.running = false;
    const summary = this.cancelRunning();
    this.logger.debug({ cycle, ...summary }, 'cycle cancelled');
    this.events.emit('cycle:cancelled', { ...this.source(), cycle, ...summary });
  }

  // ── scheduling hooks ─────────────────────────────────────────────────

  /** Issue the start calls of a non-empty cycle. */
  protected run(cycle: number): void {
    this.slots = this.children.map((command) => ({ command, started: false, done: false }));
    this.remaining = this.slots.length;

    // Completion must not fire until every child has been started.
    this.issuing = true;
    try {
      for (let index = 0; index < this.slots.length; index++) {
        if (!this.isCurrent(cycle)) {
          return;
        }
        this.slots[index].started = true;
        this.launch(this.slots[index].command, { cycle, index });
      }
    } finally {
      this.issuing = false;
    }

    if (this.isCurrent(cycle) && this.remaining === 0) {
      this.finishCycle(cycle);
    }
  }

  /** Record one child's completion. The token is known to belong to the running cycle. */
  protected completeChild(token: CycleToken): void {
    const slot = this.slots[token.index];
    if (slot === undefined || slot.done) {
      this.logger.warn({ ...token }, 'child completed more than once; ignored');
      return;
    }
    slot.done = true;
    this.remaining--;
    this.emitChild('command:completed', token, slot.command);

    if (this.remaining === 0 && !this.issuing) {
      this.finishCycle(token.cycle);
    }
  }

  /** Tear down the cycle's bookkeeping after `running` has been cleared. */
  protected cancelRunning(): CancelSummary {
    const slots = this.slots;
    this.slots = [];
    this.remaining = 0;

    let cancelled = 0;
    let abandoned = 0;
    for (const slot of slots) {
      if (!slot.started || slot.done) continue;
      if (isCancellableCommand(slot.command)) {
        slot.command.cancel();
        cancelled++;
      } else {
        this.logger.debug(
          { child: describeCommand(slot.command) },
          'child cannot be cancelled; forgetting it',
        );
        abandoned++;
      }
    }

    // Keep children that ran in this cycle; drop the rest, including late appends.
    const kept = this.children.filter((_, index) => index < slots.length && slots[index].started);
    const discarded = this.children.length - kept.length;
    this.children = kept;
    return { cancelled, abandoned, discarded };
  }

  /** Called right before an append starts a cycle on an idle group. */
  protected prepareAutoStart(): void {}

  /** Label used when no description is given. */
  protected defaultDescription(): string {
    return DEFAULT_GROUP_OPTIONS.description;
  }

  // ── shared machinery ─────────────────────────────────────────────────

  /** Whether `cycle` is the one currently running. */
  protected isCurrent(cycle: number): boolean {
    return this.running && this.cycle === cycle;
  }

  /**
   * Inject context and callback, then start the child. A synchronous child is
   * complete once `execute()` returns. A child that throws, or refuses the
   * injected callback, aborts the cycle and the error propagates.
   */
  protected launch(command: Command, token: CycleToken): void {
    const isAsync = isAsyncCommand(command);
    try {
      if (this.context !== null && isContextAware(command)) {
        command.context = this.context;
      }
      if (isAsync) {
        command.onComplete = () => this.handleCompletion(token);
      }
      this.emitChild('command:started', token, command);
      command.execute();
    } catch (error) {
      if (this.isCurrent(token.cycle)) {
        this.logger.error({ ...token, err: error }, 'child threw; aborting cycle');
        this.cancel();
      }
      throw error;
    }

    if (!isAsync) {
      this.handleCompletion(token);
    }
  }

  /** Mark the cycle finished and fire the callback. */
  protected finishCycle(cycle: number): void {
    this.running = false;
    this.slots = [];
    this.events.emit('cycle:completed', { ...this.source(), cycle });
    this.callback?.();
  }

  protected emitChild(
    event: 'command:started' | 'command:completed',
    token: CycleToken,
    command: Command,
  ): void {
    this.events.emit(event, {
      ...this.source(),
      cycle: token.cycle,
      index: token.index,
      description: describeCommand(command),
    });
  }

  private source(): GroupEventSource {
    return { groupId: this.id, group: this.description };
  }

  private handleCompletion(token: CycleToken): void {
    if (!this.isCurrent(token.cycle)) {
      this.logger.debug({ ...token }, 'stale completion; ignored');
      return;
    }
    this.completeChild(token);
  }

  private push(command: Command): void {
    this.children.push(command);
    this.events.emit('command:appended', {
      ...this.source(),
      index: this.children.length - 1,
      description: describeCommand(command),
    });
  }

  private maybeAutoStart(): void {
    if (this.autoStart && !this.running) {
      this.prepareAutoStart();
      this.execute();
    }
  }
}
