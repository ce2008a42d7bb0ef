/**
 * @module test-helpers
 * Hand-driven commands and a capturing logger for unit tests.
 */

import pino from 'pino';
import type {
  AsyncCommand,
  CancellableCommand,
  Command,
  CompletionCallback,
  ContextAware,
  SharedContext,
} from '@cmdtree/types';
import type { Logger } from './logger';

/** Async command completed by calling {@link ManualCommand.complete}. */
export class ManualCommand implements AsyncCommand, ContextAware {
  readonly description: string;
  onComplete: CompletionCallback | null = null;
  context: SharedContext | null = null;
  executions = 0;

  constructor(description = 'manual', private readonly log?: string[]) {
    this.description = description;
  }

  execute(): void {
    this.executions++;
    this.log?.push(`start:${this.description}`);
  }

  complete(): void {
    this.log?.push(`end:${this.description}`);
    this.onComplete?.();
  }
}

/** {@link ManualCommand} that also counts cancel requests. */
export class CancellableManualCommand extends ManualCommand implements CancellableCommand {
  cancellations = 0;

  cancel(): void {
    this.cancellations++;
  }
}

/** Synchronous command that records its execution. */
export function syncCommand(description: string, log: string[]): Command {
  return {
    description,
    execute: () => {
      log.push(`run:${description}`);
    },
  };
}

/** Async command that completes inside its own `execute()`. */
export function inlineCommand(description: string, log: string[]): AsyncCommand {
  const command: AsyncCommand = {
    description,
    onComplete: null,
    execute: () => {
      log.push(`run:${description}`);
      command.onComplete?.();
    },
  };
  return command;
}

/** Parsed pino line. */
export type LogRecord = Record<string, unknown>;

/** Logger at `debug` whose lines are parsed into `records`. */
export function captureLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write: (line: string) => {
        records.push(JSON.parse(line));
      },
    },
  );
  return { logger, records };
}

/** Messages of the captured records at a given pino level. */
export function messagesAt(records: LogRecord[], level: number): unknown[] {
  return records.filter((record) => record.level === level).map((record) => record.msg);
}
