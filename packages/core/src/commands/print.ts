/**
 * @module commands/print
 * Synchronous command that writes a line of text.
 */

import type { Command } from '@cmdtree/types';

/** Destination for printed lines. */
export type LineWriter = (line: string) => void;

const writeStdout: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

/** Writes its message once per execution. */
export class PrintCommand implements Command {
  readonly description: string;
  readonly message: string;
  private readonly write: LineWriter;

  /**
   * @param message - Text to write.
   * @param write   - Line sink. Defaults to standard output.
   */
  constructor(message: string, write: LineWriter = writeStdout) {
    this.message = message;
    this.write = write;
    this.description = `print "${message}"`;
  }

  execute(): void {
    this.write(this.message);
  }
}
