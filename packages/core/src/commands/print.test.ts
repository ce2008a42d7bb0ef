import { describe, it, expect } from 'vitest';
import { PrintCommand } from './print';

describe('PrintCommand', () => {
  it('writes its message on every execution', () => {
    const lines: string[] = [];
    const cmd = new PrintCommand('hello', (line) => lines.push(line));

    cmd.execute();
    cmd.execute();

    expect(lines).toEqual(['hello', 'hello']);
  });

  it('describes itself by its message', () => {
    expect(new PrintCommand('x', () => {}).description).toBe('print "x"');
  });
});
