import { describe, it, expect, vi } from 'vitest';
import { createSharedContext } from '../shared-context';
import { AsyncBlockCommand } from './async-block';

describe('AsyncBlockCommand', () => {
  it('completes when done is called', () => {
    let finish: () => void = () => {};
    const cmd = new AsyncBlockCommand((done) => {
      finish = done;
    });
    const onComplete = vi.fn();
    cmd.onComplete = onComplete;

    cmd.execute();
    expect(cmd.isRunning).toBe(true);
    expect(onComplete).not.toHaveBeenCalled();

    finish();
    expect(onComplete).toHaveBeenCalledOnce();
    expect(cmd.isRunning).toBe(false);
  });

  it('ignores repeated calls to done', () => {
    let finish: () => void = () => {};
    const cmd = new AsyncBlockCommand((done) => {
      finish = done;
    });
    const onComplete = vi.fn();
    cmd.onComplete = onComplete;

    cmd.execute();
    finish();
    finish();

    expect(onComplete).toHaveBeenCalledOnce();
  });

  it('supports calling done synchronously', () => {
    const teardown = vi.fn();
    const cmd = new AsyncBlockCommand((done) => {
      done();
      return teardown;
    });
    const onComplete = vi.fn();
    cmd.onComplete = onComplete;

    cmd.execute();
    cmd.cancel();

    expect(onComplete).toHaveBeenCalledOnce();
    expect(teardown).not.toHaveBeenCalled();
  });

  it('runs the teardown and suppresses completion on cancel', () => {
    let finish: () => void = () => {};
    const teardown = vi.fn();
    const cmd = new AsyncBlockCommand((done) => {
      finish = done;
      return teardown;
    });
    const onComplete = vi.fn();
    cmd.onComplete = onComplete;

    cmd.execute();
    cmd.cancel();
    finish();

    expect(teardown).toHaveBeenCalledOnce();
    expect(onComplete).not.toHaveBeenCalled();
  });

  it('drops done from an earlier run', () => {
    const finishers: (() => void)[] = [];
    const cmd = new AsyncBlockCommand((done) => {
      finishers.push(done);
    });
    const onComplete = vi.fn();
    cmd.onComplete = onComplete;

    cmd.execute();
    cmd.cancel();
    cmd.execute();
    finishers[0]();
    expect(onComplete).not.toHaveBeenCalled();

    finishers[1]();
    expect(onComplete).toHaveBeenCalledOnce();
  });

  it('ignores execute() while running', () => {
    const block = vi.fn();
    const cmd = new AsyncBlockCommand(block);

    cmd.execute();
    cmd.execute();

    expect(block).toHaveBeenCalledOnce();
  });

  it('hands the injected context to the block', () => {
    const context = createSharedContext();
    const cmd = new AsyncBlockCommand((done, ctx) => {
      ctx?.set('seen', true);
      done();
    });
    cmd.context = context;

    cmd.execute();

    expect(context.get('seen')).toBe(true);
  });

  it('can run again after the block throws', () => {
    const block = vi
      .fn<(done: () => void) => void>()
      .mockImplementationOnce(() => {
        throw new Error('setup failed');
      })
      .mockImplementation((done) => done());
    const cmd = new AsyncBlockCommand(block);
    const onComplete = vi.fn();
    cmd.onComplete = onComplete;

    expect(() => cmd.execute()).toThrow('setup failed');
    expect(cmd.isRunning).toBe(false);

    cmd.execute();
    expect(block).toHaveBeenCalledTimes(2);
    expect(onComplete).toHaveBeenCalledOnce();
  });

  it('runs a teardown returned after a synchronous cancel', () => {
    const teardown = vi.fn();
    const cmd: AsyncBlockCommand = new AsyncBlockCommand(() => {
      cmd.cancel();
      return teardown;
    });
    const onComplete = vi.fn();
    cmd.onComplete = onComplete;

    cmd.execute();

    expect(teardown).toHaveBeenCalledOnce();
    expect(onComplete).not.toHaveBeenCalled();
    expect(cmd.isRunning).toBe(false);
  });
});
