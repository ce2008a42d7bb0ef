import { describe, expect, it, vi } from 'vitest';
import { GroupEventBusImpl } from './event-bus';

const source = { groupId: 'group-1', group: 'jobs' };

describe('GroupEventBusImpl', () => {
  // ── on / emit ────────────────────────────────────────────────────────

  it('calls listener when event is emitted with payload', () => {
    const bus = new GroupEventBusImpl();
    const cb = vi.fn();

    bus.on('cycle:completed', cb);
    bus.emit('cycle:completed', { ...source, cycle: 1 });

    expect(cb).toHaveBeenCalledOnce();
    expect(cb).toHaveBeenCalledWith({ groupId: 'group-1', group: 'jobs', cycle: 1 });
  });

  it('supports multiple listeners on the same event', () => {
    const bus = new GroupEventBusImpl();
    const cb1 = vi.fn();
    const cb2 = vi.fn();

    bus.on('cycle:started', cb1);
    bus.on('cycle:started', cb2);
    bus.emit('cycle:started', { ...source, cycle: 1, size: 3 });

    expect(cb1).toHaveBeenCalledOnce();
    expect(cb2).toHaveBeenCalledOnce();
  });

  it('does not fire listeners of other events', () => {
    const bus = new GroupEventBusImpl();
    const cb = vi.fn();

    bus.on('cycle:cancelled', cb);
    bus.emit('cycle:completed', { ...source, cycle: 1 });

    expect(cb).not.toHaveBeenCalled();
  });

  // ── off ──────────────────────────────────────────────────────────────

  it('removes a listener via off()', () => {
    const bus = new GroupEventBusImpl();
    const cb = vi.fn();

    bus.on('cycle:completed', cb);
    bus.off('cycle:completed', cb);
    bus.emit('cycle:completed', { ...source, cycle: 1 });

    expect(cb).not.toHaveBeenCalled();
    expect(bus.listenerCount('cycle:completed')).toBe(0);
  });

  it('does not throw when removing a listener that was never added', () => {
    const bus = new GroupEventBusImpl();
    expect(() => bus.off('cycle:completed', vi.fn())).not.toThrow();
  });

  it('returns an unsubscribe function from on()', () => {
    const bus = new GroupEventBusImpl();
    const cb = vi.fn();

    const unsub = bus.on('cycle:completed', cb);
    unsub();
    bus.emit('cycle:completed', { ...source, cycle: 1 });

    expect(cb).not.toHaveBeenCalled();
  });

  // ── once ─────────────────────────────────────────────────────────────

  it('fires a once() listener only once', () => {
    const bus = new GroupEventBusImpl();
    const cb = vi.fn();

    bus.once('cycle:completed', cb);
    bus.emit('cycle:completed', { ...source, cycle: 1 });
    bus.emit('cycle:completed', { ...source, cycle: 2 });

    expect(cb).toHaveBeenCalledOnce();
    expect(cb).toHaveBeenCalledWith({ ...source, cycle: 1 });
    expect(bus.listenerCount('cycle:completed')).toBe(0);
  });

  it('can remove a once() listener before it fires', () => {
    const bus = new GroupEventBusImpl();
    const cb = vi.fn();

    const unsub = bus.once('cycle:completed', cb);
    unsub();
    bus.emit('cycle:completed', { ...source, cycle: 1 });

    expect(cb).not.toHaveBeenCalled();
  });

  // ── clear ────────────────────────────────────────────────────────────

  it('removes all listeners via clear()', () => {
    const bus = new GroupEventBusImpl();
    const cb1 = vi.fn();
    const cb2 = vi.fn();

    bus.on('cycle:completed', cb1);
    bus.once('cycle:started', cb2);
    bus.clear();

    bus.emit('cycle:completed', { ...source, cycle: 1 });
    bus.emit('cycle:started', { ...source, cycle: 1, size: 0 });

    expect(cb1).not.toHaveBeenCalled();
    expect(cb2).not.toHaveBeenCalled();
  });

  // ── emission during emission ────────────────────────────────────────

  it('does not break when a listener removes itself during emission', () => {
    const bus = new GroupEventBusImpl();
    const cb1 = vi.fn(() => bus.off('cycle:completed', cb1));
    const cb2 = vi.fn();

    bus.on('cycle:completed', cb1);
    bus.on('cycle:completed', cb2);
    bus.emit('cycle:completed', { ...source, cycle: 1 });

    expect(cb1).toHaveBeenCalledOnce();
    expect(cb2).toHaveBeenCalledOnce();
  });

  it('does not call a listener added during emission', () => {
    const bus = new GroupEventBusImpl();
    const late = vi.fn();
    const cb = vi.fn(() => {
      bus.on('cycle:completed', late);
    });

    bus.on('cycle:completed', cb);
    bus.emit('cycle:completed', { ...source, cycle: 1 });

    expect(cb).toHaveBeenCalledOnce();
    expect(late).not.toHaveBeenCalled();
  });

  // ── group scoping ───────────────────────────────────────────────────

  it('delivers only the events of the subscribed group', () => {
    const bus = new GroupEventBusImpl();
    const scoped = vi.fn();
    const all = vi.fn();

    bus.on('cycle:completed', scoped, { groupId: 'group-2' });
    bus.on('cycle:completed', all);
    bus.emit('cycle:completed', { ...source, cycle: 1 });
    bus.emit('cycle:completed', { groupId: 'group-2', group: 'uploads', cycle: 4 });

    expect(scoped).toHaveBeenCalledOnce();
    expect(scoped).toHaveBeenCalledWith({ groupId: 'group-2', group: 'uploads', cycle: 4 });
    expect(all).toHaveBeenCalledTimes(2);
  });

  it('keeps a scoped once() listener until its group emits', () => {
    const bus = new GroupEventBusImpl();
    const cb = vi.fn();

    bus.once('cycle:started', cb, { groupId: 'group-2' });
    bus.emit('cycle:started', { ...source, cycle: 1, size: 1 });
    expect(cb).not.toHaveBeenCalled();
    expect(bus.listenerCount('cycle:started', 'group-2')).toBe(1);

    bus.emit('cycle:started', { groupId: 'group-2', group: 'uploads', cycle: 1, size: 2 });
    bus.emit('cycle:started', { groupId: 'group-2', group: 'uploads', cycle: 2, size: 2 });
    expect(cb).toHaveBeenCalledOnce();
    expect(bus.listenerCount('cycle:started')).toBe(0);
  });

  it('unsubscribes one subscription while off() removes them all', () => {
    const bus = new GroupEventBusImpl();
    const cb = vi.fn();

    const unsub = bus.on('cycle:completed', cb, { groupId: 'group-1' });
    bus.on('cycle:completed', cb, { groupId: 'group-2' });
    unsub();
    expect(bus.listenerCount('cycle:completed')).toBe(1);
    expect(bus.listenerCount('cycle:completed', 'group-2')).toBe(1);

    bus.off('cycle:completed', cb);
    expect(bus.listenerCount('cycle:completed')).toBe(0);
  });

  it('does not refire a once() listener from a nested emit', () => {
    const bus = new GroupEventBusImpl();
    const cb = vi.fn(() => {
      bus.emit('cycle:completed', { ...source, cycle: 2 });
    });

    bus.once('cycle:completed', cb);
    bus.emit('cycle:completed', { ...source, cycle: 1 });

    expect(cb).toHaveBeenCalledOnce();
  });
});
