import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TimerScheduler } from '../TimerScheduler.js';

describe('TimerScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs the callback after the delay', () => {
    const scheduler = new TimerScheduler();
    const callback = vi.fn();

    scheduler.schedule('action', 1000, callback);
    expect(callback).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1000);
    expect(callback).toHaveBeenCalledOnce();
  });

  it('cancel prevents the callback', () => {
    const scheduler = new TimerScheduler();
    const callback = vi.fn();

    scheduler.schedule('action', 1000, callback);
    scheduler.cancel('action');

    vi.advanceTimersByTime(2000);
    expect(callback).not.toHaveBeenCalled();
  });

  it('rescheduling a key replaces the previous timer', () => {
    const scheduler = new TimerScheduler();
    const callback1 = vi.fn();
    const callback2 = vi.fn();

    scheduler.schedule('action', 1000, callback1);
    scheduler.schedule('action', 500, callback2);

    vi.advanceTimersByTime(500);
    expect(callback1).not.toHaveBeenCalled();
    expect(callback2).toHaveBeenCalledOnce();

    vi.advanceTimersByTime(1000);
    expect(callback1).not.toHaveBeenCalled();
  });

  it('cancelAll cancels every timer', () => {
    const scheduler = new TimerScheduler();
    const cb1 = vi.fn();
    const cb2 = vi.fn();

    scheduler.schedule('action', 1000, cb1);
    scheduler.schedule('nextHand', 2000, cb2);
    scheduler.cancelAll();

    vi.advanceTimersByTime(3000);
    expect(cb1).not.toHaveBeenCalled();
    expect(cb2).not.toHaveBeenCalled();
  });

  it('ignores a callback whose timer was cancelled even if the host timer still fires', () => {
    const pending: (() => void)[] = [];
    const scheduler = new TimerScheduler({
      setTimeoutFn: (cb) => {
        pending.push(cb);
        return setTimeout(() => undefined, 0);
      },
      // host timer is never cleared
      clearTimeoutFn: () => undefined,
    });
    const callback = vi.fn();

    scheduler.schedule('action', 1000, callback);
    scheduler.cancel('action');
    pending.forEach(cb => cb());

    expect(callback).not.toHaveBeenCalled();
  });

  it('timers under different keys run independently', () => {
    const scheduler = new TimerScheduler();
    const cb1 = vi.fn();
    const cb2 = vi.fn();

    scheduler.schedule('action', 1000, cb1);
    scheduler.schedule('nextHand', 2000, cb2);

    vi.advanceTimersByTime(1000);
    expect(cb1).toHaveBeenCalledOnce();
    expect(cb2).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1000);
    expect(cb2).toHaveBeenCalledOnce();
  });

  it('reports activity and the deadline', () => {
    const scheduler = new TimerScheduler({ now: () => 10_000 });

    expect(scheduler.isActive('action')).toBe(false);
    expect(scheduler.getDeadline('action')).toBeNull();

    scheduler.schedule('action', 1000, () => {});
    expect(scheduler.isActive('action')).toBe(true);
    expect(scheduler.getDeadline('action')).toBe(11_000);

    vi.advanceTimersByTime(1000);
    expect(scheduler.isActive('action')).toBe(false);
    expect(scheduler.getDeadline('action')).toBeNull();
  });
});
