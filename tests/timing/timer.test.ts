import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MAX_TIMEOUT_MS, TimerSlot } from '../../src/timing/timer';

beforeEach(() => {
  vi.useFakeTimers();
});

describe('TimerSlot', () => {
  it('should fire once after the armed delay', () => {
    const slot = new TimerSlot();
    const spy = vi.fn();

    slot.arm(50, spy);
    expect(slot.armed).toBe(true);

    vi.advanceTimersByTime(49);
    expect(spy).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(slot.armed).toBe(false);
  });

  it('should replace the previous callback when re-armed', () => {
    const slot = new TimerSlot();
    const first = vi.fn();
    const second = vi.fn();

    slot.arm(50, first);
    slot.arm(50, second);
    vi.advanceTimersByTime(100);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('should report remaining time and drop to 0 when cleared', () => {
    const slot = new TimerSlot();
    expect(slot.remaining).toBe(0);

    slot.arm(100, () => {});
    vi.advanceTimersByTime(40);
    expect(slot.remaining).toBe(60);

    slot.clear();
    expect(slot.remaining).toBe(0);
    expect(slot.armed).toBe(false);
  });

  it('should be disarmed while its own callback runs', () => {
    const slot = new TimerSlot();
    let armedDuringFire: boolean | null = null;

    slot.arm(10, () => {
      armedDuringFire = slot.armed;
      slot.arm(10, () => {});
    });
    vi.advanceTimersByTime(10);

    expect(armedDuringFire).toBe(false);
    expect(slot.armed).toBe(true);
  });

  it('should chain timers for delays past the setTimeout limit', () => {
    const slot = new TimerSlot();
    const spy = vi.fn();

    slot.arm(MAX_TIMEOUT_MS + 5, spy);
    vi.advanceTimersByTime(10);
    expect(spy).not.toHaveBeenCalled();

    vi.advanceTimersByTime(MAX_TIMEOUT_MS - 10);
    expect(spy).not.toHaveBeenCalled();
    expect(slot.armed).toBe(true);
    expect(slot.remaining).toBe(5);

    vi.advanceTimersByTime(5);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(slot.armed).toBe(false);
  });

  it('should stop a chained wait when cleared', () => {
    const slot = new TimerSlot();
    const spy = vi.fn();

    slot.arm(MAX_TIMEOUT_MS + 5, spy);
    vi.advanceTimersByTime(MAX_TIMEOUT_MS);
    slot.clear();
    vi.advanceTimersByTime(10);

    expect(spy).not.toHaveBeenCalled();
  });
});
