/**
 * One-shot timer slot
 *
 * Holds at most one outstanding setTimeout. Arming replaces whatever was
 * armed before; the handle is dropped before the callback runs so the
 * callback may re-arm the same slot.
 */

// Platform-specific timer handle type
type TimeoutHandle = ReturnType<typeof setTimeout>;

// setTimeout runs anything longer than this after 1ms; longer waits are chained
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export class TimerSlot {
  private handle: TimeoutHandle | null = null;
  private dueAt = 0;

  arm(ms: number, onFire: () => void): void {
    this.clear();
    this.dueAt = Date.now() + ms;
    this.schedule(ms, onFire);
  }

  clear(): void {
    if (this.handle !== null) {
      clearTimeout(this.handle);
      this.handle = null;
    }
  }

  get armed(): boolean {
    return this.handle !== null;
  }

  /** Milliseconds until the armed callback fires, 0 when idle */
  get remaining(): number {
    if (this.handle === null) return 0;
    return Math.max(0, this.dueAt - Date.now());
  }

  private schedule(ms: number, onFire: () => void): void {
    const wait = Math.min(ms, MAX_TIMEOUT_MS);
    this.handle = setTimeout(() => {
      if (ms > wait) {
        this.schedule(ms - wait, onFire);
        return;
      }
      this.handle = null;
      onFire();
    }, wait);
  }
}
