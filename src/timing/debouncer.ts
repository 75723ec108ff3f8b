import { assertDuration } from '../dev/invariant';
import { TimerSlot } from './timer';
import type { Action, CoalescingScheduler } from './types';

/**
 * Debouncer — delay an action, restarting the delay on every request
 *
 * Only the most recently submitted action runs, once, after `delayMs` of
 * quiet. Earlier actions are dropped without notice.
 *
 * Useful for: search input, autosave, committing a value into state after
 * the user stops typing
 *
 * @example
 * ```ts
 * const debouncer = new Debouncer(300);
 * input.addEventListener('input', () => {
 *   const value = input.value;
 *   debouncer.run(() => query.set(value));
 * });
 * // on teardown
 * debouncer.dispose();
 * ```
 */
export class Debouncer implements CoalescingScheduler {
  readonly delayMs: number;

  private readonly timer = new TimerSlot();
  private pending: Action | null = null;

  constructor(delayMs: number) {
    assertDuration(delayMs, 'delayMs');
    this.delayMs = delayMs;
  }

  run(action: Action): void {
    this.pending = action;
    this.timer.arm(this.delayMs, () => this.fire());
  }

  /**
   * Run the pending action now instead of waiting for the delay.
   * No-op when nothing is pending.
   */
  flush(): void {
    if (!this.timer.armed) return;
    this.fire();
  }

  cancel(): void {
    this.timer.clear();
    this.pending = null;
  }

  /**
   * Same as cancel(). Nothing prevents a later run(); callers that dispose
   * are expected to stop using the instance.
   */
  dispose(): void {
    this.cancel();
  }

  get isActive(): boolean {
    return this.timer.armed;
  }

  get remainingTime(): number {
    return this.timer.remaining;
  }

  private fire(): void {
    const action = this.pending;
    // Reset first: the action may throw, or call run() on this instance
    this.cancel();
    action?.();
  }
}
