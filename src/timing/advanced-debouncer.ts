import { assertDuration, invariant } from '../dev/invariant';
import { warnIf } from '../dev/warnings';
import { TimerSlot } from './timer';
import type {
  Action,
  AdvancedDebouncerOptions,
  CoalescingScheduler,
} from './types';

/**
 * AdvancedDebouncer — debounce with leading edge and a hard deadline
 *
 * A burst starts with the first run() after quiet and ends when one of
 * its timers fires or when it is cancelled:
 * - the delay timer restarts on every run() and executes the pending
 *   action on the trailing edge (when `trailing`)
 * - the deadline timer is armed once per burst when `maxWaitMs` is set and
 *   executes the pending action no matter how often run() was called
 * - with `leading`, the first run() of a burst executes immediately
 *
 * With both `leading` and `trailing`, a burst of a single call executes
 * twice: once on run(), once when the delay elapses.
 *
 * @example
 * ```ts
 * // Save at most every 2s while the user keeps typing
 * const saver = new AdvancedDebouncer(300, { maxWaitMs: 2000 });
 * editor.onChange((doc) => saver.run(() => draft.set(doc)));
 * ```
 */
export class AdvancedDebouncer implements CoalescingScheduler {
  readonly delayMs: number;
  readonly maxWaitMs: number | undefined;
  readonly leading: boolean;
  readonly trailing: boolean;

  private readonly delayTimer = new TimerSlot();
  private readonly deadlineTimer = new TimerSlot();
  private pending: Action | null = null;
  private hasInvoked = false;

  constructor(delayMs: number, options: AdvancedDebouncerOptions = {}) {
    const { maxWaitMs, leading = false, trailing = true } = options;

    assertDuration(delayMs, 'delayMs');
    if (maxWaitMs !== undefined) {
      assertDuration(maxWaitMs, 'maxWaitMs');
      warnIf(
        maxWaitMs < delayMs,
        `maxWaitMs (${maxWaitMs}) is shorter than delayMs (${delayMs}); the deadline will always fire first`
      );
    }
    invariant(
      leading || trailing,
      'At least one of leading or trailing must be true',
      { leading, trailing }
    );

    this.delayMs = delayMs;
    this.maxWaitMs = maxWaitMs;
    this.leading = leading;
    this.trailing = trailing;
  }

  run(action: Action): void {
    this.pending = action;
    const shouldFireLeading = this.leading && !this.hasInvoked;

    this.delayTimer.arm(this.delayMs, () => this.onDelayElapsed());

    if (this.maxWaitMs !== undefined && !this.deadlineTimer.armed) {
      this.deadlineTimer.arm(this.maxWaitMs, () => this.onDeadlineElapsed());
    }

    if (shouldFireLeading) {
      // Marked before the call so a reentrant run() or a throw still
      // counts as this burst's leading execution
      this.hasInvoked = true;
      action();
    }
  }

  /**
   * Resolve the current burst now, as if the delay had elapsed.
   * No-op when no burst is in progress.
   */
  flush(): void {
    if (!this.isActive) return;
    this.onDelayElapsed();
  }

  cancel(): void {
    this.reset();
  }

  dispose(): void {
    this.cancel();
  }

  get isActive(): boolean {
    return this.delayTimer.armed || this.deadlineTimer.armed;
  }

  private onDelayElapsed(): void {
    const action = this.trailing ? this.pending : null;
    this.reset();
    action?.();
  }

  private onDeadlineElapsed(): void {
    const action = this.pending;
    this.reset();
    action?.();
  }

  private reset(): void {
    this.delayTimer.clear();
    this.deadlineTimer.clear();
    this.pending = null;
    this.hasInvoked = false;
  }
}
