/**
 * Timing helpers — wrap a function instead of handing over actions
 * No framework coupling. No lifecycle awareness.
 */

import { AdvancedDebouncer } from '../timing/advanced-debouncer';

export interface DebounceOptions {
  leading?: boolean;
  trailing?: boolean;
  maxWaitMs?: number;
}

export type Debounced<A extends unknown[]> = ((...args: A) => void) & {
  cancel(): void;
  flush(): void;
  pending(): boolean;
};

/**
 * Debounce — delay execution, coalesce rapid calls
 *
 * Useful for: text input, resize, autosave
 *
 * @param fn Function to debounce; called with the `this` and arguments of the last call
 * @param ms Delay in milliseconds
 * @param options trailing (default true), leading, maxWaitMs
 *
 * @example
 * ```ts
 * const save = debounce((text: string) => api.save(text), 500);
 * input.addEventListener('input', () => save(input.value));
 * save.cancel(); // stop any pending execution
 * ```
 */
export function debounce<A extends unknown[]>(
  fn: (...args: A) => unknown,
  ms: number,
  options?: DebounceOptions
): Debounced<A> {
  const scheduler = new AdvancedDebouncer(ms, options);

  const debounced = function (this: unknown, ...args: A): void {
    // eslint-disable-next-line @typescript-eslint/no-this-alias
    const lastThis = this;
    scheduler.run(() => {
      fn.apply(lastThis, args);
    });
  };

  return Object.assign(debounced, {
    cancel: () => scheduler.cancel(),
    flush: () => scheduler.flush(),
    pending: () => scheduler.isActive,
  });
}

/**
 * Throttle — rate-limit execution, keep the last call
 *
 * Runs at most once per `ms` while calls keep arriving, always with the
 * latest arguments. A lone call runs once, `ms` after it was made.
 *
 * Useful for: scroll, pointer move, live previews
 *
 * @example
 * ```ts
 * const onScroll = throttle(() => offset.set(window.scrollY), 100);
 * window.addEventListener('scroll', onScroll);
 * ```
 */
export function throttle<A extends unknown[]>(
  fn: (...args: A) => unknown,
  ms: number
): Debounced<A> {
  return debounce(fn, ms, { maxWaitMs: ms });
}
