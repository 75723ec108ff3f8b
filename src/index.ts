/**
 * quiesce: coalescing schedulers for UI input
 *
 * Public API surface.
 * - Debouncer / AdvancedDebouncer  (action schedulers)
 * - debounce / throttle            (function wrappers)
 * - createScope                    (dispose many schedulers at once)
 */

export { Debouncer } from './timing/debouncer';
export { AdvancedDebouncer } from './timing/advanced-debouncer';
export type {
  Action,
  AdvancedDebouncerOptions,
  CoalescingScheduler,
  Disposable,
} from './timing/types';

export {
  debounce,
  throttle,
  type Debounced,
  type DebounceOptions,
} from './stdlib';

export { createScope } from './runtime/scope';
export type { ScopeOptions, TimingScope } from './runtime/scope';

export { ConfigurationError } from './common/errors';
