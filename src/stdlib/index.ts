/**
 * Standard library — function-wrapping timing helpers
 * Zero framework coupling
 */

export {
  debounce,
  throttle,
  type Debounced,
  type DebounceOptions,
} from './timing';
