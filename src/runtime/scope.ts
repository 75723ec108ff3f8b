/**
 * Owner scope for schedulers
 *
 * Whatever owns a set of schedulers (a widget, a view, a form) creates them
 * through a scope and disposes the scope on teardown. Nothing scheduled
 * through an owned scheduler runs after that.
 */

import { logger } from '../dev/logger';
import { AdvancedDebouncer } from '../timing/advanced-debouncer';
import { Debouncer } from '../timing/debouncer';
import type { AdvancedDebouncerOptions, Disposable } from '../timing/types';

export interface ScopeOptions {
  // Opt-in strict cleanup: disposer errors are aggregated and re-thrown
  strict?: boolean;
}

export interface TimingScope extends Disposable {
  debouncer(delayMs: number): Debouncer;
  advancedDebouncer(
    delayMs: number,
    options?: AdvancedDebouncerOptions
  ): AdvancedDebouncer;
  own<T extends Disposable>(disposable: T): T;
  readonly disposed: boolean;
}

export function createScope(options?: ScopeOptions): TimingScope {
  const strict = options?.strict ?? false;
  let owned: Disposable[] = [];
  let disposed = false;

  const own = <T extends Disposable>(disposable: T): T => {
    if (disposed) {
      logger.warn(
        '[quiesce] own() called on a disposed scope; disposing immediately'
      );
      disposable.dispose();
      return disposable;
    }
    owned.push(disposable);
    return disposable;
  };

  return {
    debouncer: (delayMs) => own(new Debouncer(delayMs)),

    advancedDebouncer: (delayMs, debouncerOptions) =>
      own(new AdvancedDebouncer(delayMs, debouncerOptions)),

    own,

    dispose() {
      if (disposed) return;
      disposed = true;

      const toDispose = owned;
      owned = [];
      const errors: unknown[] = [];

      for (const disposable of toDispose) {
        try {
          disposable.dispose();
        } catch (err) {
          if (strict) {
            errors.push(err);
          } else {
            logger.warn('[quiesce] scope disposer threw:', err);
          }
        }
      }

      if (errors.length > 0) {
        throw new AggregateError(errors, 'Scope dispose failed');
      }
    },

    get disposed() {
      return disposed;
    },
  };
}
