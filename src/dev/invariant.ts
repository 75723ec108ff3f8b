/**
 * Construction-time assertions
 *
 * Fail fast: a violated invariant throws before any instance exists.
 */

import { ConfigurationError } from '../common/errors';

/**
 * Assert a configuration condition; throw with context if false
 * @internal
 */
export function invariant(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    const contextStr = context ? '\n' + JSON.stringify(context, null, 2) : '';
    throw new ConfigurationError(`[quiesce] ${message}${contextStr}`);
  }
}

/**
 * Assert a duration is a finite, non-negative number of milliseconds
 * @internal
 */
export function assertDuration(value: number, fieldName: string): void {
  // JSON.stringify renders NaN and Infinity as null, so keep the raw text
  invariant(
    Number.isFinite(value) && value >= 0,
    `${fieldName} must be a finite, non-negative number of milliseconds`,
    { [fieldName]: String(value) }
  );
}
