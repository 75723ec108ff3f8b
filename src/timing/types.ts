/**
 * Shared contracts for the coalescing schedulers
 */

/** Work handed to a scheduler. Takes nothing, returns nothing. */
export type Action = () => void;

export interface Disposable {
  dispose(): void;
}

export interface CoalescingScheduler extends Disposable {
  run(action: Action): void;
  cancel(): void;
  flush(): void;
  readonly isActive: boolean;
}

export interface AdvancedDebouncerOptions {
  /** Upper bound on how long a burst may postpone execution, measured from its first call */
  maxWaitMs?: number;
  leading?: boolean;
  trailing?: boolean;
}
