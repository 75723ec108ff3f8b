/**
 * Coalescing effectiveness benchmark
 *
 * Measures the per-call cost of run() under a burst, which is dominated by
 * clearing and re-arming the delay timer.
 */

import { bench, describe } from 'vitest';
import { AdvancedDebouncer, Debouncer, debounce } from '../../src/index';

const N = 1000;
const noop = () => {};

describe('coalescing effectiveness', () => {
  const basic = new Debouncer(50);
  const bounded = new AdvancedDebouncer(50, { maxWaitMs: 200 });
  const wrapped = debounce((_n: number) => {}, 50);

  bench(
    `Debouncer.run x${N}`,
    () => {
      for (let i = 0; i < N; i++) basic.run(noop);
    },
    { teardown: () => basic.cancel() }
  );

  bench(
    `AdvancedDebouncer.run (maxWait) x${N}`,
    () => {
      for (let i = 0; i < N; i++) bounded.run(noop);
    },
    { teardown: () => bounded.cancel() }
  );

  bench(
    `debounce() wrapper x${N}`,
    () => {
      for (let i = 0; i < N; i++) wrapped(i);
    },
    { teardown: () => wrapped.cancel() }
  );
});
