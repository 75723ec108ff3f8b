import { describe, it, expect, expectTypeOf, beforeEach, vi } from 'vitest';
import { debounce, throttle } from '../../src/stdlib';

beforeEach(() => {
  vi.useFakeTimers();
});

describe('debounce', () => {
  it('should call through with the arguments of the last call', () => {
    const calls: string[] = [];
    const save = debounce((text: string) => calls.push(text), 100);

    save('h');
    save('he');
    save('hello');
    vi.advanceTimersByTime(100);

    expect(calls).toEqual(['hello']);
  });

  it('should call through with the receiver of the last call', () => {
    const calls: string[] = [];
    const onInput = debounce(function (
      this: { label: string },
      text: string
    ) {
      calls.push(`${this.label}:${text}`);
    }, 100);
    const search = { label: 'search', onInput };
    const filter = { label: 'filter', onInput };

    search.onInput('a');
    filter.onInput('ab');
    vi.advanceTimersByTime(100);

    expect(calls).toEqual(['filter:ab']);
  });

  it('should keep the wrapped parameter list', () => {
    const save = debounce((_id: number, _text: string) => {}, 100);
    expectTypeOf(save).parameters.toEqualTypeOf<[number, string]>();
  });

  it('should report pending work and cancel it', () => {
    const spy = vi.fn();
    const save = debounce(spy, 100);

    expect(save.pending()).toBe(false);
    save();
    expect(save.pending()).toBe(true);

    save.cancel();
    expect(save.pending()).toBe(false);

    vi.advanceTimersByTime(200);
    expect(spy).not.toHaveBeenCalled();
  });

  it('should flush immediately', () => {
    const calls: number[] = [];
    const save = debounce((n: number) => calls.push(n), 100);

    save(1);
    save(2);
    save.flush();

    expect(calls).toEqual([2]);
    expect(save.pending()).toBe(false);
  });

  it('should pass options through to the scheduler', () => {
    const calls: number[] = [];
    const save = debounce((n: number) => calls.push(n), 100, {
      leading: true,
      trailing: false,
    });

    save(1);
    save(2);
    vi.advanceTimersByTime(100);

    expect(calls).toEqual([1]);
  });
});

describe('throttle', () => {
  it('should execute a lone call once, after the window', () => {
    const spy = vi.fn();
    const t = throttle(spy, 100);

    t('x');
    vi.advanceTimersByTime(99);
    expect(spy).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('x');

    vi.advanceTimersByTime(500);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('should execute once per window under a continuous stream', () => {
    const calls: number[] = [];
    const t = throttle((n: number) => calls.push(n), 100);

    for (let i = 0; i < 10; i++) {
      t(i);
      vi.advanceTimersByTime(30);
    }
    expect(calls).toEqual([3, 7]);

    vi.advanceTimersByTime(100);
    expect(calls).toEqual([3, 7, 9]);
  });
});
