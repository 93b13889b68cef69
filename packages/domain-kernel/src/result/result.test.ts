import { describe, expect, it } from 'vitest';
import { Result } from './result.js';

describe('Result', () => {
  it('exposes the value of a success and refuses getError', () => {
    const result = Result.ok(42);
    expect(result.isSuccess).toBe(true);
    expect(result.isFailure).toBe(false);
    expect(result.getValue()).toBe(42);
    expect(() => result.getError()).toThrow(/success result/);
  });

  it('exposes the error of a failure and refuses getValue', () => {
    const result = Result.fail<number, string>('boom');
    expect(result.isFailure).toBe(true);
    expect(result.getError()).toBe('boom');
    expect(() => result.getValue()).toThrow(/error result/);
  });

  it('maps only successful values', () => {
    expect(Result.ok(2).map((n) => n * 3).getValue()).toBe(6);
    expect(Result.fail<number, string>('nope').map((n) => n * 3).getError()).toBe('nope');
  });

  it('combines to the first failure', () => {
    const combined = Result.combine<string>([
      Result.ok(1),
      Result.fail('first'),
      Result.fail('second'),
    ]);
    expect(combined.getError()).toBe('first');
    expect(Result.combine<string>([Result.ok(1), Result.ok(2)]).isSuccess).toBe(true);
  });

  it('matches on the outcome', () => {
    const render = (r: Result<number, string>) =>
      r.match(
        (value) => `ok:${value}`,
        (error) => `fail:${error}`,
      );
    expect(render(Result.ok(1))).toBe('ok:1');
    expect(render(Result.fail('x'))).toBe('fail:x');
  });
});
