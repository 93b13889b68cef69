type Outcome<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export class Result<T, E = string> {
  public readonly isSuccess: boolean;
  public readonly isFailure: boolean;

  private constructor(private readonly outcome: Outcome<T, E>) {
    this.isSuccess = outcome.ok;
    this.isFailure = !outcome.ok;

    Object.freeze(this);
  }

  public getValue(): T {
    if (!this.outcome.ok) {
      throw new Error("Can't get the value of an error result. Use getError instead.");
    }
    return this.outcome.value;
  }

  public getError(): E {
    if (this.outcome.ok) {
      throw new Error("Can't get the error of a success result. Use getValue instead.");
    }
    return this.outcome.error;
  }

  /** Narrowing accessor for callers that branch on the outcome. */
  public match<R>(onOk: (value: T) => R, onFail: (error: E) => R): R {
    return this.outcome.ok ? onOk(this.outcome.value) : onFail(this.outcome.error);
  }

  public map<U>(fn: (value: T) => U): Result<U, E> {
    return this.outcome.ok
      ? new Result<U, E>({ ok: true, value: fn(this.outcome.value) })
      : new Result<U, E>({ ok: false, error: this.outcome.error });
  }

  public static ok<U>(value: U): Result<U, never> {
    return new Result<U, never>({ ok: true, value });
  }

  public static fail<U, E>(error: E): Result<U, E> {
    if (error === undefined || error === null) {
      throw new Error('InvalidOperation: a failing result needs to contain an error');
    }
    return new Result<U, E>({ ok: false, error });
  }

  public static combine<E>(results: Result<unknown, E>[]): Result<void, E> {
    for (const result of results) {
      if (result.outcome.ok === false) return Result.fail(result.outcome.error);
    }
    return Result.ok(undefined);
  }
}
