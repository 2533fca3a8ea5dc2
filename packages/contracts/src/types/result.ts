/**
 * Outcome of parsing or loading outside data: a value, or the error that
 * stopped it.
 *
 * @example
 * ```typescript
 * const world = loadSave(raw)
 *   .map((save) => restoreRun(save))
 *   .getOrThrow();
 * ```
 */
export class Result<T, E> {
  private constructor(
    private readonly _value: T | undefined,
    private readonly _error: E | undefined,
    private readonly _isOk: boolean,
  ) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>(value, undefined, true);
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>(undefined, error, false);
  }

  isOk(): boolean {
    return this._isOk;
  }

  isErr(): boolean {
    return !this._isOk;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return this._isOk ? Result.ok(fn(this._value as T)) : Result.err(this._error as E);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return this._isOk ? Result.ok(this._value as T) : Result.err(fn(this._error as E));
  }

  andThen<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    return this._isOk ? fn(this._value as T) : Result.err(this._error as E);
  }

  getOrElse(fallback: T): T {
    return this._isOk ? (this._value as T) : fallback;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    return this._isOk ? onOk(this._value as T) : onErr(this._error as E);
  }

  /** @throws The error itself when this is an Err */
  getOrThrow(): T {
    if (!this._isOk) throw this._error;
    return this._value as T;
  }

  get success(): boolean {
    return this._isOk;
  }

  get value(): T {
    if (!this._isOk) {
      throw new Error("Cannot access value of Err Result");
    }
    return this._value as T;
  }

  get error(): E {
    if (this._isOk) {
      throw new Error("Cannot access error of Ok Result");
    }
    return this._error as E;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
