// ─── Cause & ValidationError ─────────────────────────────────────────

export interface Cause<E> {
  readonly message: E;
  /** Path segments leading to the failing item, outermost first. */
  readonly trace: readonly string[];
}

type NonEmpty<T> = readonly [T, ...T[]];

export class ValidationError<E> extends Error {
  constructor(readonly causes: NonEmpty<Cause<E>>) {
    super(causes.map(formatCause).join("\n"));
    this.name = "ValidationError";
  }

  static new<E>(message: E): ValidationError<E> {
    return new ValidationError([{ message, trace: [] }]);
  }

  /** Left causes first, then right. */
  combine(other: ValidationError<E>): ValidationError<E> {
    const [head, ...rest] = this.causes;
    return new ValidationError([head, ...rest, ...other.causes]);
  }

  trace(segment: string): ValidationError<E> {
    const prepend = (cause: Cause<E>): Cause<E> => ({
      message: cause.message,
      trace: [segment, ...cause.trace],
    });
    const [head, ...rest] = this.causes;
    return new ValidationError([prepend(head), ...rest.map(prepend)]);
  }

  messages(): E[] {
    return this.causes.map((cause) => cause.message);
  }
}

function formatCause<E>(cause: Cause<E>): string {
  const prefix = cause.trace.length ? `[${cause.trace.join(", ")}] ` : "";
  return prefix + String(cause.message);
}

// ─── Valid ───────────────────────────────────────────────────────────

export type ValidResult<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ValidationError<E> };

/**
 * Outcome of a validation step: either a value or a non-empty set of errors.
 *
 * Unlike a plain `Result`, `fromIter` and `zip` keep going after a failure and
 * merge every error they meet, so a caller sees all of them at once.
 */
export class Valid<T, E> {
  private constructor(private readonly inner: ValidResult<T, E>) { }

  static succeed<T, E = never>(value: T): Valid<T, E> {
    return new Valid<T, E>({ ok: true, value });
  }

  static fail<E, T = never>(message: E): Valid<T, E> {
    return Valid.fromValidationError<T, E>(ValidationError.new(message));
  }

  static fromValidationError<T, E>(error: ValidationError<E>): Valid<T, E> {
    return new Valid<T, E>({ ok: false, error });
  }

  static fromOption<T, E>(value: T | null | undefined, message: E): Valid<T, E> {
    return value == null ? Valid.fail(message) : Valid.succeed(value);
  }

  /**
   * Run `f` over every item. Successes are collected in input order; failures
   * are concatenated in input order. `f` is called for every item regardless.
   */
  static fromIter<A, T, E>(
    items: Iterable<A>,
    f: (item: A) => Valid<T, E>,
  ): Valid<T[], E> {
    const values: T[] = [];
    let error: ValidationError<E> | undefined;
    for (const item of items) {
      const result = f(item).inner;
      if (result.ok) {
        values.push(result.value);
      } else {
        error = error ? error.combine(result.error) : result.error;
      }
    }
    return error ? Valid.fromValidationError(error) : Valid.succeed(values);
  }

  isSucceed(): boolean {
    return this.inner.ok;
  }

  map<U>(f: (value: T) => U): Valid<U, E> {
    return this.inner.ok
      ? Valid.succeed(f(this.inner.value))
      : Valid.fromValidationError(this.inner.error);
  }

  andThen<U>(f: (value: T) => Valid<U, E>): Valid<U, E> {
    return this.inner.ok
      ? f(this.inner.value)
      : Valid.fromValidationError(this.inner.error);
  }

  zip<U>(other: Valid<U, E>): Valid<[T, U], E> {
    const left = this.inner;
    const right = other.inner;
    if (!left.ok) {
      return Valid.fromValidationError(
        right.ok ? left.error : left.error.combine(right.error),
      );
    }
    if (!right.ok) return Valid.fromValidationError(right.error);
    return Valid.succeed([left.value, right.value]);
  }

  trace(segment: string): Valid<T, E> {
    return this.inner.ok
      ? this
      : Valid.fromValidationError(this.inner.error.trace(segment));
  }

  toResult(): ValidResult<T, E> {
    return this.inner;
  }

  /** Return the value or throw the accumulated `ValidationError`. */
  unwrap(): T {
    if (this.inner.ok) return this.inner.value;
    throw this.inner.error;
  }
}
