/**
 * Typed result for operations that can fail.
 *
 * Role in system:
 * - Repositories, the remote gateway and services return `Result` instead of throwing.
 * - Distinguishes "no data" (`Ok(null)`) from "the operation failed" (`Err(error)`).
 *
 * Contract:
 * - **Runtime no-throw**: a single failed call on a command path must not bring the
 *   process down.
 * - Read `.value` after narrowing with `isOk()`/`isErr()`, or use `unwrapOr(fallback)`.
 *
 * Example:
 * ```ts
 * const res = await repoCall();
 * if (res.isErr()) return ErrResult(res.error);
 * const value = res.value;
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
    readonly ok = true;
    readonly err = false;

    constructor(public readonly value: T) { }

    isOk(): this is Ok<T, E> {
        return true;
    }

    isErr(): this is Err<T, E> {
        return false;
    }

    unwrapOr(_default: T): T {
        return this.value;
    }
}

export class Err<T, E> {
    readonly ok = false;
    readonly err = true;

    constructor(public readonly error: E) { }

    isOk(): this is Ok<T, E> {
        return false;
    }

    isErr(): this is Err<T, E> {
        return true;
    }

    unwrapOr(defaultValue: T): T {
        return defaultValue;
    }
}

/** Creates a successful result. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

/** Creates a failed result. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);

/** Normalizes anything caught in a `catch` into an `Error`. */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
