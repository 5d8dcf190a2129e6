import { isLedgerError, LedgerError } from './errors';

export type Result<T, E extends LedgerError = LedgerError> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const fail = <E extends LedgerError>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Runs `operation` and turns a thrown LedgerError into a failed Result.
 * Any other error is rethrown unchanged.
 */
export const attempt = <T>(operation: () => T): Result<T> => {
    try {
        return ok(operation());
    } catch (error) {
        if (isLedgerError(error)) {
            return fail(error);
        }
        throw error;
    }
};

export const unwrap = <T>(result: Result<T>): T => {
    if (!result.ok) {
        throw result.error;
    }
    return result.value;
};

export const mapResult = <T, U>(result: Result<T>, transform: (value: T) => U): Result<U> =>
    result.ok ? ok(transform(result.value)) : result;
