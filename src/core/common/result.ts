// src/core/common/result.ts

/**
 * Outcome of a step that can fail without unwinding the caller.
 */
export type Result<T, E extends Error = Error> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const fail = <E extends Error>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Runs an async step and captures a thrown error as a failed Result.
 * `wrap` converts whatever was thrown into the step's error type.
 */
export async function attempt<T, E extends Error>(
    step: () => Promise<T>,
    wrap: (error: unknown) => E
): Promise<Result<T, E>> {
    try {
        return ok(await step());
    } catch (error) {
        return fail(wrap(error));
    }
}
