// shared/result.ts — Lightweight Result type for fork/join work.
//
// Each concurrent task settles into its own Result slot; the caller joins the
// slots in one place and decides whether any failure is fatal.

export type Result<T> =
  | {
      ok: true;
      data: T;
    }
  | {
      ok: false;
      error: Error;
    };

export const Ok = <T>(data: T): Result<T> => ({
  ok: true,
  data,
});

export const Err = <T>(error: Error): Result<T> => ({
  ok: false,
  error,
});

/** Run an async task and capture its outcome instead of letting it reject. */
export async function settle<T>(task: () => Promise<T>): Promise<Result<T>> {
  try {
    return Ok(await task());
  } catch (err) {
    return Err(err instanceof Error ? err : new Error(String(err)));
  }
}

/** Unwrap a Result, rethrowing the captured error. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.data;
}
