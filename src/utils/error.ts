/** Convert an unknown caught value to a human-readable error message. */
export function errMsg(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Wrap a non-Error thrown value so it can be rethrown or used as a `cause`. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
