/**
 * errcode/chain
 *
 * Walking the cause chain of an error.
 *
 * Wrapped errors are reached through `cause` (ES2022 error cause, and the
 * `cause` of {@link CodedError}) and through the `errors` array of an
 * `AggregateError`. Coders use {@link findCause} to locate the first error
 * in the chain that exposes the accessor they understand.
 */

// =============================================================================
// Traversal
// =============================================================================

/**
 * Iterate an error and everything it wraps, depth-first.
 *
 * Order: the error itself, then its `cause` chain, then each entry of its
 * `errors` array. Each object is visited at most once, so cycles terminate.
 * `null` and `undefined` yield nothing.
 *
 * @example
 * ```typescript
 * const inner = new Error('ENOENT');
 * const outer = new Error('load config', { cause: inner });
 * [...causes(outer)]; // [outer, inner]
 * ```
 */
export function* causes(error: unknown): Generator<unknown, void, undefined> {
  const seen = new Set<object>();
  const stack: unknown[] = [error];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === null || current === undefined) continue;

    if (typeof current === "object") {
      if (seen.has(current)) continue;
      seen.add(current);
    }

    yield current;

    if (typeof current !== "object") continue;

    // Pushed in reverse so `cause` is visited before aggregated errors
    if ("errors" in current && Array.isArray(current.errors)) {
      for (let i = current.errors.length - 1; i >= 0; i--) {
        stack.push(current.errors[i]);
      }
    }
    if ("cause" in current) {
      stack.push(current.cause);
    }
  }
}

/**
 * Find the first error in the chain matching a type guard.
 *
 * @returns The matching error, or `undefined` when none matches
 *
 * @example
 * ```typescript
 * const http = findCause(error, isHttpStatusCarrier);
 * if (http) return fromHttpStatus(http.httpStatus);
 * ```
 */
export function findCause<T>(
  error: unknown,
  guard: (value: unknown) => value is T
): T | undefined {
  for (const value of causes(error)) {
    if (guard(value)) return value;
  }
  return undefined;
}
