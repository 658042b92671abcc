/**
 * Message of a wrapped cause: an Error's own message, otherwise the value
 * converted to a string.
 *
 * Values that refuse conversion (a null-prototype object) fall back to their
 * `[object Type]` tag.
 */
export function messageOf(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  try {
    return String(cause);
  } catch {
    return Object.prototype.toString.call(cause);
  }
}
