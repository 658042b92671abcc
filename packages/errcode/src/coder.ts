/**
 * errcode/coder
 *
 * Error coders and their composition.
 *
 * An {@link ErrorCoder} maps an error to a canonical {@link Code}. Coders for
 * different error sources are combined with {@link ErrorCoders}, which asks
 * each member in order and keeps the first confident answer.
 *
 * @example
 * ```typescript
 * import { compact, codedErrorCoder, contextErrorCoder } from 'errcode';
 * import { grpcErrorCoder } from 'errcode-grpc';
 *
 * const coder = compact(codedErrorCoder(), grpcErrorCoder(), contextErrorCoder());
 *
 * const code = coder.errorCode(error);
 * ```
 */

import { Code } from "./code";

// =============================================================================
// ErrorCoder
// =============================================================================

/**
 * Classifies errors into canonical codes.
 *
 * Implementations must be pure and must not throw.
 */
export interface ErrorCoder {
  /**
   * Returns the code of an error.
   * If the error is `null` or `undefined`, it must return `Code.OK`.
   * If the code cannot be determined, it must return `Code.Unknown`.
   */
  errorCode(error: unknown): Code;
}

/**
 * A classification function, the plain form of an {@link ErrorCoder}.
 */
export type ErrorCodeFn = (error: unknown) => Code;

class FuncErrorCoder implements ErrorCoder {
  constructor(private readonly fn: ErrorCodeFn) {
    Object.freeze(this);
  }

  errorCode(error: unknown): Code {
    return this.fn(error);
  }
}

/**
 * Create an ErrorCoder from a function.
 *
 * Every call returns a distinct coder, even for the same function;
 * {@link compact} only merges coders that are the same instance.
 */
export function fromFunc(fn: ErrorCodeFn): ErrorCoder {
  return new FuncErrorCoder(fn);
}

// =============================================================================
// ErrorCoders
// =============================================================================

/**
 * An ErrorCoder that combines other ErrorCoders.
 *
 * Members are consulted in order; the first result other than
 * `Code.Unknown` wins and the remaining members are skipped. Put the coders
 * with the most specific knowledge first.
 *
 * @example
 * ```typescript
 * const coder = new ErrorCoders([grpcErrorCoder(), httpErrorCoder()]);
 * coder.errorCode(serviceError); // the gRPC status, even if an HTTP status is attached too
 * ```
 */
export class ErrorCoders implements ErrorCoder {
  readonly coders: readonly ErrorCoder[];

  constructor(coders: Iterable<ErrorCoder> = []) {
    this.coders = Object.freeze([...coders]);
    Object.freeze(this);
  }

  errorCode(error: unknown): Code {
    if (error === null || error === undefined) {
      return Code.OK;
    }
    for (const coder of this.coders) {
      const code = coder.errorCode(error);
      if (code !== Code.Unknown) {
        return code;
      }
    }
    return Code.Unknown;
  }

  get size(): number {
    return this.coders.length;
  }

  [Symbol.iterator](): Iterator<ErrorCoder> {
    return this.coders[Symbol.iterator]();
  }
}

/**
 * Combine coders in priority order, without flattening.
 */
export function errorCoders(...coders: ErrorCoder[]): ErrorCoders {
  return new ErrorCoders(coders);
}

// =============================================================================
// compact
// =============================================================================

/**
 * Flatten and dedupe ErrorCoders.
 *
 * Nested {@link ErrorCoders} are expanded in place, depth-first. A coder
 * that is already in the output is dropped, so the result keeps the order of
 * first occurrence. Coders are the same only if they are the same instance.
 *
 * @example
 * ```typescript
 * const base = errorCoders(codedErrorCoder(), contextErrorCoder());
 * const coder = compact(base, fileSystemErrorCoder(), base);
 * coder.coders; // [codedErrorCoder(), contextErrorCoder(), fileSystemErrorCoder()]
 * ```
 */
export function compact(...coders: ErrorCoder[]): ErrorCoders {
  const out: ErrorCoder[] = [];
  const seen = new Set<ErrorCoder>();
  append(out, seen, coders);
  return new ErrorCoders(out);
}

function append(out: ErrorCoder[], seen: Set<ErrorCoder>, coders: Iterable<ErrorCoder>): void {
  for (const coder of coders) {
    if (coder instanceof ErrorCoders) {
      append(out, seen, coder.coders);
      continue;
    }
    if (!isIdentifiable(coder)) {
      // No identity to compare; always treated as distinct
      out.push(coder);
      continue;
    }
    if (!seen.has(coder)) {
      seen.add(coder);
      out.push(coder);
    }
  }
}

function isIdentifiable(value: unknown): boolean {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}
