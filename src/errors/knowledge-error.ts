/**
 * Knowledge Errors
 *
 * Engines throw KnowledgeError. The message carries a `[KIND]` prefix so the
 * tool layer can recover the kind from any thrown value.
 */

export const ERROR_KINDS = ['NotFound', 'InvalidArgument', 'Conflict', 'StoreFailure'] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export class KnowledgeError extends Error {
  readonly kind: ErrorKind;
  /** Message without the kind prefix */
  readonly detail: string;

  constructor(kind: ErrorKind, detail: string, options?: { cause?: unknown }) {
    super(`[${kind}] ${detail}`, options);
    this.name = 'KnowledgeError';
    this.kind = kind;
    this.detail = detail;
  }
}

export function isErrorKind(value: string): value is ErrorKind {
  return ERROR_KINDS.some((item) => item === value);
}

export function notFound(what: string, id: string): KnowledgeError {
  return new KnowledgeError('NotFound', `${what} not found: ${id}`);
}

export function invalidArgument(detail: string): KnowledgeError {
  return new KnowledgeError('InvalidArgument', detail);
}

/**
 * Wrap a store-level failure. KnowledgeErrors raised inside a transaction
 * pass through unchanged.
 */
export function toStoreFailure(err: unknown): KnowledgeError {
  if (err instanceof KnowledgeError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new KnowledgeError('StoreFailure', message, { cause: err });
}
