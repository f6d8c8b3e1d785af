/**
 * ErrorHandler
 *
 * Maps anything thrown by an engine to a structured error with recovery
 * hints. Tool handlers run inside `wrap`, so no exception reaches the
 * transport.
 */

import { isErrorKind, KnowledgeError, type ErrorKind } from './knowledge-error.js';

export interface StructuredError {
  kind: ErrorKind;
  message: string;
  recoveryHints: string[];
  retryable: boolean;
}

export type ToolResponse<T = unknown> =
  | { ok: true; data: T }
  | { ok: false; error: StructuredError };

interface ErrorMapping {
  recoveryHints: string[];
  retryable: boolean;
}

const ERROR_MAPPINGS: Record<ErrorKind, ErrorMapping> = {
  NotFound: {
    recoveryHints: ['Check the id', 'Deleted records can be brought back with strata_graph_restore'],
    retryable: false,
  },
  InvalidArgument: {
    recoveryHints: ['Fix the arguments and call again'],
    retryable: false,
  },
  Conflict: {
    recoveryHints: ['The record changed concurrently', 'Read it again before retrying'],
    retryable: true,
  },
  StoreFailure: {
    recoveryHints: ['Check the database path and disk space', 'See the server log for details'],
    retryable: false,
  },
};

export class ErrorHandler {
  /** Error kind from a KnowledgeError, or from a `[Kind]` message prefix. */
  static extractKind(error: unknown): ErrorKind {
    if (error instanceof KnowledgeError) return error.kind;
    const match = /^\[([A-Za-z]+)\]/.exec(ErrorHandler.extractMessage(error));
    const kind = match?.[1];
    return kind !== undefined && isErrorKind(kind) ? kind : 'StoreFailure';
  }

  /** Extract a human-readable message from any error type. */
  static extractMessage(error: unknown): string {
    if (error instanceof KnowledgeError) return error.detail;
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    if (error === null) return 'null error';
    if (error === undefined) return 'undefined error';
    return String(error);
  }

  static toStructuredError(error: unknown): StructuredError {
    const kind = ErrorHandler.extractKind(error);
    const mapping = ERROR_MAPPINGS[kind];
    return {
      kind,
      message: ErrorHandler.extractMessage(error),
      recoveryHints: mapping.recoveryHints,
      retryable: mapping.retryable,
    };
  }

  /**
   * Run a handler, turning its result or failure into a ToolResponse.
   */
  static async wrap<T>(fn: () => Promise<T>): Promise<ToolResponse<T>> {
    try {
      return { ok: true, data: await fn() };
    } catch (error: unknown) {
      return { ok: false, error: ErrorHandler.toStructuredError(error) };
    }
  }
}
