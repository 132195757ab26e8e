import type { DomainErrorCategory, DomainErrorInit, NotFoundErrorInit } from './AgentErrors';
import {
  AlreadyExistsError,
  DomainError,
  NotFoundError,
  ValidationError,
} from './AgentErrors';

// SQLSTATE classes are 00-58, F0, HV, P0 and XX; Node errno codes (EPIPE, ...) never match.
const SQLSTATE_PATTERN = /^(?:[0-5][0-9A-Z]|F0|HV|P0|XX)[0-9A-Z]{3}$/u;
const ERROR_ID_PATTERN = /\bERR-\d{5}\b/u;

const CATEGORY_BY_SQLSTATE: Record<string, DomainErrorCategory> = {
  '23505': 'already_exists',
  P0002: 'not_found',
  '42704': 'not_found',
  '2201B': 'invalid_pattern',
  '22023': 'validation',
  '22004': 'validation',
  '22P02': 'validation',
  '23502': 'validation',
  '23514': 'validation',
  '55000': 'invalid_state',
};

export interface DatabaseErrorLike extends Error {
  code: string;
  detail?: string;
}

export interface DecodeContext {
  entityName?: string;
  notFound?: (name: string, message: string, init: NotFoundErrorInit) => NotFoundError;
}

export function isDatabaseError(error: unknown): error is DatabaseErrorLike {
  return error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    SQLSTATE_PATTERN.test(error.code);
}

/**
 * Extracts the stable `ERR-NNNNN` identifier embedded in a backend message.
 */
export function extractErrorId(message: string): string | undefined {
  return ERROR_ID_PATTERN.exec(message)?.[0];
}

export function categorize(sqlState: string): DomainErrorCategory {
  return CATEGORY_BY_SQLSTATE[sqlState] ?? 'rule_violation';
}

/**
 * Turns a raw transport error into the typed error the caller sees.
 *
 * Database errors become {@link DomainError} subclasses with the backend
 * message untouched; anything else (connection loss, timeouts) is returned
 * as-is.
 */
export function decodeBackendError(error: unknown, context: DecodeContext = {}): unknown {
  if (error instanceof DomainError || !isDatabaseError(error)) {
    return error;
  }

  const sqlState = error.code;
  const message = error.message;
  const init: Omit<DomainErrorInit, 'category'> = {
    code: extractErrorId(message) ?? sqlState,
    sqlState,
    detail: typeof error.detail === 'string' ? error.detail : undefined,
    cause: error,
  };
  const category = categorize(sqlState);

  switch (category) {
    case 'not_found': {
      const name = context.entityName ?? '';
      return context.notFound ?
        context.notFound(name, message, init) :
        new NotFoundError(name, message, init);
    }
    case 'already_exists':
      return new AlreadyExistsError(message, init);
    case 'validation':
      return new ValidationError(message, init);
    default:
      return new DomainError(message, { ...init, category });
  }
}
