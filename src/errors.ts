import { ParseError } from './diff/errors.js';
import { InvalidSelectorError } from './queue/errors.js';
import { StaleGroupingError } from './grouping/errors.js';
import { SessionCorruptError, SessionNotFoundError } from './session/errors.js';
import { ConcurrentMutationError } from './concurrency/errors.js';
import { DeepDiveStateError } from './resolution/deep-dive/errors.js';
import { ConfigError } from './config/errors.js';

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  PARSE_ERROR: 2,
  INVALID_SELECTOR: 3,
  SESSION_CORRUPT: 4,
  STALE_GROUPING: 5,
  CONCURRENT_MUTATION: 6,
} as const;

export function exitCodeFor(error: unknown): number {
  if (error instanceof ParseError) return EXIT_CODES.PARSE_ERROR;
  if (error instanceof InvalidSelectorError) return EXIT_CODES.INVALID_SELECTOR;
  if (error instanceof SessionCorruptError) return EXIT_CODES.SESSION_CORRUPT;
  if (error instanceof StaleGroupingError) return EXIT_CODES.STALE_GROUPING;
  if (error instanceof ConcurrentMutationError) return EXIT_CODES.CONCURRENT_MUTATION;
  return EXIT_CODES.FAILURE;
}

export interface ErrorBody {
  error: string;
  message: string;
  offending?: string[];
  retryable?: boolean;
}

export function httpStatusFor(error: unknown): number {
  if (error instanceof ParseError || error instanceof ConfigError) return 400;
  if (error instanceof SessionNotFoundError) return 404;
  if (error instanceof InvalidSelectorError) return 422;
  if (
    error instanceof StaleGroupingError ||
    error instanceof ConcurrentMutationError ||
    error instanceof DeepDiveStateError
  ) {
    return 409;
  }
  return 500;
}

export function errorBody(error: unknown): ErrorBody {
  if (!(error instanceof Error)) {
    return { error: 'Error', message: 'Unknown error' };
  }

  const body: ErrorBody = { error: error.name, message: error.message };
  if (error instanceof InvalidSelectorError && error.offending.length > 0) {
    body.offending = error.offending;
  }
  if (error instanceof StaleGroupingError || error instanceof ConcurrentMutationError) {
    body.retryable = true;
  }
  return body;
}
