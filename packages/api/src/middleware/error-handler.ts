import type { Context } from 'hono';
import { ZodError } from 'zod';
import type { SubtaskFailure } from '@triangulate/shared/src/utils/errors.js';
import {
  ConfigurationError,
  LlmError,
  NoUsableResultsError,
  SchemaValidationError,
} from '@triangulate/shared/src/utils/errors.js';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
  readonly failures?: readonly SubtaskFailure[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  if (err instanceof SchemaValidationError) {
    const body: ErrorResponse = {
      error: err.message,
      code: 'VALIDATION_ERROR',
      requestId,
      details: err.validationErrors,
    };
    return c.json(body, 400);
  }

  if (err instanceof NoUsableResultsError) {
    log.warn({ requestId, failures: err.failures }, 'No usable research results');
    const body: ErrorResponse = {
      error: err.message,
      code: err.code,
      requestId,
      failures: err.failures,
    };
    return c.json(body, 422);
  }

  if (err instanceof LlmError) {
    log.error({ requestId, error: err.message, isTransient: err.isTransient }, 'LLM error');
    const body: ErrorResponse = {
      error: 'Language model processing failed',
      code: 'LLM_ERROR',
      requestId,
    };
    return c.json(body, 502);
  }

  if (err instanceof ConfigurationError) {
    log.error({ requestId, error: err.message }, 'Configuration error');
    const body: ErrorResponse = {
      error: 'Service is misconfigured',
      code: 'CONFIGURATION_ERROR',
      requestId,
    };
    return c.json(body, 500);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
