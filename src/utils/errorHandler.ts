import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import {
  BackendRequestError,
  BackendUnavailableError,
  EmptyInputError,
  InvalidConfigurationError,
  TranslationFailedError,
} from '../ai/errors';
import { formatIssues } from '../ai/options';
import { ApiError } from './apiError';
import { logger } from './logger';

const toApiError = (err: unknown): ApiError | null => {
  if (err instanceof ApiError) {
    return err;
  }
  if (err instanceof ZodError) {
    return ApiError.badRequest('Invalid request body', { issues: formatIssues(err) });
  }
  // express.json() parse failures
  if (err instanceof SyntaxError && 'body' in err) {
    return ApiError.badRequest('Malformed JSON body');
  }
  if (err instanceof EmptyInputError) {
    return ApiError.badRequest(err.message, { code: err.code });
  }
  if (err instanceof InvalidConfigurationError) {
    return ApiError.badRequest(err.message, { code: err.code, issues: err.issues });
  }
  if (err instanceof TranslationFailedError) {
    const details = { code: err.code, chunkIndex: err.chunkIndex };
    return err.cause instanceof BackendRequestError
      ? ApiError.badGateway(err.message, details)
      : ApiError.serviceUnavailable(err.message, details);
  }
  if (err instanceof BackendUnavailableError) {
    return ApiError.serviceUnavailable(err.message, { code: err.code });
  }
  return null;
};

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  const apiError = toApiError(err);

  if (apiError) {
    logger.error(
      {
        status: apiError.status,
        message: apiError.message,
        details: apiError.details,
      },
      'API Error',
    );
    return res.status(apiError.status).json({
      error: apiError.message,
      message: apiError.message,
      ...apiError.details,
    });
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error(
    {
      error: error.message,
      stack: error.stack,
      name: error.name,
    },
    'Unhandled error',
  );

  const isDevelopment = process.env.NODE_ENV !== 'production';
  return res.status(500).json({
    error: 'Internal server error',
    message: isDevelopment ? error.message : undefined,
  });
};
