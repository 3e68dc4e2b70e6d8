import { NextResponse } from 'next/server';
import { isDatasetError } from './dataset-errors';
import { logger } from './logger';

export class HttpError extends Error {
  status: number;
  code?: string;

  constructor(status: number, message: string, code?: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.code = code;
  }
}

export type ApiErrorBody = {
  error: string;
  code?: string;
  correlationId?: string;
};

function errorResponse(body: ApiErrorBody, status: number, correlationId?: string): NextResponse {
  const res = NextResponse.json(correlationId ? { ...body, correlationId } : body, { status });
  if (correlationId) res.headers.set('x-correlation-id', correlationId);
  return res;
}

/**
 * Shared error handler for API routes.
 */
export function handleApiError(
  error: unknown,
  defaultMessage: string = 'Something went wrong',
  correlationId?: string,
): NextResponse {
  if (error instanceof HttpError) {
    if (error.status >= 500) logger.error('[API] Error:', { correlationId, error });
    return errorResponse({ error: error.message, code: error.code }, error.status, correlationId);
  }

  // The dataset failed to load: the dashboard cannot serve anything.
  if (isDatasetError(error)) {
    logger.error('[API] Dataset unavailable:', { correlationId, message: error.message });
    return errorResponse({ error: error.message, code: error.code }, 503, correlationId);
  }

  logger.error('[API] Error:', { correlationId, error });

  if (error instanceof Error) {
    // Don't expose internal error messages in production
    const isDevelopment = process.env.NODE_ENV === 'development';
    return errorResponse({ error: isDevelopment ? error.message : defaultMessage }, 500, correlationId);
  }

  return errorResponse({ error: defaultMessage }, 500, correlationId);
}
