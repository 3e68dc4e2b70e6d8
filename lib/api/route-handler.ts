import { NextRequest, NextResponse } from 'next/server';
import { handleApiError } from '../api-error-handler';
import { logger } from '../logger';

function generateCorrelationId(): string {
  if (typeof crypto !== 'undefined' && crypto.randomUUID) {
    return crypto.randomUUID();
  }
  return 'xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx'.replace(/[xy]/g, (c) => {
    const r = (Math.random() * 16) | 0;
    const v = c === 'x' ? r : (r & 0x3) | 0x8;
    return v.toString(16);
  });
}

export type RouteContext = {
  correlationId: string;
};

type RouteHandler = (req: NextRequest, ctx: RouteContext) => Promise<NextResponse>;

/**
 * Route handler with correlation ID + automatic error handling.
 * The dashboard is public; there is no auth variant.
 */
export function apiHandler(handler: RouteHandler) {
  return async (req: NextRequest): Promise<NextResponse> => {
    const correlationId =
      req.headers.get('x-correlation-id')?.toLowerCase() || generateCorrelationId();

    try {
      const res = await handler(req, { correlationId });
      res.headers.set('x-correlation-id', correlationId);
      logger.debug('[API]', req.method, req.nextUrl.pathname, res.status, correlationId);
      return res;
    } catch (error) {
      return handleApiError(error, 'Something went wrong', correlationId);
    }
  };
}
