import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';
import { AppError, RateLimitedError, generateUlid } from '@expensox/shared';
import { authenticate, resolveTenant } from './middleware';
import { requestContext } from './context';
import type { RequestContext } from './context';
import { requirePermission } from '../permissions/middleware';
import { getAppConfig } from '../config';
import { logger, errorFields } from '../observability/logger';

export type RouteHandler = (
  request: NextRequest,
  context: RequestContext,
) => Promise<NextResponse>;

/** Handler for routes reachable without a bearer token. */
export type PublicRouteHandler = (
  request: NextRequest,
  meta: { requestId: string },
) => Promise<NextResponse>;

export interface MiddlewareOptions {
  /** Cache-Control header value for GET responses. */
  cache?: string;
  permission?: string;
}

function errorResponse(error: unknown, requestId: string): NextResponse {
  if (error instanceof AppError) {
    const response = NextResponse.json(
      { error: { code: error.code, message: error.message, details: error.details } },
      { status: error.statusCode },
    );
    if (error instanceof RateLimitedError) {
      response.headers.set('Retry-After', String(error.retryAfterSeconds));
    }
    return response;
  }

  const message = error instanceof Error ? error.message : String(error);
  return NextResponse.json(
    {
      error: {
        code: 'INTERNAL_ERROR',
        message: getAppConfig().nodeEnv === 'development' ? message : 'An unexpected error occurred',
        requestId,
      },
    },
    { status: 500 },
  );
}

function logRequest(
  request: NextRequest,
  status: number,
  startTime: number,
  ids: { requestId: string; tenantId?: string; userId?: string },
  error?: unknown,
): void {
  const fields = {
    requestId: ids.requestId,
    tenantId: ids.tenantId,
    userId: ids.userId,
    method: request.method,
    path: new URL(request.url).pathname,
    statusCode: status,
    durationMs: Date.now() - startTime,
  };
  if (status >= 500) {
    logger.error('Unhandled error in route handler', { ...fields, error: errorFields(error) });
  } else if (status >= 400) {
    logger.warn('Request failed', fields);
  } else {
    logger.info('Request completed', fields);
  }
}

function applyCache(request: NextRequest, response: NextResponse, options?: MiddlewareOptions): NextResponse {
  if (options?.cache && request.method === 'GET') {
    response.headers.set('Cache-Control', options.cache);
  }
  return response;
}

/**
 * Authenticates the bearer token, resolves the tenant, checks `permission`,
 * runs the handler inside the request context and maps errors to JSON.
 */
export function withMiddleware(handler: RouteHandler, options?: MiddlewareOptions) {
  return async (request: NextRequest): Promise<NextResponse> => {
    const startTime = Date.now();
    const ids: { requestId: string; tenantId?: string; userId?: string } = {
      requestId: generateUlid(),
    };

    try {
      const user = await authenticate(request);
      ids.userId = user.id;
      ids.tenantId = user.tenantId;

      const ctx = await resolveTenant(user, ids.requestId);

      if (options?.permission) {
        await requirePermission(options.permission)(ctx);
      }

      const response = await requestContext.run(ctx, () => handler(request, ctx));
      logRequest(request, response.status, startTime, ids);
      return applyCache(request, response, options);
    } catch (error) {
      const response = errorResponse(error, ids.requestId);
      logRequest(request, response.status, startTime, ids, error);
      return response;
    }
  };
}

/** Same error mapping and logging as `withMiddleware`, without authentication. */
export function withPublicMiddleware(handler: PublicRouteHandler, options?: MiddlewareOptions) {
  return async (request: NextRequest): Promise<NextResponse> => {
    const startTime = Date.now();
    const ids = { requestId: generateUlid() };

    try {
      const response = await handler(request, ids);
      logRequest(request, response.status, startTime, ids);
      return applyCache(request, response, options);
    } catch (error) {
      const response = errorResponse(error, ids.requestId);
      logRequest(request, response.status, startTime, ids, error);
      return response;
    }
  };
}
