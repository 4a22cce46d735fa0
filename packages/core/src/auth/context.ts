import { AsyncLocalStorage } from 'node:async_hooks';
import type { AuthUser } from './index';

/** The signed-in user, their company and the id every log line of the request carries. */
export interface RequestContext {
  user: AuthUser;
  tenantId: string;
  requestId: string;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

export function getRequestContext(): RequestContext {
  const ctx = requestContext.getStore();
  if (!ctx) {
    throw new Error('No request context: the caller is not running under withMiddleware');
  }
  return ctx;
}
