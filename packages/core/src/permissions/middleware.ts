import { AuthorizationError } from '@expensox/shared';
import type { RequestContext } from '../auth/context';
import { hasPermission } from './engine';

export function requirePermission(permission: string) {
  return async (ctx: RequestContext): Promise<void> => {
    if (!hasPermission(ctx.user.role, permission)) {
      throw new AuthorizationError(`Missing required permission: ${permission}`);
    }
  };
}
