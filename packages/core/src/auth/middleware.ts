import {
  AuthenticationError,
  TenantSuspendedError,
  MembershipInactiveError,
  generateUlid,
} from '@expensox/shared';
import { getAuthAdapter } from './get-adapter';
import type { AuthUser } from './index';
import type { RequestContext } from './context';

const BEARER = /^Bearer\s+(\S+)\s*$/;

/** Resolves the `Authorization: Bearer` token to the signed-in user. */
export async function authenticate(request: Request): Promise<AuthUser> {
  const header = request.headers.get('authorization');
  if (!header) {
    throw new AuthenticationError();
  }

  const token = BEARER.exec(header)?.[1];
  if (!token) {
    throw new AuthenticationError('Invalid authorization format');
  }

  const user = await getAuthAdapter().validateToken(token);
  if (!user) {
    throw new AuthenticationError('Invalid or expired token');
  }
  return user;
}

/**
 * Company and user must both be active. `requestId` is the one the caller
 * already logs under; a fresh id is minted when there is none.
 */
export async function resolveTenant(
  user: AuthUser,
  requestId: string = generateUlid(),
): Promise<RequestContext> {
  if (user.tenantStatus !== 'active') throw new TenantSuspendedError();
  if (user.membershipStatus !== 'active') throw new MembershipInactiveError();

  return { user, tenantId: user.tenantId, requestId };
}
