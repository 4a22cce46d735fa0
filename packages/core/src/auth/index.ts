import type { OtpPurpose, UserRole } from '@expensox/shared';

export interface AuthUser {
  id: string;
  email: string;
  name: string;
  tenantId: string;
  role: UserRole;
  managerId: string | null;
  tenantStatus: string;
  membershipStatus: string;
}

export interface AccessToken {
  accessToken: string;
  expiresIn: number;
}

export type SignInResult =
  | ({ status: 'authenticated'; userId: string } & AccessToken)
  | { status: 'otp_required'; userId: string; purpose: OtpPurpose; expiresAt: string };

export interface AuthAdapter {
  validateToken(token: string): Promise<AuthUser | null>;
  signIn(email: string, password: string): Promise<SignInResult>;
  completeOtpSignIn(userId: string, purpose: OtpPurpose, code: string): Promise<AccessToken>;
  resendOtp(userId: string, purpose: OtpPurpose): Promise<{ expiresAt: string }>;
  requestPasswordReset(email: string): Promise<void>;
  resetPassword(email: string, code: string, newPassword: string): Promise<void>;
}

export { LocalAuthAdapter } from './local-adapter';
export { getAuthAdapter, setAuthAdapter } from './get-adapter';
export { requestContext, getRequestContext } from './context';
export type { RequestContext } from './context';
export { authenticate, resolveTenant } from './middleware';
export { withMiddleware, withPublicMiddleware } from './with-middleware';
export type { RouteHandler, PublicRouteHandler, MiddlewareOptions } from './with-middleware';
