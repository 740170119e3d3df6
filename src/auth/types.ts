export const ROLES = ['admin', 'manager', 'agent'] as const;

export type Role = (typeof ROLES)[number];

export interface Identity {
  subject: string;
  role: Role;
}

export type AuthFailureReason = 'missing_token' | 'invalid_token' | 'expired_token' | 'invalid_claims';

export type VerifyResult =
  | { ok: true; identity: Identity }
  | { ok: false; reason: AuthFailureReason; message: string };

export interface IdentityVerifier {
  verify(token: string | undefined): VerifyResult;
}

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some((r) => r === value);
}
