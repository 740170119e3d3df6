import jwt, { Algorithm } from 'jsonwebtoken';
import { FastifyRequest } from 'fastify';
import { Identity, IdentityVerifier, Role, VerifyResult, isRole } from './types';
import { forbidden, unauthorized } from '../errors/app-error';
import { logger } from '../observability/logger';

const SUPPORTED_ALGORITHMS: readonly Algorithm[] = [
  'HS256', 'HS384', 'HS512', 'RS256', 'RS384', 'RS512', 'ES256', 'ES384', 'ES512',
];

function isAlgorithm(value: string): value is Algorithm {
  return SUPPORTED_ALGORITHMS.some((a) => a === value);
}

export interface JwtVerifierConfig {
  secret: string;
  issuer?: string;
  algorithms: string[];
}

/**
 * Verifies access tokens issued by the auth service. Tokens carry the user
 * name in `sub` and one of admin | manager | agent in `role`.
 */
export class JwtIdentityVerifier implements IdentityVerifier {
  private readonly algorithms: Algorithm[];
  private readonly log = logger.child({ component: 'identity-verifier' });

  constructor(private readonly config: JwtVerifierConfig) {
    this.algorithms = config.algorithms.filter(isAlgorithm);
    if (this.algorithms.length === 0) {
      throw new Error(`No supported JWT algorithm in: ${config.algorithms.join(', ')}`);
    }
  }

  verify(token: string | undefined): VerifyResult {
    if (!token) {
      return { ok: false, reason: 'missing_token', message: 'Missing authentication token' };
    }

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.config.secret, {
        algorithms: this.algorithms,
        ...(this.config.issuer ? { issuer: this.config.issuer } : {}),
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        this.log.debug({ expiredAt: err.expiredAt }, 'Access token expired');
        return { ok: false, reason: 'expired_token', message: 'Authentication token expired' };
      }
      const detail = err instanceof Error ? err.message : String(err);
      this.log.debug({ detail }, 'Access token rejected');
      return { ok: false, reason: 'invalid_token', message: 'Invalid authentication token' };
    }

    if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || !decoded.sub) {
      return { ok: false, reason: 'invalid_claims', message: 'Token has no subject' };
    }
    const role: unknown = decoded.role;
    if (!isRole(role)) {
      return { ok: false, reason: 'invalid_claims', message: 'Token has no recognised role' };
    }

    return { ok: true, identity: { subject: decoded.sub, role } };
  }
}

// ───── HTTP helpers ─────────────────────────────────────────────

/** Bearer token from the Authorization header, or `?token=` for WebSocket clients */
export function extractToken(
  headers: { authorization?: string },
  query?: URLSearchParams,
): string | undefined {
  const header = headers.authorization;
  if (header && header.toLowerCase().startsWith('bearer ')) {
    const value = header.slice(7).trim();
    if (value) return value;
  }
  return query?.get('token') || undefined;
}

/** A route that requires role R admits R and admin */
export function hasRole(identity: Identity, required: Role): boolean {
  return identity.role === required || identity.role === 'admin';
}

/**
 * Resolve the caller's identity for a REST request.
 * Throws Unauthorized / Forbidden AppErrors that the error handler maps.
 */
export function authenticate(
  verifier: IdentityVerifier,
  req: FastifyRequest,
  ...anyOf: Role[]
): Identity {
  const result = verifier.verify(extractToken(req.headers));
  if (!result.ok) throw unauthorized(result.message);

  if (anyOf.length > 0 && !anyOf.some((role) => hasRole(result.identity, role))) {
    throw forbidden();
  }
  return result.identity;
}
