import bcrypt from 'bcryptjs';
import { addDays, addSeconds, getUnixTime } from 'date-fns';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { Cradle } from '../config/container';
import type { BackendName } from '../types/models/Backend';
import type { Principal } from '../types/models/User';
import { ROLES } from '../types/permissions';
import { AuthError } from '../utils/errors';

export const TOKEN_LIFETIME_DAYS = 7;
export const SERVICE_CREDENTIAL_LIFETIME_SECONDS = 60;

const ALGORITHM = 'HS256';

const principalClaimsSchema = z.object({
  sub: z.string().min(1),
  org: z.string().min(1),
  role: z.enum(ROLES),
  iat: z.number().int(),
  exp: z.number().int(),
});

const serviceClaimsSchema = z.object({
  iss: z.string().min(1),
  aud: z.string().min(1),
  sub: z.string().min(1).optional(),
  org: z.string().min(1).optional(),
  role: z.enum(ROLES).optional(),
  iat: z.number().int(),
  exp: z.number().int(),
});

export interface IssuedToken {
  token: string;
  issuedAt: Date;
  expiresAt: Date;
}

export interface ServiceCredentialClaims {
  issuer: string;
  audience: string;
  principal: Principal | null;
}

/**
 * Translates jsonwebtoken's failures into the gateway's AuthError kinds.
 * jsonwebtoken checks the signature before the expiry, so a token signed with
 * another key is reported as Invalid even when it has also expired.
 */
function toAuthError(err: unknown): AuthError {
  if (err instanceof jwt.TokenExpiredError) {
    return new AuthError('Expired', 'Token has expired');
  }
  if (err instanceof jwt.JsonWebTokenError && err.message === 'invalid signature') {
    return new AuthError('Invalid', 'Token signature does not match the signing key');
  }
  if (err instanceof jwt.NotBeforeError) {
    return new AuthError('Invalid', 'Token is not active yet');
  }
  return new AuthError('Malformed', 'Token is malformed');
}

class CredentialService {
  private readonly jwtSecret: string;
  private readonly serviceSecret: string;
  private readonly issuer: string;
  private readonly bcryptRounds: number;

  constructor({ settings }: Pick<Cradle, 'settings'>) {
    this.jwtSecret = settings.jwtSecret;
    this.serviceSecret = settings.serviceSecret;
    this.issuer = settings.serviceName;
    this.bcryptRounds = settings.bcryptRounds;
  }

  issueToken(principal: Principal, now: Date = new Date()): IssuedToken {
    const expiresAt = addDays(now, TOKEN_LIFETIME_DAYS);
    const token = jwt.sign(
      {
        sub: principal.userId,
        org: principal.organizationId,
        role: principal.role,
        iat: getUnixTime(now),
        exp: getUnixTime(expiresAt),
      },
      this.jwtSecret,
      { algorithm: ALGORITHM }
    );

    return { token, issuedAt: now, expiresAt };
  }

  validateToken(token: string, now: Date = new Date()): Principal {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.jwtSecret, {
        algorithms: [ALGORITHM],
        clockTimestamp: getUnixTime(now),
      });
    } catch (err) {
      throw toAuthError(err);
    }

    const claims = principalClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new AuthError('Malformed', 'Token claims are incomplete');
    }

    return {
      userId: claims.data.sub,
      organizationId: claims.data.org,
      role: claims.data.role,
    };
  }

  /**
   * Short-lived credential proving a backend call comes from this gateway. It is
   * signed with the service secret, never with the user-token key, and is only
   * valid for the backend named in `aud`.
   */
  issueServiceCredential(service: BackendName, principal: Principal | null, now: Date = new Date()): string {
    return jwt.sign(
      {
        iss: this.issuer,
        aud: service,
        ...(principal ? { sub: principal.userId, org: principal.organizationId, role: principal.role } : {}),
        iat: getUnixTime(now),
        exp: getUnixTime(addSeconds(now, SERVICE_CREDENTIAL_LIFETIME_SECONDS)),
      },
      this.serviceSecret,
      { algorithm: ALGORITHM }
    );
  }

  /**
   * Verification step run by a backend on the X-Service-Token header.
   */
  verifyServiceCredential(credential: string, service: BackendName, now: Date = new Date()): ServiceCredentialClaims {
    let decoded: unknown;
    try {
      decoded = jwt.verify(credential, this.serviceSecret, {
        algorithms: [ALGORITHM],
        audience: service,
        issuer: this.issuer,
        clockTimestamp: getUnixTime(now),
      });
    } catch (err) {
      if (
        err instanceof jwt.JsonWebTokenError &&
        (err.message.startsWith('jwt audience invalid') || err.message.startsWith('jwt issuer invalid'))
      ) {
        throw new AuthError('Invalid', `Service credential was not issued for ${service}`);
      }
      throw toAuthError(err);
    }

    const claims = serviceClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new AuthError('Malformed', 'Service credential claims are incomplete');
    }

    const { sub, org, role } = claims.data;
    return {
      issuer: claims.data.iss,
      audience: claims.data.aud,
      principal: sub && org && role ? { userId: sub, organizationId: org, role } : null,
    };
  }

  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.bcryptRounds);
  }

  async verifyPassword(password: string, passwordHash: string): Promise<boolean> {
    return bcrypt.compare(password, passwordHash);
  }
}

export default CredentialService;
