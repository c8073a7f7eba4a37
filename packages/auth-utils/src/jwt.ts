import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config, jwtExpirySeconds } from '@stockroom/config';
import { USER_ROLES, type UserRole } from '@stockroom/shared-types';

const TOKEN_ISSUER = 'stockroom';

export interface JwtPayload {
  sub: string;
  username: string;
  role: UserRole;
}

const payloadSchema = z.object({
  sub: z.string().min(1),
  username: z.string().min(1),
  role: z.enum(USER_ROLES),
});

export function generateAccessToken(payload: JwtPayload): string {
  return jwt.sign(
    { sub: payload.sub, username: payload.username, role: payload.role },
    config.JWT_SECRET,
    { expiresIn: jwtExpirySeconds, issuer: TOKEN_ISSUER },
  );
}

/**
 * Verify signature, issuer and expiry, then check the claims carry a known
 * role. Throws on any failure.
 */
export function verifyAccessToken(token: string): JwtPayload {
  const decoded = jwt.verify(token, config.JWT_SECRET, { issuer: TOKEN_ISSUER });
  const parsed = payloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new jwt.JsonWebTokenError('Token claims are malformed');
  }
  return parsed.data;
}
