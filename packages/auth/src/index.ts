import { SignJWT, jwtVerify, decodeJwt } from 'jose';
import { Config } from '@quorum/shared-types';

// ── Caller Token (host → engine) ────────────────────────────────────────

export interface CallerTokenPayload {
  sub: string;        // caller identity
  iat?: number;
  exp?: number;
}

export async function signCallerToken(
  identity: string,
  secret: string,
  expiresIn: string | number = Config.auth.tokenExpiry,
): Promise<string> {
  const key = new TextEncoder().encode(secret);
  return new SignJWT({})
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(identity)
    .setIssuedAt()
    .setExpirationTime(expiresIn)
    .sign(key);
}

export async function verifyCallerToken(
  token: string,
  secret: string,
): Promise<CallerTokenPayload> {
  const key = new TextEncoder().encode(secret);
  const { payload } = await jwtVerify(token, key, { algorithms: ['HS256'] });
  if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
    throw new Error('Caller token has no subject');
  }
  return { sub: payload.sub, iat: payload.iat, exp: payload.exp };
}

/** Decode without verification — for display only */
export function decodeCallerToken(token: string): Partial<CallerTokenPayload> {
  const { sub, iat, exp } = decodeJwt(token);
  return { sub, iat, exp };
}
