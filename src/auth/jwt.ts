// server/src/auth/jwt.ts
import jwt from 'jsonwebtoken';
import { getConfig } from '../config/env';

export interface AccessTokenPayload {
  sub: string; // username
}

export function createAccessToken(username: string, expiresInMinutes = getConfig().jwtExpiresInMinutes): string {
  return jwt.sign({ sub: username }, getConfig().jwtSecret, {
    algorithm: 'HS256',
    expiresIn: expiresInMinutes * 60,
  });
}

/** Returns null when the token is malformed, expired, or signed with another secret. */
export function decodeAccessToken(token: string): AccessTokenPayload | null {
  try {
    const decoded = jwt.verify(token, getConfig().jwtSecret, { algorithms: ['HS256'] });
    if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || decoded.sub === '') {
      return null;
    }
    return { sub: decoded.sub };
  } catch (err) {
    if (err instanceof jwt.JsonWebTokenError) return null; // includes TokenExpiredError
    throw err;
  }
}
