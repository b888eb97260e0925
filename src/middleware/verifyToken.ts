// server/src/middleware/verifyToken.ts
import { Request, Response, NextFunction } from 'express';
import { eq } from 'drizzle-orm';
import { db } from '../db/db';
import { users } from '../db/schema';
import { decodeAccessToken } from '../auth/jwt';
import { AuthError } from '../lib/errors';

export interface AuthUser {
  id: number;
  username: string;
  createdAt: Date;
  updatedAt: Date;
}

/** `Bearer <token>` → token, or throws AuthError. */
export function extractBearerToken(header: string | undefined): string {
  if (!header) throw new AuthError('Access token is missing');

  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2) throw new AuthError('Authorization header must be: Bearer <token>');

  const [scheme, token] = parts;
  if (scheme.toLowerCase() !== 'bearer') throw new AuthError('Authorization scheme must be Bearer');
  return token;
}

export async function authenticate(header: string | undefined): Promise<AuthUser> {
  const token = extractBearerToken(header);

  const payload = decodeAccessToken(token);
  if (!payload) throw new AuthError('Token is invalid or expired');

  const [user] = await db
    .select({
      id: users.id,
      username: users.username,
      createdAt: users.createdAt,
      updatedAt: users.updatedAt,
    })
    .from(users)
    .where(eq(users.username, payload.sub))
    .limit(1);

  if (!user) throw new AuthError('User not found');
  return user;
}

// --------------------------------------------------
// JWT Verification Middleware
// --------------------------------------------------
export const verifyToken = async (req: Request, res: Response, next: NextFunction) => {
  try {
    req.user = await authenticate(req.headers['authorization']);
    next();
  } catch (error) {
    if (error instanceof AuthError) {
      return res.status(error.statusCode).json({ success: false, error: error.message });
    }
    next(error);
  }
};
