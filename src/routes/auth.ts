// server/src/routes/auth.ts

import { Request, Response, Express } from 'express';
import { eq } from 'drizzle-orm';
import { z } from 'zod';
import { db } from '../db/db';
import { users } from '../db/schema';
import { createAccessToken } from '../auth/jwt';
import { hashPassword, verifyPassword } from '../auth/password';
import { verifyToken } from '../middleware/verifyToken';
import { AuthError } from '../lib/errors';
import { sendError, zodDetails } from '../lib/respond';

const loginSchema = z.object({
  username: z.string().trim().min(1, 'Username is required').max(50),
  password: z.string().min(6, 'Password must be at least 6 characters'),
});

const changePasswordSchema = z.object({
  currentPassword: z.string().min(1, 'Current password is required'),
  newPassword: z.string().min(6, 'New password must be at least 6 characters'),
});

// --------------------------------------------------
// ROUTES
// --------------------------------------------------
export default function setupAuthRoutes(app: Express) {
  // --------------------------------------------------
  // LOGIN
  // --------------------------------------------------
  app.post('/api/auth/login', async (req: Request, res: Response) => {
    try {
      const parsed = loginSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({
          success: false,
          error: 'Username and password are required',
          details: zodDetails(parsed.error),
        });
      }
      const { username, password } = parsed.data;

      const [row] = await db
        .select({ username: users.username, passwordHash: users.passwordHash })
        .from(users)
        .where(eq(users.username, username))
        .limit(1);

      // same answer for unknown user and wrong password
      if (!row || !(await verifyPassword(password, row.passwordHash))) {
        throw new AuthError('Invalid username or password');
      }

      const accessToken = createAccessToken(row.username);
      console.log(`🔑 ${row.username} logged in`);

      return res.json({
        success: true,
        accessToken,
        tokenType: 'bearer',
      });
    } catch (error) {
      return sendError(res, error, 'Login');
    }
  });

  // --------------------------------------------------
  // CURRENT USER
  // --------------------------------------------------
  app.get('/api/auth/me', verifyToken, (req: Request, res: Response) => {
    if (!req.user) {
      return res.status(401).json({ success: false, error: 'Access token is missing' });
    }
    return res.json({ success: true, data: req.user });
  });

  // --------------------------------------------------
  // CHANGE PASSWORD
  // --------------------------------------------------
  app.post('/api/auth/change-password', verifyToken, async (req: Request, res: Response) => {
    try {
      const tokenUser = req.user;
      if (!tokenUser) throw new AuthError('Access token is missing');

      const { currentPassword, newPassword } = changePasswordSchema.parse(req.body);

      const [row] = await db
        .select({ id: users.id, passwordHash: users.passwordHash })
        .from(users)
        .where(eq(users.id, tokenUser.id))
        .limit(1);

      if (!row || !(await verifyPassword(currentPassword, row.passwordHash))) {
        throw new AuthError('Current password is incorrect');
      }

      await db
        .update(users)
        .set({ passwordHash: await hashPassword(newPassword), updatedAt: new Date() })
        .where(eq(users.id, row.id));

      console.log(`🔑 Password changed for ${tokenUser.username}`);
      return res.json({ success: true, message: 'Password updated' });
    } catch (error) {
      return sendError(res, error, 'Change password');
    }
  });

  console.log('✅ Auth routes loaded');
}
