// server/src/auth/password.ts
import crypto from 'crypto';
import bcrypt from 'bcryptjs';

const SALT_ROUNDS = 12;

// bcrypt reads at most 72 bytes of input
function preHash(password: string): string {
  return crypto.createHash('sha256').update(password, 'utf8').digest('base64');
}

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(preHash(password), SALT_ROUNDS);
}

export async function verifyPassword(password: string, passwordHash: string): Promise<boolean> {
  return bcrypt.compare(preHash(password), passwordHash);
}
