// server/src/services/userAccounts.ts
import { db } from '../db/db';
import { users } from '../db/schema';
import { hashPassword } from '../auth/password';

export type UserImportOutcome =
  | { status: 'created'; id: number }
  | { status: 'skipped' }
  | { status: 'exists' };

/**
 * Creates a login account. An existing username is never modified: it comes back
 * as `skipped` when `skipExisting` is set and as `exists` (an error) otherwise.
 */
export async function createUserAccount(
  username: string,
  password: string,
  skipExisting = true,
): Promise<UserImportOutcome> {
  const passwordHash = await hashPassword(password);

  const [row] = await db
    .insert(users)
    .values({ username, passwordHash })
    .onConflictDoNothing({ target: users.username })
    .returning({ id: users.id });

  if (row) return { status: 'created', id: row.id };
  return skipExisting ? { status: 'skipped' } : { status: 'exists' };
}
