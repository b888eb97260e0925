import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createUserAccount } from '../userAccounts';
import { verifyPassword } from '../../auth/password';

// Usernames already taken; inserts into them change nothing
const store = vi.hoisted(() => ({
  taken: new Map<string, string>(),
  nextId: 1,
}));

vi.mock('../../db/db', () => ({
  db: {
    insert: () => ({
      values: (row: { username: string; passwordHash: string }) => ({
        onConflictDoNothing: () => ({
          returning: async () => {
            if (store.taken.has(row.username)) return [];
            store.taken.set(row.username, row.passwordHash);
            return [{ id: store.nextId++ }];
          },
        }),
      }),
    }),
  },
}));

describe('createUserAccount', () => {
  beforeEach(() => {
    store.taken = new Map([['alice', 'stored-hash']]);
    store.nextId = 1;
  });

  it('creates a new account with a hashed password', async () => {
    await expect(createUserAccount('bob', 'secret1')).resolves.toEqual({ status: 'created', id: 1 });
    const hash = store.taken.get('bob') ?? '';
    expect(await verifyPassword('secret1', hash)).toBe(true);
  });

  it('skips an existing user by default', async () => {
    await expect(createUserAccount('alice', 'secret1')).resolves.toEqual({ status: 'skipped' });
    expect(store.taken.get('alice')).toBe('stored-hash');
  });

  it('reports an existing user without touching its password when not skipping', async () => {
    await expect(createUserAccount('alice', 'secret1', false)).resolves.toEqual({ status: 'exists' });
    expect(store.taken.get('alice')).toBe('stored-hash');
  });
});
