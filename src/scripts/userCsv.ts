// server/src/scripts/userCsv.ts
import Papa from 'papaparse';

export interface UserCredentials {
  username: string;
  password: string;
}

export interface ParsedUserCsv {
  users: UserCredentials[];
  errors: { row: number; message: string }[];
}

const REQUIRED_COLUMNS = ['username', 'password'] as const;

/** Why a username/password pair cannot be imported, or null when it can. */
export function credentialProblem(username: string, password: string): string | null {
  if (!username || username.length > 50) return 'username must be 1-50 characters';
  if (password.length < 6) return `password for ${username} must be at least 6 characters`;
  return null;
}

/**
 * Reads a CSV with a `username` and a `password` column, in any order.
 * `row` in errors is the data row number counting the header as row 1.
 * Throws when either column is missing.
 */
export function parseUserCsv(text: string): ParsedUserCsv {
  const parsed = Papa.parse<Partial<Record<string, string>>>(text, {
    header: true,
    skipEmptyLines: 'greedy',
    comments: '#',
    transformHeader: (h) => h.replace(/^\uFEFF/, '').trim().toLowerCase(),
  });

  const fields = parsed.meta.fields ?? [];
  const missing = REQUIRED_COLUMNS.filter((c) => !fields.includes(c));
  if (missing.length > 0) {
    throw new Error(`CSV must have 'username' and 'password' columns; missing: ${missing.join(', ')}`);
  }

  const result: ParsedUserCsv = { users: [], errors: [] };
  parsed.data.forEach((record, i) => {
    const row = i + 2;
    const username = record.username?.trim() ?? '';
    const password = record.password?.trim() ?? '';

    const problem = credentialProblem(username, password);
    if (problem) {
      result.errors.push({ row, message: problem });
      return;
    }
    result.users.push({ username, password });
  });

  return result;
}
