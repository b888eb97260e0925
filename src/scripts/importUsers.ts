// server/src/scripts/importUsers.ts
// Usage:
//   npm run users:import -- --username alice --password secret1
//   npm run users:import -- --file users.csv [--no-skip-existing]
// --no-skip-existing reports users that already exist as errors instead of skipping them.
import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import { pool } from '../db/db';
import { createUserAccount } from '../services/userAccounts';
import { credentialProblem, parseUserCsv, UserCredentials } from './userCsv';

async function loadCredentials(): Promise<{ list: UserCredentials[]; skipExisting: boolean; invalid: number }> {
  const { values } = parseArgs({
    options: {
      username: { type: 'string', short: 'u' },
      password: { type: 'string', short: 'p' },
      file: { type: 'string', short: 'f' },
      'no-skip-existing': { type: 'boolean', default: false },
    },
  });
  const skipExisting = !values['no-skip-existing'];

  if (values.file) {
    const { users: list, errors } = parseUserCsv(await readFile(values.file, 'utf8'));
    for (const e of errors) console.error(`✗ row ${e.row}: ${e.message}`);
    return { list, skipExisting, invalid: errors.length };
  }

  if (values.username !== undefined && values.password !== undefined) {
    const username = values.username.trim();
    const problem = credentialProblem(username, values.password);
    if (problem) {
      console.error(`✗ ${problem}`);
      return { list: [], skipExisting, invalid: 1 };
    }
    return { list: [{ username, password: values.password }], skipExisting, invalid: 0 };
  }

  throw new Error('Pass --username and --password, or --file <users.csv>');
}

async function main() {
  const { list, skipExisting, invalid } = await loadCredentials();
  let created = 0;
  let skipped = 0;
  let failed = invalid;

  for (const { username, password } of list) {
    try {
      const outcome = await createUserAccount(username, password, skipExisting);
      if (outcome.status === 'created') {
        console.log(`✓ ${username} (id ${outcome.id})`);
        created++;
      } else if (outcome.status === 'skipped') {
        console.log(`⊘ ${username} already exists, skipped`);
        skipped++;
      } else {
        console.error(`✗ ${username} already exists`);
        failed++;
      }
    } catch (err) {
      console.error(`✗ ${username}:`, err instanceof Error ? err.message : err);
      failed++;
    }
  }

  console.log(`\nDone: ${created} created, ${skipped} skipped, ${failed} failed`);
  if (failed > 0) process.exitCode = 1;
}

main()
  .catch((err: unknown) => {
    console.error('❌ User import failed:', err);
    process.exitCode = 1;
  })
  .finally(() => pool.end());
