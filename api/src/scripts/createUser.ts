/**
 * Provision a user and print its API key.
 *
 * There are no user endpoints; this is how accounts come to exist.
 *
 * Usage:
 *   cd api
 *   OLD_USERNAME=jdoe OLD_ROLE=contributor npx tsx src/scripts/createUser.ts
 *
 * Optional env:
 *   OLD_FIRST_NAME, OLD_LAST_NAME, OLD_EMAIL
 *   OLD_UNRESTRICTED=true     # May download restricted corpus files
 */

import 'dotenv/config';
import { z } from 'zod';
import { applySchema, closeDatabase, getDb } from '@/db/client';
import { createUser } from '@/services/user.service';
import { logger } from '@/utils/logger';

const inputSchema = z.object({
  OLD_USERNAME: z.string().trim().min(1, 'OLD_USERNAME is required'),
  OLD_ROLE: z.enum(['administrator', 'contributor', 'viewer']),
  OLD_FIRST_NAME: z.string().optional(),
  OLD_LAST_NAME: z.string().optional(),
  OLD_EMAIL: z.string().optional(),
  OLD_UNRESTRICTED: z.string().optional(),
});

function parseBooleanEnv(raw: string | undefined): boolean {
  if (raw === undefined) return false;
  return ['1', 'true', 'yes', 'y'].includes(raw.toLowerCase());
}

async function main(): Promise<void> {
  const input = inputSchema.parse(process.env);

  await applySchema();
  const { user, apiKey } = await createUser(getDb(), {
    username: input.OLD_USERNAME,
    role: input.OLD_ROLE,
    firstName: input.OLD_FIRST_NAME,
    lastName: input.OLD_LAST_NAME,
    email: input.OLD_EMAIL,
    unrestricted: parseBooleanEnv(input.OLD_UNRESTRICTED),
  });

  console.log(`Created ${user.role} ${user.username} (id ${user.id})`);
  console.log(`API key (shown once): ${apiKey}`);
}

main()
  .catch((error) => {
    logger.error('User creation failed', { error: String(error) });
    process.exitCode = 1;
  })
  .then(() => closeDatabase())
  .catch((error) => {
    logger.error('Failed to close database', { error: String(error) });
  });
