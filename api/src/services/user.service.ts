/**
 * User Service
 *
 * API-key lookup for authentication, mini representations for embedding in
 * other resources, and provisioning (there are no user endpoints).
 */

import { asc, desc, eq } from 'drizzle-orm';
import { users, type User, type UserMini, type UserRole } from '@/db/schema';
import type { Database } from '@/db/client';
import type { AuthUser } from '@/types/hono';
import { generateApiKey, hashApiKey } from '@/utils/crypto';
import { normalize } from '@/utils/text';
import { logger } from '@/utils/logger';

export interface CreateUserInput {
  username: string;
  firstName?: string;
  lastName?: string;
  email?: string;
  role: UserRole;
  unrestricted?: boolean;
}

export function toUserMini(user: Pick<User, 'id' | 'firstName' | 'lastName' | 'role'>): UserMini {
  return {
    id: user.id,
    first_name: user.firstName,
    last_name: user.lastName,
    role: user.role,
  };
}

export function toAuthUser(user: User): AuthUser {
  return {
    id: user.id,
    username: user.username,
    firstName: user.firstName,
    lastName: user.lastName,
    role: user.role,
    unrestricted: user.unrestricted,
  };
}

/**
 * Resolve the user owning an API key, or null
 */
export async function findUserByApiKey(db: Database, apiKey: string): Promise<AuthUser | null> {
  const [user] = await db
    .select()
    .from(users)
    .where(eq(users.apiKeyHash, hashApiKey(apiKey)))
    .limit(1);

  return user ? toAuthUser(user) : null;
}

/**
 * Create a user and return it with its raw API key
 */
export async function createUser(
  db: Database,
  input: CreateUserInput,
  apiKey?: string
): Promise<{ user: AuthUser; apiKey: string }> {
  const generated = apiKey ? { key: apiKey, hash: hashApiKey(apiKey) } : generateApiKey();

  const [user] = await db
    .insert(users)
    .values({
      username: normalize(input.username),
      firstName: normalize(input.firstName ?? ''),
      lastName: normalize(input.lastName ?? ''),
      email: input.email ?? '',
      role: input.role,
      unrestricted: input.unrestricted ?? false,
      apiKeyHash: generated.hash,
    })
    .returning();

  logger.info('User created', { userId: user.id, role: user.role });
  return { user: toAuthUser(user), apiKey: generated.key };
}

export async function listUserMinis(db: Database): Promise<UserMini[]> {
  const rows = await db.select().from(users).orderBy(asc(users.id));
  return rows.map(toUserMini);
}

export async function getLatestUserModification(db: Database): Promise<Date | null> {
  const [row] = await db
    .select({ datetimeModified: users.datetimeModified })
    .from(users)
    .orderBy(desc(users.datetimeModified))
    .limit(1);
  return row?.datetimeModified ?? null;
}
