/**
 * Hono Type Extensions
 *
 * Custom types for Hono context variables
 */

import type { UserRole } from '@/db/schema';

/**
 * Authenticated caller, resolved from the API key
 */
export interface AuthUser {
  id: number;
  username: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  unrestricted: boolean;
}

/**
 * Environment variables for Hono context
 */
export type HonoEnv = {
  Variables: {
    user?: AuthUser;
  };
};
