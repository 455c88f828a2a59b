/**
 * Cryptographic Utilities
 *
 * API key generation and hashing
 */

import crypto from 'crypto';

/**
 * Generate an API key for a user
 *
 * Format: old_{random}, 32 random bytes as hex.
 * Only the SHA-256 hash is stored; the raw key is shown once.
 */
export function generateApiKey(): { key: string; hash: string } {
  const key = `old_${crypto.randomBytes(32).toString('hex')}`;
  return { key, hash: hashApiKey(key) };
}

/**
 * Hash an API key with SHA-256 (hex)
 *
 * API keys are high-entropy, so a fast hash is enough for lookup.
 */
export function hashApiKey(key: string): string {
  return crypto.createHash('sha256').update(key).digest('hex');
}
