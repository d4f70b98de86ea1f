import { createHash, randomBytes, timingSafeEqual } from 'crypto';

/**
 * Generate a SHA-256 hash of a string
 */
export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * First 8 hex characters of the MD5 digest, used as a short id suffix
 */
export function shortMd5(input: string): string {
  return createHash('md5').update(input).digest('hex').substring(0, 8);
}

/**
 * Generate an opaque bearer token: `<prefix>_<base64url>`
 */
export function generateToken(prefix: string, bytes = 24): string {
  return `${prefix}_${randomBytes(bytes).toString('base64url')}`;
}

/**
 * Constant-time string comparison
 */
export function constantTimeEquals(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}
