import crypto from 'crypto';

/**
 * Compute a content hash for cache validation and symbol fingerprints.
 *
 * Returns the first 16 hex characters of the SHA-256 digest.
 */
export function hashContent(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex').slice(0, 16);
}
