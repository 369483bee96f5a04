import { createHash } from 'node:crypto';

const FINGERPRINT_LENGTH = 12;

/**
 * Stable identity of a cluster across runs.
 *
 * Digit runs are masked before hashing so that ids, ports and counters
 * embedded in a message do not change the result. Not a security
 * boundary; truncation collisions are accepted at this scale.
 */
export function fingerprint(component: string | null, message: string | null): string {
  const base = `${component ?? ''}|${message ?? ''}`;
  const masked = base.replace(/\d+/g, '#');
  return createHash('sha256').update(masked, 'utf8').digest('hex').slice(0, FINGERPRINT_LENGTH);
}
