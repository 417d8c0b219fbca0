import { timingSafeEqual } from 'crypto';

/**
 * Constant-time string comparison for shared secrets
 */
export function secureCompare(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');

  if (left.length !== right.length) {
    // Keep timing independent of where the mismatch is
    timingSafeEqual(left, left);
    return false;
  }

  return timingSafeEqual(left, right);
}
