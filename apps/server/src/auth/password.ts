import { createHash, timingSafeEqual } from 'node:crypto';

function digest(text: string): Buffer {
  return createHash('sha256').update(text, 'utf8').digest();
}

/**
 * Compares a submitted password with the configured one in constant time.
 * Both sides are hashed first so inputs of different lengths compare too.
 */
export function passwordMatches(expected: string, candidate: string): boolean {
  return timingSafeEqual(digest(expected), digest(candidate));
}
