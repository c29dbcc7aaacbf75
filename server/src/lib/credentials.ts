import { createHash, timingSafeEqual } from 'node:crypto';
import { customAlphabet } from 'nanoid';

const CODE_ALPHABET = '23456789ABCDEFGHJKLMNPQRSTUVWXYZ';
const PASSWORD_ALPHABET = '23456789abcdefghijkmnpqrstuvwxyzABCDEFGHJKLMNPQRSTUVWXYZ';

export function createCodeGenerator(length: number): () => string {
  return customAlphabet(CODE_ALPHABET, length);
}

export function createPasswordGenerator(length: number): () => string {
  return customAlphabet(PASSWORD_ALPHABET, length);
}

/**
 * Compares two secrets in time independent of where they differ.
 * Both sides are hashed first so differing lengths take the same path.
 */
export function safeEqual(candidate: string, expected: string): boolean {
  const a = createHash('sha256').update(candidate).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}
