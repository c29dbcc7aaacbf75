import { safeEqual } from './credentials.js';

const LOOPBACK = new Set(['127.0.0.1', '::1', 'localhost']);

export function isLoopback(address: string): boolean {
  return LOOPBACK.has(address) || address.startsWith('127.');
}

export function bearerToken(header: string | undefined): string | undefined {
  if (!header?.startsWith('Bearer ')) return undefined;
  const token = header.slice('Bearer '.length).trim();
  return token.length > 0 ? token : undefined;
}

/**
 * With a configured token the caller must present it; without one only
 * callers on this machine are the authority.
 */
export function isAuthority(
  expectedToken: string | undefined,
  presentedToken: string | undefined,
  remoteAddress: string,
): boolean {
  if (!expectedToken) {
    return isLoopback(remoteAddress);
  }
  return presentedToken !== undefined && safeEqual(presentedToken, expectedToken);
}
