import os from 'node:os';

/**
 * First non-internal IPv4 address of this host, so participants on the LAN
 * can reach it.
 */
export function resolveAuthorityAddress(override?: string): string {
  if (override) return override;
  const interfaces = os.networkInterfaces();
  for (const name of Object.keys(interfaces)) {
    for (const iface of interfaces[name] ?? []) {
      if (iface.family === 'IPv4' && !iface.internal) {
        return iface.address;
      }
    }
  }
  return '127.0.0.1';
}
