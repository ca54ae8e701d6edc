import { lookup } from 'node:dns/promises';
import type { ConnectivityCheck } from './types';

/**
 * Connectivity check that resolves the given hostname through DNS.
 *
 * A failed lookup (no resolver, no route, unknown host) counts as offline.
 */
export function createDnsConnectivityCheck(): ConnectivityCheck {
  return async (hostname) => {
    try {
      await lookup(hostname);
      return true;
    } catch {
      return false;
    }
  };
}
