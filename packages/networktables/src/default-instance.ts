/**
 * Process-wide table instance: an NT4 connection when NT_TEAM or NT_SERVER
 * is set, otherwise an in-process instance
 */

import { getConfig } from '@llvision/shared';
import { LocalNetworkTableInstance } from './local-network-table.js';
import { connectNetworkTables } from './nt4-client.js';
import type { NetworkTableInstance } from './types.js';

// Singleton default instance
let defaultInstance: NetworkTableInstance | null = null;

export function getDefaultInstance(): NetworkTableInstance {
  if (!defaultInstance) {
    const { networkTables } = getConfig();
    defaultInstance =
      networkTables.team === undefined && networkTables.server === undefined
        ? new LocalNetworkTableInstance()
        : connectNetworkTables(networkTables);
  }
  return defaultInstance;
}

// For testing - close the default instance and replace it on next access
export function resetDefaultInstance(): void {
  defaultInstance?.close();
  defaultInstance = null;
}
