import { networkInterfaces, type NetworkInterfaceInfo } from 'os';
import { isPrivateIpv4 } from '@ipwatch/core';

export type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

/**
 * First non-internal IPv4 address, preferring RFC 1918 ranges.
 */
export function detectLocalIp(interfaces: InterfaceTable = networkInterfaces()): string | undefined {
  let fallback: string | undefined;

  for (const infos of Object.values(interfaces)) {
    for (const info of infos ?? []) {
      if (info.internal || info.family !== 'IPv4') continue;
      if (isPrivateIpv4(info.address)) return info.address;
      fallback ??= info.address;
    }
  }

  return fallback;
}
