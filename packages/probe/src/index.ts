/**
 * @ipwatch/probe
 *
 * Local and public address detection
 */

export { PublicIpClient, DEFAULT_IP_SERVICES } from './public-ip-client.js';
export type { PublicIpClientConfig, ServiceFailure } from './public-ip-client.js';
export { detectLocalIp } from './local-ip.js';
export type { InterfaceTable } from './local-ip.js';
export { AddressProber } from './address-prober.js';
export type { AddressProberConfig } from './address-prober.js';
