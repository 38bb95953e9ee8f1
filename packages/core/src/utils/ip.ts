/**
 * Address helpers
 */

import { isIP } from 'node:net';

/**
 * Canonical form used for comparisons: trimmed and lower-cased.
 * Lower-casing matters for IPv6 literals.
 */
export function normalizeIp(value: string): string {
  return value.trim().toLowerCase();
}

export function isValidIp(value: string): boolean {
  return isIP(value.trim()) !== 0;
}

/**
 * True for RFC 1918 IPv4 ranges (10/8, 172.16/12, 192.168/16)
 */
export function isPrivateIpv4(value: string): boolean {
  const parts = value.trim().split('.');
  if (parts.length !== 4 || isIP(value.trim()) !== 4) return false;

  const first = Number(parts[0]);
  const second = Number(parts[1]);
  return (
    first === 10 ||
    (first === 172 && second >= 16 && second <= 31) ||
    (first === 192 && second === 168)
  );
}

/**
 * Equality used by change detection.
 * Missing or blank values never equal anything.
 */
export function sameIp(a: string | null | undefined, b: string | null | undefined): boolean {
  if (!a || !b) return false;
  const left = normalizeIp(a);
  const right = normalizeIp(b);
  return left.length > 0 && left === right;
}
