import { afterEach, describe, expect, it, vi } from 'vitest';
import type { NetworkInterfaceInfo } from 'node:os';
import { WatchError, fixedClock } from '@ipwatch/core';
import { PublicIpClient } from '../src/public-ip-client.js';
import { detectLocalIp } from '../src/local-ip.js';
import { AddressProber } from '../src/address-prober.js';

function ipv4(address: string, internal = false): NetworkInterfaceInfo {
  return {
    address,
    netmask: '255.255.255.0',
    family: 'IPv4',
    mac: '00:00:00:00:00:00',
    internal,
    cidr: `${address}/24`,
  };
}

function ipv6(address: string): NetworkInterfaceInfo {
  return {
    address,
    netmask: 'ffff:ffff:ffff:ffff::',
    family: 'IPv6',
    mac: '00:00:00:00:00:00',
    internal: false,
    cidr: `${address}/64`,
    scopeid: 0,
  };
}

function textResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/plain' } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('detectLocalIp', () => {
  it('prefers private addresses over public ones', () => {
    const ip = detectLocalIp({
      lo: [ipv4('127.0.0.1', true)],
      eth0: [ipv6('fe80::1'), ipv4('203.0.113.5')],
      wlan0: [ipv4('192.168.1.23')],
    });
    expect(ip).toBe('192.168.1.23');
  });

  it('falls back to the first external IPv4 address', () => {
    expect(detectLocalIp({ eth0: [ipv4('203.0.113.5')], eth1: [ipv4('198.51.100.7')] })).toBe('203.0.113.5');
  });

  it('returns undefined with only loopback and IPv6', () => {
    expect(detectLocalIp({ lo: [ipv4('127.0.0.1', true)], eth0: [ipv6('fe80::1')], tun0: undefined })).toBeUndefined();
  });
});

describe('PublicIpClient', () => {
  it('returns the trimmed answer of the first service', async () => {
    const fetchMock = vi.fn(async () => textResponse('203.0.113.9\n'));
    vi.stubGlobal('fetch', fetchMock);

    const client = new PublicIpClient({ services: ['https://a.example', 'https://b.example'] });

    expect(await client.getPublicIp()).toBe('203.0.113.9');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://a.example',
      expect.objectContaining({
        method: 'GET',
        headers: expect.objectContaining({ 'User-Agent': 'ipwatch/1.0' }),
      })
    );
  });

  it('falls through failing services', async () => {
    const fetchMock = vi
      .fn<(url: string) => Promise<Response>>()
      .mockResolvedValueOnce(textResponse('busy', 503))
      .mockResolvedValueOnce(textResponse('<html>hello</html>'))
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(textResponse('2001:db8::7'));
    vi.stubGlobal('fetch', fetchMock);

    const client = new PublicIpClient({
      services: ['https://a.example', 'https://b.example', 'https://c.example', 'https://d.example'],
    });

    expect(await client.getPublicIp()).toBe('2001:db8::7');
    expect(fetchMock).toHaveBeenCalledTimes(4);
  });

  it('reports every failure when all services fail', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => textResponse('nope', 500)));

    const client = new PublicIpClient({ services: ['https://a.example', 'https://b.example'] });

    const err = await client.getPublicIp().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(WatchError);
    expect(err).toMatchObject({
      code: 'PROBE_FAILED',
      message: 'All public IP services failed: https://a.example (HTTP 500); https://b.example (HTTP 500)',
      context: {
        failures: [
          { service: 'https://a.example', error: 'HTTP 500' },
          { service: 'https://b.example', error: 'HTTP 500' },
        ],
      },
    });
  });

  it('aborts a service that does not answer in time', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      )
    );

    const client = new PublicIpClient({ services: ['https://slow.example'], timeoutMs: 20 });

    await expect(client.getPublicIp()).rejects.toThrow(
      'All public IP services failed: https://slow.example (timed out after 20ms)'
    );
  });
});

describe('AddressProber', () => {
  it('combines local and public addresses', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => textResponse('203.0.113.9')));
    const clock = fixedClock('2026-03-01T09:00:00.000Z');

    const prober = new AddressProber({
      publicIpClient: new PublicIpClient({ services: ['https://a.example'] }),
      interfaces: () => ({ eth0: [ipv4('10.0.0.4')] }),
      clock,
    });

    expect(await prober.probe()).toEqual({
      local: '10.0.0.4',
      public: '203.0.113.9',
      observedAt: new Date('2026-03-01T09:00:00.000Z'),
    });
  });

  it('skips lookups that are switched off', async () => {
    const fetchMock = vi.fn(async () => textResponse('203.0.113.9'));
    vi.stubGlobal('fetch', fetchMock);

    const prober = new AddressProber({
      checkPublicIp: false,
      interfaces: () => ({ eth0: [ipv4('10.0.0.4')] }),
    });
    const snapshot = await prober.probe();

    expect(snapshot.public).toBeUndefined();
    expect(snapshot.local).toBe('10.0.0.4');
    expect(fetchMock).not.toHaveBeenCalled();

    const publicOnly = await new AddressProber({
      checkLocalIp: false,
      publicIpClient: new PublicIpClient({ services: ['https://a.example'] }),
    }).probe();
    expect(publicOnly.local).toBeUndefined();
    expect(publicOnly.public).toBe('203.0.113.9');
  });
});
