import * as os from 'os';
import { describe, expect, it } from 'vitest';
import { detectLocalAddress, loadClientConfig } from './config.js';

describe('loadClientConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadClientConfig({ PEER_HOST: '10.0.0.5' })).toEqual({
      peerId: undefined,
      host: '10.0.0.5',
      port: 6000,
      trackerHost: '127.0.0.1',
      trackerPort: 5000,
      heartbeatIntervalMs: 60_000,
      requestTimeoutMs: 5_000,
    });
  });

  it('reads values from the environment', () => {
    const config = loadClientConfig({
      PEER_ID: 'alice',
      PEER_HOST: '10.0.0.5',
      PEER_PORT: '6001',
      TRACKER_HOST: 'tracker.local',
      TRACKER_PORT: '5050',
      HEARTBEAT_INTERVAL: '30',
      REQUEST_TIMEOUT: '2',
    });
    expect(config).toEqual({
      peerId: 'alice',
      host: '10.0.0.5',
      port: 6001,
      trackerHost: 'tracker.local',
      trackerPort: 5050,
      heartbeatIntervalMs: 30_000,
      requestTimeoutMs: 2_000,
    });
  });

  it('rejects bad values', () => {
    expect(() => loadClientConfig({ PEER_PORT: 'abc' })).toThrow(/Invalid client configuration/);
    expect(() => loadClientConfig({ PEER_ID: 'two words' })).toThrow(/Invalid client configuration/);
    expect(() => loadClientConfig({ HEARTBEAT_INTERVAL: '0' })).toThrow(/Invalid client configuration/);
  });
});

describe('detectLocalAddress', () => {
  const loopback: os.NetworkInterfaceInfo = {
    address: '127.0.0.1',
    netmask: '255.0.0.0',
    family: 'IPv4',
    mac: '00:00:00:00:00:00',
    internal: true,
    cidr: '127.0.0.1/8',
  };

  it('picks the first external IPv4 address', () => {
    const interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]> = {
      lo: [loopback],
      eth0: [
        {
          address: 'fe80::1',
          netmask: 'ffff:ffff:ffff:ffff::',
          family: 'IPv6',
          mac: '02:00:00:00:00:01',
          internal: false,
          cidr: 'fe80::1/64',
          scopeid: 2,
        },
        {
          address: '192.168.1.20',
          netmask: '255.255.255.0',
          family: 'IPv4',
          mac: '02:00:00:00:00:01',
          internal: false,
          cidr: '192.168.1.20/24',
        },
      ],
    };
    expect(detectLocalAddress(interfaces)).toBe('192.168.1.20');
  });

  it('falls back to loopback on an isolated host', () => {
    expect(detectLocalAddress({ lo: [loopback] })).toBe('127.0.0.1');
  });
});
