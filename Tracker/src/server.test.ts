import * as net from 'net';
import request from 'supertest';
import { io as connectMonitor, Socket as MonitorSocket } from 'socket.io-client';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MAX_COMMAND_LENGTH, TrackerServer } from './server.js';
import { IPeerSummary, TrackerResponse } from './types.js';

const LIVENESS_TIMEOUT = 300_000;

/** Sends raw bytes, optionally half-closes, and returns the parsed reply. */
function exchange(port: number, payload: string, halfClose = false): Promise<TrackerResponse> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: '127.0.0.1', port }, () => {
      if (halfClose) socket.end(payload);
      else socket.write(payload);
    });
    let data = '';
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => {
      data += chunk;
    });
    socket.on('end', () => {
      socket.end();
      try {
        const response: TrackerResponse = JSON.parse(data);
        resolve(response);
      } catch (error) {
        reject(error);
      }
    });
    socket.on('error', reject);
  });
}

const send = (port: number, line: string) => exchange(port, `${line}\n`);

describe('TrackerServer', () => {
  let now: number;
  let server: TrackerServer;

  beforeEach(async () => {
    now = 1_700_000_000_000;
    server = new TrackerServer({
      host: '127.0.0.1',
      port: 0,
      livenessTimeoutMs: LIVENESS_TIMEOUT,
      sweepIntervalMs: 60_000,
      clock: () => now,
    });
    await server.start();
  });

  afterEach(async () => {
    await server.stop();
  });

  it('answers each connection with one JSON line and closes it', async () => {
    expect(await send(server.port, 'REGISTER alice 127.0.0.1 6001')).toEqual({
      status: 'success',
      message: 'Peer registered successfully',
      peer_count: 1,
    });
  });

  it('accepts a command without a trailing newline when the client half-closes', async () => {
    expect(await exchange(server.port, 'GET_PEERS', true)).toEqual({ status: 'success', peers: [], peer_count: 0 });
  });

  it('does not wait for more input after a malformed line', async () => {
    expect(await send(server.port, 'REGISTER alice')).toEqual({
      status: 'error',
      message: 'Invalid format. Use: REGISTER <peer_id> <ip> <port>',
    });
  });

  it('rejects lines longer than the command limit', async () => {
    expect(await exchange(server.port, 'X'.repeat(MAX_COMMAND_LENGTH + 1))).toEqual({
      status: 'error',
      message: 'Command too long',
    });
  });

  it('rejects an over-long line even when its newline arrives with it', async () => {
    const padded = `REGISTER alice 127.0.0.1 6001${' '.repeat(MAX_COMMAND_LENGTH)}`;
    expect(await send(server.port, padded)).toEqual({ status: 'error', message: 'Command too long' });
    expect(await send(server.port, 'GET_PEERS')).toEqual({ status: 'success', peers: [], peer_count: 0 });
  });

  it('measures the command limit in bytes', async () => {
    // 2049 two-byte characters: under the limit in characters, over it in bytes
    const id = '\u00e9'.repeat(MAX_COMMAND_LENGTH / 2 + 1);
    expect(await send(server.port, `HEARTBEAT ${id}`)).toEqual({ status: 'error', message: 'Command too long' });
  });

  it('handles concurrent registrations without losing updates', async () => {
    const ids = Array.from({ length: 25 }, (_, i) => `peer-${i}`);
    const responses = await Promise.all(ids.map((id, i) => send(server.port, `REGISTER ${id} 127.0.0.1 ${7000 + i}`)));

    expect(responses.every(response => response.status === 'success')).toBe(true);
    const list = await send(server.port, 'GET_PEERS');
    expect(list.status).toBe('success');
    if (list.status === 'success') {
      expect(list.peer_count).toBe(25);
      expect(list.peers?.map(peer => peer.peer_id).sort()).toEqual([...ids].sort());
    }
  });

  it('lists peers until the liveness window passes, then sweeps them', async () => {
    await send(server.port, 'REGISTER alice 127.0.0.1 6001');
    await send(server.port, 'REGISTER bob 127.0.0.1 6002');

    const before = await send(server.port, 'GET_PEERS');
    expect(before).toMatchObject({ status: 'success', peer_count: 2 });
    if (before.status === 'success') {
      expect(before.peers).toEqual(
        expect.arrayContaining([
          { peer_id: 'alice', ip: '127.0.0.1', port: 6001 },
          { peer_id: 'bob', ip: '127.0.0.1', port: 6002 },
        ]),
      );
    }

    now += LIVENESS_TIMEOUT - 1;
    expect(await server.runSweep()).toEqual([]);
    expect(await send(server.port, 'GET_PEERS')).toMatchObject({ peer_count: 2 });

    now += 2;
    expect((await server.runSweep()).sort()).toEqual(['alice', 'bob']);
    expect(await send(server.port, 'GET_PEERS')).toEqual({ status: 'success', peers: [], peer_count: 0 });
  });

  it('keeps peers that heartbeat inside the window', async () => {
    await send(server.port, 'REGISTER alice 127.0.0.1 6001');
    now += LIVENESS_TIMEOUT - 1000;
    expect(await send(server.port, 'HEARTBEAT alice')).toEqual({ status: 'success', message: 'Heartbeat received' });
    now += 2000;

    expect(await server.runSweep()).toEqual([]);
    expect(await send(server.port, 'GET_PEERS')).toMatchObject({ peer_count: 1 });
  });

  it('tells an evicted peer to register again', async () => {
    await send(server.port, 'REGISTER alice 127.0.0.1 6001');
    now += LIVENESS_TIMEOUT + 1;
    await server.runSweep();

    expect(await send(server.port, 'HEARTBEAT alice')).toEqual({ status: 'error', message: 'Peer not found' });
  });

  it('exposes health, stats and the peer list over HTTP', async () => {
    await send(server.port, 'REGISTER alice 127.0.0.1 6001');
    await send(server.port, 'BOGUS');
    now += LIVENESS_TIMEOUT + 1;
    await server.runSweep();
    await send(server.port, 'REGISTER bob 127.0.0.1 6002');
    await exchange(server.port, 'X'.repeat(MAX_COMMAND_LENGTH + 1));

    const health = await request(server.app).get('/health');
    expect(health.status).toBe(200);
    expect(health.body.status).toBe('healthy');

    const stats = await request(server.app).get('/stats');
    expect(stats.body).toEqual({ totalPeers: 1, commandsHandled: 3, peersSwept: 1 });

    const peers = await request(server.app).get('/peers');
    expect(peers.body).toEqual({ peers: [{ peer_id: 'bob', ip: '127.0.0.1', port: 6002 }], peer_count: 1 });
  });
});

describe('TrackerServer monitor', () => {
  let server: TrackerServer;
  let monitor: MonitorSocket | undefined;

  beforeEach(async () => {
    server = new TrackerServer({ host: '127.0.0.1', port: 0, monitorPort: 0 });
    await server.start();
  });

  afterEach(async () => {
    monitor?.disconnect();
    await server.stop();
  });

  it('pushes the peer list to monitors when the registry changes', async () => {
    const updates: IPeerSummary[][] = [];
    monitor = connectMonitor(`http://127.0.0.1:${server.monitorPort}`, {
      transports: ['websocket'],
      reconnection: false,
    });
    const initial = new Promise<void>((resolve) => {
      monitor?.once('update_peer_list', () => resolve());
    });
    monitor.on('update_peer_list', (peers: IPeerSummary[]) => {
      updates.push(peers);
    });
    await initial;

    await send(server.port, 'REGISTER alice 127.0.0.1 6001');
    await vi.waitFor(() => expect(updates).toHaveLength(2));

    expect(updates[0]).toEqual([]);
    expect(updates[1]).toEqual([{ peer_id: 'alice', ip: '127.0.0.1', port: 6001 }]);
  });
});
