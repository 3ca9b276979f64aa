import * as net from 'net';
import { afterEach, describe, expect, it } from 'vitest';
import { sendTrackerCommand } from './trackerConnection.js';

describe('sendTrackerCommand', () => {
  let server: net.Server | undefined;
  let sockets: net.Socket[] = [];

  // A fake tracker; `reply` returns what to write back, or null to stay silent.
  async function fakeTracker(reply: (line: string) => string | null): Promise<number> {
    sockets = [];
    const tracker = net.createServer((socket) => {
      sockets.push(socket);
      socket.setEncoding('utf8');
      let buffer = '';
      socket.on('data', (chunk: string) => {
        buffer += chunk;
        const newline = buffer.indexOf('\n');
        if (newline === -1) return;
        const body = reply(buffer.slice(0, newline));
        if (body !== null) socket.end(body);
      });
      socket.on('error', () => undefined);
    });
    server = tracker;
    await new Promise<void>((resolve) => tracker.listen(0, '127.0.0.1', () => resolve()));
    const address = tracker.address();
    return address !== null && typeof address === 'object' ? address.port : 0;
  }

  afterEach(async () => {
    sockets.forEach((socket) => socket.destroy());
    const running = server;
    server = undefined;
    if (running?.listening) {
      await new Promise<void>((resolve) => running.close(() => resolve()));
    }
  });

  it('sends the command line and parses the reply', async () => {
    const lines: string[] = [];
    const port = await fakeTracker((line) => {
      lines.push(line);
      return '{"status":"success","peer_count":1,"peers":[{"peer_id":"alice","ip":"127.0.0.1","port":6001}]}\n';
    });

    const reply = await sendTrackerCommand({ host: '127.0.0.1', port }, 'GET_PEERS', 2000);

    expect(lines).toEqual(['GET_PEERS']);
    expect(reply).toEqual({
      status: 'success',
      peer_count: 1,
      peers: [{ peer_id: 'alice', ip: '127.0.0.1', port: 6001 }],
    });
  });

  it('rejects a reply that is not JSON', async () => {
    const port = await fakeTracker(() => 'OK\n');
    await expect(sendTrackerCommand({ host: '127.0.0.1', port }, 'GET_PEERS', 2000)).rejects.toMatchObject({
      code: 'INVALID_RESPONSE',
      context: { command: 'GET_PEERS' },
    });
  });

  it('rejects an error reply without a message', async () => {
    const port = await fakeTracker(() => '{"status":"error"}\n');
    await expect(sendTrackerCommand({ host: '127.0.0.1', port }, 'HEARTBEAT alice', 2000)).rejects.toMatchObject({
      code: 'INVALID_RESPONSE',
    });
  });

  it('gives up on a tracker that never answers', async () => {
    const port = await fakeTracker(() => null);
    await expect(sendTrackerCommand({ host: '127.0.0.1', port }, 'GET_PEERS', 100)).rejects.toMatchObject({
      code: 'TRACKER_UNREACHABLE',
      message: `Tracker at 127.0.0.1:${port} did not answer within 100ms`,
    });
  });

  it('reports a refused connection as unreachable', async () => {
    const port = await fakeTracker(() => null);
    const running = server;
    server = undefined;
    await new Promise<void>((resolve) => running?.close(() => resolve()));

    await expect(sendTrackerCommand({ host: '127.0.0.1', port }, 'GET_PEERS', 2000)).rejects.toMatchObject({
      code: 'TRACKER_UNREACHABLE',
    });
  });
});
