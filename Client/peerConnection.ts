// Client/peerConnection.ts
import * as net from 'net';
import { PeerError } from './errors.js';
import { IChatMessage } from './Types/MessageTypes.js';
import { IPeerInfo } from './Types/TrackerTypes.js';

export type DeliverFn = (peer: IPeerInfo, message: IChatMessage, timeoutMs: number) => Promise<void>;

/**
 * Delivers one message over a fresh connection to the peer's cached address.
 * Resolves once the peer has read the message and closed its side.
 */
export function deliverMessage(peer: IPeerInfo, message: IChatMessage, timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
        const peerAddress = `${peer.ip}:${peer.port}`;
        const socket = net.createConnection({ host: peer.ip, port: peer.port });
        let settled = false;

        const fail = (reason: string): void => {
            if (settled) return;
            settled = true;
            socket.destroy();
            reject(new PeerError('DELIVERY_ERROR', `Failed to deliver to peer ${peer.peerId} at ${peerAddress}: ${reason}`, {
                peerId: peer.peerId,
            }));
        };

        socket.setTimeout(timeoutMs);
        // Nothing is expected back, but the stream must flow for 'close' to fire.
        socket.resume();

        socket.on('connect', () => {
            socket.end(`${JSON.stringify(message)}\n`);
        });

        socket.on('timeout', () => fail(`timed out after ${timeoutMs}ms`));
        socket.on('error', (err) => fail(err.message));

        socket.on('close', (hadError) => {
            if (settled) return;
            if (hadError) {
                fail('connection closed with an error');
                return;
            }
            settled = true;
            resolve();
        });
    });
}
