// Client/trackerConnection.ts
import * as net from 'net';
import { PeerError, describeError } from './errors.js';
import { ITrackerReply } from './Types/TrackerTypes.js';
import { validateTrackerReply } from './utils/validation.js';

export interface TrackerEndpoint {
    host: string;
    port: number;
}

/**
 * Opens a connection to the tracker, sends a single command line and
 * resolves with the reply the tracker writes before closing. Every stage
 * shares one idle timeout.
 */
export function sendTrackerCommand(tracker: TrackerEndpoint, command: string, timeoutMs: number): Promise<ITrackerReply> {
    return new Promise((resolve, reject) => {
        const address = `${tracker.host}:${tracker.port}`;
        const socket = net.createConnection({ host: tracker.host, port: tracker.port });
        let data = '';
        let settled = false;

        const fail = (error: PeerError): void => {
            if (settled) return;
            settled = true;
            socket.destroy();
            reject(error);
        };

        socket.setEncoding('utf8');
        socket.setTimeout(timeoutMs);

        socket.on('connect', () => {
            socket.write(`${command}\n`);
        });

        socket.on('data', (chunk: string) => {
            data += chunk;
        });

        socket.on('end', () => {
            if (settled) return;
            settled = true;
            socket.end();

            let body: unknown;
            try {
                body = JSON.parse(data);
            } catch (error) {
                reject(new PeerError('INVALID_RESPONSE', `Tracker sent an unreadable reply: ${describeError(error)}`, { command }));
                return;
            }

            const result = validateTrackerReply(body);
            if (result.error) {
                reject(new PeerError('INVALID_RESPONSE', `Tracker sent an invalid reply: ${result.error.message}`, { command }));
            } else {
                resolve(result.value);
            }
        });

        socket.on('timeout', () => {
            fail(new PeerError('TRACKER_UNREACHABLE', `Tracker at ${address} did not answer within ${timeoutMs}ms`, { command }));
        });

        socket.on('error', (err) => {
            fail(new PeerError('TRACKER_UNREACHABLE', `Failed to reach tracker at ${address}: ${err.message}`, { command }));
        });

        socket.on('close', () => {
            fail(new PeerError('TRACKER_UNREACHABLE', `Tracker at ${address} closed the connection without replying`, { command }));
        });
    });
}
