// Client/peerServer.ts
import * as net from 'net';
import { describeError } from './errors.js';
import { IReceivedMessage, MessageSink } from './Types/MessageTypes.js';
import { logger } from './utils/logger.js';
import { validateChatMessage } from './utils/validation.js';

export const MAX_MESSAGE_BYTES = 64 * 1024;

/**
 * Accepts direct connections from other peers. Each connection carries one
 * message, which is handed to the sink before the connection is closed.
 */
export class PeerServer {
    private server: net.Server;

    constructor(
        private readonly requestedPort: number,
        private readonly sink: MessageSink,
        private readonly host: string = '0.0.0.0',
        private readonly readTimeoutMs: number = 10_000,
    ) {
        this.server = net.createServer((socket) => this.handleConnection(socket));
    }

    /**
     * Binds the listening socket and resolves with the bound port.
     * A bind failure rejects; the caller treats it as fatal.
     */
    public start(): Promise<number> {
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(this.requestedPort, this.host, () => {
                this.server.off('error', reject);
                this.server.on('error', (error) => logger.error('[PeerServer] Listener error:', error));
                logger.info(`📡 Peer server listening on port ${this.port}`);
                resolve(this.port);
            });
        });
    }

    public get port(): number {
        const address = this.server.address();
        return address !== null && typeof address === 'object' ? address.port : this.requestedPort;
    }

    public get listening(): boolean {
        return this.server.listening;
    }

    public stop(): Promise<void> {
        if (!this.server.listening) return Promise.resolve();
        return new Promise((resolve, reject) => {
            this.server.close((error) => (error ? reject(error) : resolve()));
        });
    }

    private handleConnection(socket: net.Socket): void {
        const remoteAddress = `${socket.remoteAddress}:${socket.remotePort}`;
        const chunks: Buffer[] = [];
        let received = 0;

        logger.debug(`[PeerServer] Incoming connection from ${remoteAddress}`);
        socket.setTimeout(this.readTimeoutMs);

        socket.on('data', (chunk: Buffer) => {
            received += chunk.length;
            if (received > MAX_MESSAGE_BYTES) {
                logger.warn(`[PeerServer] Message from ${remoteAddress} exceeds ${MAX_MESSAGE_BYTES} bytes, dropping`);
                socket.destroy();
                return;
            }
            chunks.push(chunk);
        });

        socket.on('end', () => {
            this.dispatch(Buffer.concat(chunks).toString('utf8'), remoteAddress);
            socket.end();
        });

        socket.on('timeout', () => {
            logger.warn(`[PeerServer] Connection from ${remoteAddress} timed out`);
            socket.destroy();
        });

        socket.on('error', (error) => {
            logger.warn(`[PeerServer] Connection error from ${remoteAddress}: ${error.message}`);
        });
    }

    private dispatch(raw: string, remoteAddress: string): void {
        let decoded: unknown;
        try {
            decoded = JSON.parse(raw);
        } catch (error) {
            logger.warn(`[PeerServer] Unreadable message from ${remoteAddress}: ${describeError(error)}`);
            return;
        }

        const result = validateChatMessage(decoded);
        if (result.error) {
            logger.warn(`[PeerServer] Invalid message from ${remoteAddress}: ${result.error.message}`);
            return;
        }

        const message: IReceivedMessage = {
            type: result.value.type,
            from: result.value.from,
            content: result.value.content,
            receivedAt: new Date(),
            remoteAddress,
        };

        try {
            this.sink(message);
        } catch (error) {
            logger.error(`[PeerServer] Message handler failed for message from ${message.from}:`, error);
        }
    }
}
