import express from 'express';
import * as net from 'net';
import { createServer, Server as HttpServer } from 'http';
import { Server as SocketServer } from 'socket.io';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import { ITrackerStats, TrackerResponse, toPeerSummary } from './types.js';
import { logger } from './utils/logger.js';
import { IPeerManager } from './services/IPeerManager.js';
import { Clock, InMemoryPeerManager } from './services/PeerManager.js';
import { TrackerProtocolHandler } from './protocol/handler.js';

// Longest request line, in bytes, accepted before the connection is answered with an error.
export const MAX_COMMAND_LENGTH = 4096;

export interface TrackerServerOptions {
    host?: string;
    port: number;
    /** HTTP/socket.io monitor port; the monitor is not started when omitted. */
    monitorPort?: number;
    livenessTimeoutMs?: number;
    sweepIntervalMs?: number;
    /** How long a connection may stay silent before it is dropped. */
    connectionTimeoutMs?: number;
    peerManager?: IPeerManager;
    clock?: Clock;
}

type ResolvedOptions = Required<Omit<TrackerServerOptions, 'monitorPort' | 'peerManager' | 'clock'>> &
    Pick<TrackerServerOptions, 'monitorPort'>;

export class TrackerServer {
    public readonly app: express.Application;
    private httpServer: HttpServer;
    private io: SocketServer;
    private tcpServer: net.Server;
    private peerManager: IPeerManager;
    private handler: TrackerProtocolHandler;
    private clock: Clock;
    private options: ResolvedOptions;
    private cleanupTimer?: NodeJS.Timeout;
    private commandsHandled = 0;
    private peersSwept = 0;

    constructor(options: TrackerServerOptions) {
        this.options = {
            host: options.host ?? '0.0.0.0',
            port: options.port,
            monitorPort: options.monitorPort,
            livenessTimeoutMs: options.livenessTimeoutMs ?? 300_000, // 5 minutes
            sweepIntervalMs: options.sweepIntervalMs ?? 60_000,
            connectionTimeoutMs: options.connectionTimeoutMs ?? 10_000,
        };
        this.clock = options.clock ?? Date.now;
        this.peerManager = options.peerManager ?? new InMemoryPeerManager(this.clock);
        this.handler = new TrackerProtocolHandler(this.peerManager, () => {
            this.broadcastPeerList().catch((error: unknown) => {
                logger.error('Failed to broadcast peer list:', error);
            });
        });

        this.tcpServer = net.createServer({ allowHalfOpen: true }, (socket) => this.handleConnection(socket));

        this.app = express();
        this.httpServer = createServer(this.app);
        this.io = new SocketServer(this.httpServer, {
            cors: {
                origin: '*', // Allow all origins
                methods: ['GET', 'POST'],
            },
            transports: ['websocket', 'polling'],
        });

        this.setupMiddleware();
        this.setupRoutes();
        this.setupSocketHandlers();
    }

    private setupMiddleware(): void {
        this.app.use(helmet());
        this.app.use(compression());
        this.app.use(cors());
        this.app.use(express.json());
        this.app.use(morgan('combined', {
            stream: { write: (message) => logger.http(message.trim()) },
        }));
    }

    private setupRoutes(): void {
        this.app.get('/health', (req, res) => {
            res.json({
                status: 'healthy',
                timestamp: new Date().toISOString(),
                uptime: process.uptime(),
            });
        });

        this.app.get('/stats', async (req, res) => {
            try {
                res.json(await this.getStats());
            } catch (error) {
                logger.error('Error getting stats:', error);
                res.status(500).json({ error: 'Failed to retrieve statistics' });
            }
        });

        this.app.get('/peers', async (req, res) => {
            try {
                const peers = (await this.peerManager.snapshot()).map(toPeerSummary);
                res.json({ peers, peer_count: peers.length });
            } catch (error) {
                logger.error('Error getting peer list:', error);
                res.status(500).json({ error: 'Failed to retrieve peer list' });
            }
        });
    }

    private setupSocketHandlers(): void {
        this.io.on('connection', (socket) => {
            logger.info(`🔗 Monitor connected: ${socket.id}`);

            this.peerManager.snapshot()
                .then((peers) => {
                    socket.emit('update_peer_list', peers.map(toPeerSummary));
                })
                .catch((error: unknown) => {
                    logger.error(`Failed to send peer list to monitor ${socket.id}:`, error);
                });

            socket.on('disconnect', () => {
                logger.info(`Monitor disconnected: ${socket.id}`);
            });
        });
    }

    private async broadcastPeerList(): Promise<void> {
        const peers = (await this.peerManager.snapshot()).map(toPeerSummary);
        this.io.emit('update_peer_list', peers);
        logger.debug(`📡 Broadcasted updated peer list. Total peers: ${peers.length}`);
    }

    /**
     * Reads one command line, answers it and closes the connection.
     */
    private handleConnection(socket: net.Socket): void {
        const remote = `${socket.remoteAddress}:${socket.remotePort}`;
        let buffer = '';
        let answered = false;

        logger.debug(`Connection from ${remote}`);
        socket.setEncoding('utf8');
        socket.setTimeout(this.options.connectionTimeoutMs);

        // Only lines that reach the protocol handler count towards commandsHandled.
        const answer = (response: Promise<TrackerResponse>, counted = true): void => {
            answered = true;
            response
                .then((body) => {
                    if (counted) this.commandsHandled++;
                    if (!socket.destroyed) {
                        socket.end(`${JSON.stringify(body)}\n`);
                    }
                })
                .catch((error: unknown) => {
                    logger.error(`Error handling client ${remote}:`, error);
                    socket.destroy();
                });
        };

        const rejectTooLong = (): void => {
            logger.warn(`Command from ${remote} exceeds ${MAX_COMMAND_LENGTH} bytes`);
            const tooLong: TrackerResponse = { status: 'error', message: 'Command too long' };
            answer(Promise.resolve(tooLong), false);
        };

        socket.on('data', (chunk: string) => {
            if (answered) return;
            buffer += chunk;

            const newline = buffer.indexOf('\n');
            const line = newline === -1 ? buffer : buffer.slice(0, newline);
            if (Buffer.byteLength(line, 'utf8') > MAX_COMMAND_LENGTH) {
                rejectTooLong();
            } else if (newline !== -1) {
                answer(this.handler.handle(line));
            }
        });

        // A client may half-close instead of sending a newline.
        socket.on('end', () => {
            if (!answered) {
                answer(this.handler.handle(buffer));
            }
        });

        socket.on('timeout', () => {
            logger.warn(`Connection from ${remote} timed out`);
            socket.destroy();
        });

        socket.on('error', (error) => {
            logger.warn(`Socket error from ${remote}: ${error.message}`);
        });
    }

    public async start(): Promise<void> {
        await new Promise<void>((resolve, reject) => {
            this.tcpServer.once('error', reject);
            this.tcpServer.listen(this.options.port, this.options.host, () => {
                this.tcpServer.off('error', reject);
                this.tcpServer.on('error', (error) => logger.error('Tracker socket error:', error));
                resolve();
            });
        });
        logger.info(`🚀 Tracker listening on ${this.options.host}:${this.port}`);

        if (this.options.monitorPort !== undefined) {
            const monitorPort = this.options.monitorPort;
            await new Promise<void>((resolve, reject) => {
                this.httpServer.once('error', reject);
                this.httpServer.listen(monitorPort, this.options.host, () => {
                    this.httpServer.off('error', reject);
                    resolve();
                });
            });
            logger.info(`📊 Monitor running on port ${this.monitorPort}`);
        }

        this.startCleanupJob();
    }

    private startCleanupJob(): void {
        this.cleanupTimer = setInterval(() => {
            this.runSweep().catch((error: unknown) => {
                logger.error('Error during cleanup job:', error);
            });
        }, this.options.sweepIntervalMs);
    }

    /**
     * Removes every peer whose last heartbeat is older than the liveness window.
     */
    public async runSweep(): Promise<string[]> {
        logger.debug('Running cleanup job for inactive peers...');
        const removed = await this.peerManager.sweep(this.clock(), this.options.livenessTimeoutMs);
        if (removed.length > 0) {
            this.peersSwept += removed.length;
            logger.info(`🧹 Removed inactive peers: ${removed.join(', ')}`);
            await this.broadcastPeerList();
        }
        return removed;
    }

    public async getStats(): Promise<ITrackerStats> {
        return {
            totalPeers: await this.peerManager.size(),
            commandsHandled: this.commandsHandled,
            peersSwept: this.peersSwept,
        };
    }

    /** Bound TCP port, useful when started on port 0. */
    public get port(): number {
        const address = this.tcpServer.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Tracker is not listening');
        }
        return address.port;
    }

    public get monitorPort(): number | undefined {
        const address = this.httpServer.address();
        return address !== null && typeof address === 'object' ? address.port : undefined;
    }

    public async stop(): Promise<void> {
        if (this.cleanupTimer) {
            clearInterval(this.cleanupTimer);
            this.cleanupTimer = undefined;
        }

        if (this.httpServer.listening) {
            await new Promise<void>((resolve, reject) => {
                this.io.close((error) => (error ? reject(error) : resolve()));
            });
        }

        if (this.tcpServer.listening) {
            await new Promise<void>((resolve, reject) => {
                this.tcpServer.close((error) => (error ? reject(error) : resolve()));
            });
        }
        logger.info('Tracker stopped gracefully.');
    }
}
