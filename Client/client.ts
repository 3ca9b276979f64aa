import { PeerServer } from './peerServer.js';
import { DeliverFn, deliverMessage } from './peerConnection.js';
import { TrackerEndpoint, sendTrackerCommand } from './trackerConnection.js';
import { PeerError, describeError } from './errors.js';
import { IChatMessage, IReceivedMessage, MessageSink, MessageType } from './Types/MessageTypes.js';
import { IPeerInfo, ITrackerReply } from './Types/TrackerTypes.js';
import { logger } from './utils/logger.js';

const HISTORY_CAPACITY = 100;

export interface ChatClientOptions {
    peerId: string;
    /** Address advertised to the tracker for other peers to dial. */
    host: string;
    /** Port for inbound peer connections; 0 lets the OS choose. */
    port: number;
    trackerHost: string;
    trackerPort: number;
    heartbeatIntervalMs?: number;
    requestTimeoutMs?: number;
    /** Interface the inbound listener binds to. */
    listenHost?: string;
    onMessage?: MessageSink;
    deliver?: DeliverFn;
}

export type DeliveryOutcome =
    | { peerId: string; delivered: true }
    | { peerId: string; delivered: false; error: PeerError };

const toDeliveryError = (peer: IPeerInfo, error: unknown): PeerError =>
    error instanceof PeerError
        ? error
        : new PeerError('DELIVERY_ERROR', `Failed to deliver to peer ${peer.peerId}: ${describeError(error)}`, {
            peerId: peer.peerId,
        });

/**
 * A chat peer: registers with the tracker, keeps itself alive with
 * heartbeats, caches the tracker's peer list and talks to other peers
 * directly. Inbound messages arrive through its own PeerServer.
 */
class ChatClient {
    public readonly peerId: string;
    private readonly host: string;
    private readonly tracker: TrackerEndpoint;
    private readonly heartbeatIntervalMs: number;
    private readonly requestTimeoutMs: number;
    private readonly deliver: DeliverFn;
    private readonly onMessage?: MessageSink;
    private peerServer: PeerServer;

    private peerCache: Map<string, IPeerInfo>;
    private history: IReceivedMessage[];
    private heartbeatTimer?: NodeJS.Timeout;
    private heartbeatInFlight?: Promise<void>;
    private running = false;
    private registered = false;

    constructor(options: ChatClientOptions) {
        this.peerId = options.peerId;
        this.host = options.host;
        this.tracker = { host: options.trackerHost, port: options.trackerPort };
        this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 60_000;
        this.requestTimeoutMs = options.requestTimeoutMs ?? 5_000;
        this.deliver = options.deliver ?? deliverMessage;
        this.onMessage = options.onMessage;
        this.peerCache = new Map();
        this.history = [];
        this.peerServer = new PeerServer(
            options.port,
            (message) => this.receive(message),
            options.listenHost ?? '0.0.0.0',
        );
    }

    /** Port other peers reach this client on. */
    public get port(): number {
        return this.peerServer.port;
    }

    public get isRegistered(): boolean {
        return this.registered;
    }

    /**
     * Binds the inbound listener, then joins the network. Only the bind can
     * fail here; tracker trouble is logged and retried by the heartbeat task.
     */
    public async start(): Promise<void> {
        await this.peerServer.start();
        this.running = true;

        try {
            const peerCount = await this.register();
            logger.info(`Total peers in network: ${peerCount}`);
        } catch (error) {
            logger.warn(`Could not register with tracker, will retry: ${describeError(error)}`);
            this.startHeartbeat();
            return;
        }

        try {
            await this.refreshPeers();
        } catch (error) {
            logger.warn(`Could not fetch the peer list: ${describeError(error)}`);
        }
    }

    /**
     * Registers this peer and resolves with the tracker's peer count.
     */
    public async register(): Promise<number> {
        const reply = await this.requestTracker(`REGISTER ${this.peerId} ${this.host} ${this.port}`);
        this.registered = true;
        logger.info(`🔗 Registered with tracker as ${this.peerId} (${this.host}:${this.port})`);
        this.startHeartbeat();
        return reply.peer_count ?? 0;
    }

    /**
     * Replaces the local cache with the tracker's current peer list.
     */
    public async refreshPeers(): Promise<IPeerInfo[]> {
        const reply = await this.requestTracker('GET_PEERS');
        const peers = reply.peers ?? [];
        this.peerCache = new Map(
            peers.map((peer) => [peer.peer_id, { peerId: peer.peer_id, ip: peer.ip, port: peer.port }]),
        );
        logger.info(`Updated peer list: ${this.peerCache.size} peers known`);
        return this.getCachedPeers();
    }

    public getCachedPeers(): IPeerInfo[] {
        return [...this.peerCache.values()].map((peer) => ({ ...peer }));
    }

    /**
     * Most recent messages received, oldest first.
     */
    public getHistory(limit = 20): IReceivedMessage[] {
        return this.history.slice(-limit).map((message) => ({ ...message }));
    }

    /**
     * Sends a direct message to a peer from the local cache. The tracker is
     * not consulted; a stale entry surfaces as a DELIVERY_ERROR.
     */
    public async sendDirect(peerId: string, content: string): Promise<void> {
        const peer = this.peerCache.get(peerId);
        if (!peer) {
            throw new PeerError('UNKNOWN_PEER', `Peer ${peerId} not found`, { peerId });
        }
        await this.deliverTo(peer, 'direct', content);
        logger.info(`Sent direct message to ${peerId}`);
    }

    /**
     * Sends the message to every cached peer except this one. Individual
     * failures are reported in the result and never stop the other sends.
     */
    public async broadcast(content: string): Promise<DeliveryOutcome[]> {
        const targets = [...this.peerCache.values()].filter((peer) => peer.peerId !== this.peerId);

        const outcomes = await Promise.all(
            targets.map(async (peer): Promise<DeliveryOutcome> => {
                try {
                    await this.deliverTo(peer, 'broadcast', content);
                    return { peerId: peer.peerId, delivered: true };
                } catch (error) {
                    return { peerId: peer.peerId, delivered: false, error: toDeliveryError(peer, error) };
                }
            }),
        );

        const delivered = outcomes.filter((outcome) => outcome.delivered).length;
        logger.info(`Broadcast sent to ${delivered} of ${targets.length} peers`);
        return outcomes;
    }

    /**
     * Leaves the network. A heartbeat already on the wire is allowed to finish
     * first, so nothing reaches the tracker after the UNREGISTER. The
     * UNREGISTER is best effort and bounded by the request timeout.
     */
    public async stop(): Promise<void> {
        this.running = false;
        if (this.heartbeatTimer) {
            clearTimeout(this.heartbeatTimer);
            this.heartbeatTimer = undefined;
        }
        if (this.heartbeatInFlight) {
            await this.heartbeatInFlight;
        }

        if (this.registered) {
            this.registered = false;
            try {
                await this.requestTracker(`UNREGISTER ${this.peerId}`);
                logger.info('Unregistered from tracker');
            } catch (error) {
                logger.warn(`Could not unregister from tracker: ${describeError(error)}`);
            }
        }

        await this.peerServer.stop();
        logger.info('Client stopped');
    }

    private async deliverTo(peer: IPeerInfo, type: MessageType, content: string): Promise<void> {
        const message: IChatMessage = { type, from: this.peerId, content };
        try {
            await this.deliver(peer, message, this.requestTimeoutMs);
        } catch (error) {
            const deliveryError = toDeliveryError(peer, error);
            logger.warn(deliveryError.message);
            throw deliveryError;
        }
    }

    private async requestTracker(command: string): Promise<ITrackerReply> {
        const reply = await sendTrackerCommand(this.tracker, command, this.requestTimeoutMs);
        if (reply.status === 'error') {
            throw new PeerError('TRACKER_REJECTED', reply.message ?? 'Tracker rejected the request', { command });
        }
        return reply;
    }

    private startHeartbeat(): void {
        if (this.heartbeatTimer || this.heartbeatInFlight || !this.running) return;
        this.scheduleHeartbeat();
    }

    private scheduleHeartbeat(): void {
        this.heartbeatTimer = setTimeout(async () => {
            this.heartbeatTimer = undefined;
            this.heartbeatInFlight = this.runHeartbeat();
            await this.heartbeatInFlight;
            this.heartbeatInFlight = undefined;
            if (this.running) {
                this.scheduleHeartbeat();
            }
        }, this.heartbeatIntervalMs);
    }

    private async runHeartbeat(): Promise<void> {
        try {
            await this.heartbeat();
        } catch (error) {
            logger.warn(`Heartbeat failed: ${describeError(error)}`);
        }
    }

    /**
     * One heartbeat round. A peer the tracker no longer knows (swept, or the
     * tracker restarted) registers again.
     */
    private async heartbeat(): Promise<void> {
        if (!this.running) return;
        if (!this.registered) {
            await this.register();
            return;
        }

        try {
            await this.requestTracker(`HEARTBEAT ${this.peerId}`);
            logger.debug('Heartbeat acknowledged');
        } catch (error) {
            if (error instanceof PeerError && error.code === 'TRACKER_REJECTED') {
                this.registered = false;
                if (!this.running) return;
                logger.warn(`Tracker no longer knows ${this.peerId}, registering again`);
                await this.register();
                return;
            }
            throw error;
        }
    }

    private receive(message: IReceivedMessage): void {
        this.history.push(message);
        if (this.history.length > HISTORY_CAPACITY) {
            this.history.shift();
        }
        this.onMessage?.(message);
    }
}

export default ChatClient;
