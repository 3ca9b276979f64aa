import { IPeer } from '../types.js';
import { IPeerManager } from './IPeerManager.js';

export type Clock = () => number;

const copyPeer = (peer: IPeer): IPeer => ({
    ...peer,
    lastHeartbeat: new Date(peer.lastHeartbeat.getTime()),
    registeredAt: new Date(peer.registeredAt.getTime()),
});

/**
 * Registry of live peers, owned by a single TrackerServer.
 *
 * Each method body runs synchronously before its promise settles, so no two
 * operations ever interleave on the map.
 */
export class InMemoryPeerManager implements IPeerManager {
    private peers: Map<string, IPeer>;
    private readonly clock: Clock;

    constructor(clock: Clock = Date.now) {
        this.peers = new Map();
        this.clock = clock;
    }

    async upsert(peerId: string, ip: string, port: number): Promise<void> {
        const now = this.clock();
        this.peers.set(peerId, {
            peerId,
            ip,
            port,
            lastHeartbeat: new Date(now),
            registeredAt: new Date(now),
        });
    }

    async touch(peerId: string): Promise<boolean> {
        const peer = this.peers.get(peerId);
        if (!peer) return false;
        peer.lastHeartbeat = new Date(this.clock());
        return true;
    }

    async remove(peerId: string): Promise<boolean> {
        return this.peers.delete(peerId);
    }

    async snapshot(): Promise<IPeer[]> {
        return [...this.peers.values()].map(copyPeer);
    }

    async sweep(now: number, timeout: number): Promise<string[]> {
        const removed: string[] = [];
        for (const [id, peer] of this.peers.entries()) {
            if (now - peer.lastHeartbeat.getTime() > timeout) {
                this.peers.delete(id);
                removed.push(id);
            }
        }
        return removed;
    }

    async size(): Promise<number> {
        return this.peers.size;
    }
}
