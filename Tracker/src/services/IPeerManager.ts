import { IPeer } from '../types.js';

/**
 * Defines the contract for the tracker's peer registry.
 * Every operation is linearizable with respect to the others; callers never
 * receive a reference into the underlying store.
 */
export interface IPeerManager {
    upsert(peerId: string, ip: string, port: number): Promise<void>;
    touch(peerId: string): Promise<boolean>;
    remove(peerId: string): Promise<boolean>;
    snapshot(): Promise<IPeer[]>;
    sweep(now: number, timeout: number): Promise<string[]>;
    size(): Promise<number>;
}
