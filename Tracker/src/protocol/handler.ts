import { IPeerManager } from '../services/IPeerManager.js';
import { TrackerResponse, toPeerSummary } from '../types.js';
import { TrackerError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { TrackerCommand, parseCommand } from './commands.js';

/**
 * Invoked after a command has changed the set of registered peers.
 */
export type RegistryChangeListener = (command: TrackerCommand) => void;

/**
 * Turns one request line into exactly one response. Never rejects: parse
 * failures and registry faults both come back as `status: "error"`.
 */
export class TrackerProtocolHandler {
    constructor(
        private readonly peerManager: IPeerManager,
        private readonly onRegistryChange?: RegistryChangeListener,
    ) {}

    async handle(line: string): Promise<TrackerResponse> {
        let command: TrackerCommand;
        try {
            command = parseCommand(line);
        } catch (error) {
            if (error instanceof TrackerError) {
                logger.debug(`Rejected command "${line.trim()}": ${error.message}`);
                return { status: 'error', message: error.message };
            }
            throw error;
        }

        try {
            return await this.dispatch(command);
        } catch (error) {
            logger.error(`Error handling ${command.kind}:`, error);
            return { status: 'error', message: error instanceof Error ? error.message : String(error) };
        }
    }

    private async dispatch(command: TrackerCommand): Promise<TrackerResponse> {
        switch (command.kind) {
            case 'REGISTER': {
                await this.peerManager.upsert(command.peerId, command.ip, command.port);
                const peerCount = await this.peerManager.size();
                logger.info(`✅ Registered peer: ${command.peerId} (${command.ip}:${command.port}). Total peers: ${peerCount}`);
                this.onRegistryChange?.(command);
                return { status: 'success', message: 'Peer registered successfully', peer_count: peerCount };
            }
            case 'UNREGISTER': {
                const removed = await this.peerManager.remove(command.peerId);
                if (!removed) {
                    return { status: 'error', message: 'Peer not found' };
                }
                logger.info(`🔌 Unregistered peer: ${command.peerId}`);
                this.onRegistryChange?.(command);
                return { status: 'success', message: 'Peer unregistered successfully' };
            }
            case 'GET_PEERS': {
                const peers = (await this.peerManager.snapshot()).map(toPeerSummary);
                logger.debug(`Sending peer list (${peers.length} peers)`);
                return { status: 'success', peers, peer_count: peers.length };
            }
            case 'HEARTBEAT': {
                const touched = await this.peerManager.touch(command.peerId);
                if (!touched) {
                    return { status: 'error', message: 'Peer not found' };
                }
                return { status: 'success', message: 'Heartbeat received' };
            }
            default: {
                const unreachable: never = command;
                throw new Error(`Unhandled command: ${JSON.stringify(unreachable)}`);
            }
        }
    }
}
