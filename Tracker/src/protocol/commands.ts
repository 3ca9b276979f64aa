import { TrackerError } from '../utils/errors.js';
import { validatePeerId, validatePeerRegistration } from '../utils/validation.js';

export type TrackerCommand =
    | { kind: 'REGISTER'; peerId: string; ip: string; port: number }
    | { kind: 'UNREGISTER'; peerId: string }
    | { kind: 'GET_PEERS' }
    | { kind: 'HEARTBEAT'; peerId: string };

export type TrackerCommandKind = TrackerCommand['kind'];

const USAGE: Record<TrackerCommandKind, string> = {
    REGISTER: 'REGISTER <peer_id> <ip> <port>',
    UNREGISTER: 'UNREGISTER <peer_id>',
    GET_PEERS: 'GET_PEERS',
    HEARTBEAT: 'HEARTBEAT <peer_id>',
};

const isCommandKind = (verb: string): verb is TrackerCommandKind => verb in USAGE;

function expectArgs(kind: TrackerCommandKind, args: string[], count: number): void {
    if (args.length !== count) {
        throw new TrackerError('MALFORMED_COMMAND', `Invalid format. Use: ${USAGE[kind]}`, {
            command: kind,
            received: args.length,
        });
    }
}

function parsePeerId(kind: TrackerCommandKind, raw: string): string {
    const result = validatePeerId(raw);
    if (result.error) {
        throw new TrackerError('MALFORMED_COMMAND', result.error.details[0].message, { command: kind });
    }
    return result.value;
}

/**
 * Parses one tracker request line. Verbs are case-insensitive and the
 * argument count must match the command exactly.
 */
export function parseCommand(line: string): TrackerCommand {
    const parts = line.trim().split(/\s+/).filter(part => part.length > 0);
    if (parts.length === 0) {
        throw new TrackerError('MALFORMED_COMMAND', 'Empty command');
    }

    const [rawVerb, ...args] = parts;
    const verb = rawVerb.toUpperCase();
    if (!isCommandKind(verb)) {
        throw new TrackerError('MALFORMED_COMMAND', 'Unknown command', { command: rawVerb });
    }

    switch (verb) {
        case 'REGISTER': {
            expectArgs(verb, args, 3);
            const [peerId, ip, port] = args;
            const result = validatePeerRegistration({ peerId, ip, port });
            if (result.error) {
                throw new TrackerError('MALFORMED_COMMAND', result.error.details[0].message, { command: verb });
            }
            const { value } = result;
            return { kind: verb, peerId: value.peerId, ip: value.ip, port: value.port };
        }
        case 'UNREGISTER':
        case 'HEARTBEAT':
            expectArgs(verb, args, 1);
            return { kind: verb, peerId: parsePeerId(verb, args[0]) };
        case 'GET_PEERS':
            expectArgs(verb, args, 0);
            return { kind: verb };
    }
}
