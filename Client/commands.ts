import type ChatClient from './client.js';
import { describeError } from './errors.js';
import { IReceivedMessage } from './Types/MessageTypes.js';

export type ChatCommand =
    | { kind: 'peers' }
    | { kind: 'refresh' }
    | { kind: 'history' }
    | { kind: 'help' }
    | { kind: 'quit' }
    | { kind: 'msg'; peerId: string; text: string }
    | { kind: 'broadcast'; text: string }
    | { kind: 'usage'; usage: string }
    | { kind: 'unknown'; input: string };

export interface CommandResult {
    lines: string[];
    quit: boolean;
}

export type ChatCommandTarget = Pick<
    ChatClient,
    'peerId' | 'refreshPeers' | 'getCachedPeers' | 'sendDirect' | 'broadcast' | 'getHistory' | 'stop'
>;

export const HELP_LINES = [
    'Chat Commands:',
    '  /msg <peer_id> <message>  - Send direct message',
    '  /broadcast <message>      - Broadcast to all peers',
    '  /peers                    - Refresh and list available peers',
    '  /refresh                  - Refresh peer list',
    '  /history                  - Show message history',
    '  /help                     - Show this help',
    '  /quit                     - Exit chat',
];

const SIMPLE_COMMANDS = new Map<string, ChatCommand>([
    ['/peers', { kind: 'peers' }],
    ['/refresh', { kind: 'refresh' }],
    ['/history', { kind: 'history' }],
    ['/help', { kind: 'help' }],
    ['/quit', { kind: 'quit' }],
]);

/**
 * Parses one line typed at the prompt; blank lines yield null.
 */
export function parseChatCommand(input: string): ChatCommand | null {
    const line = input.trim();
    if (!line) return null;

    const simple = SIMPLE_COMMANDS.get(line);
    if (simple) return simple;

    const verb = line.split(/\s+/, 1)[0];
    if (verb === '/msg') {
        const match = /^\/msg\s+(\S+)\s+([\s\S]+)$/.exec(line);
        return match
            ? { kind: 'msg', peerId: match[1], text: match[2] }
            : { kind: 'usage', usage: 'Usage: /msg <peer_id> <message>' };
    }
    if (verb === '/broadcast') {
        const text = line.slice(verb.length).trim();
        return text ? { kind: 'broadcast', text } : { kind: 'usage', usage: 'Usage: /broadcast <message>' };
    }
    return { kind: 'unknown', input: line };
}

export function formatIncomingMessage(message: IReceivedMessage): string {
    const label = message.type === 'direct' ? 'Direct message' : 'Broadcast';
    return `[${message.from}] ${label}: ${message.content}`;
}

function listPeers(client: ChatCommandTarget): string[] {
    const peers = client.getCachedPeers();
    if (peers.length === 0) return ['No peers available'];
    return [
        'Available peers:',
        ...peers.map((peer) => `  ${peer.peerId} - ${peer.ip}:${peer.port}${peer.peerId === client.peerId ? ' (you)' : ''}`),
    ];
}

const done = (...lines: string[]): CommandResult => ({ lines, quit: false });

/**
 * Runs a parsed command against the client. Failures become output lines;
 * only a failing `stop` on /quit rejects.
 */
export async function executeChatCommand(client: ChatCommandTarget, command: ChatCommand): Promise<CommandResult> {
    switch (command.kind) {
        case 'peers': {
            const lines: string[] = [];
            try {
                await client.refreshPeers();
            } catch (error) {
                lines.push(`Could not refresh peer list, showing cached peers: ${describeError(error)}`);
            }
            return done(...lines, ...listPeers(client));
        }
        case 'refresh': {
            try {
                const peers = await client.refreshPeers();
                const others = peers.filter((peer) => peer.peerId !== client.peerId).length;
                return done(`Peer list updated: ${others} peers available`);
            } catch (error) {
                return done(`Error: ${describeError(error)}`);
            }
        }
        case 'msg': {
            try {
                await client.sendDirect(command.peerId, command.text);
                return done(`Sent direct message to ${command.peerId}`);
            } catch (error) {
                return done(`Error: ${describeError(error)}`);
            }
        }
        case 'broadcast': {
            const outcomes = await client.broadcast(command.text);
            if (outcomes.length === 0) return done('No peers to broadcast to');
            const delivered = outcomes.filter((outcome) => outcome.delivered).length;
            const failures = outcomes.flatMap((outcome) =>
                outcome.delivered ? [] : [`  failed ${outcome.peerId}: ${outcome.error.message}`],
            );
            return done(`Broadcast sent to ${delivered} of ${outcomes.length} peers`, ...failures);
        }
        case 'history': {
            const history = client.getHistory(20);
            if (history.length === 0) return done('No message history');
            return done(
                'Message history:',
                ...history.map((message) => `  [${message.type}] ${message.from}: ${message.content}`),
            );
        }
        case 'help':
            return done(...HELP_LINES);
        case 'quit':
            await client.stop();
            return { lines: ['Exiting...'], quit: true };
        case 'usage':
            return done(command.usage);
        case 'unknown':
            return done('Unknown command. Type /help for available commands');
        default: {
            const unreachable: never = command;
            throw new Error(`Unhandled chat command: ${JSON.stringify(unreachable)}`);
        }
    }
}
