#!/usr/bin/env node
import 'dotenv/config';
import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import ChatClient from './client.js';
import { executeChatCommand, formatIncomingMessage, HELP_LINES, parseChatCommand } from './commands.js';
import { loadClientConfig } from './config.js';
import { peerIdSchema } from './utils/validation.js';

const rl = readline.createInterface({ input, output });

async function askPeerId(): Promise<string> {
    for (;;) {
        const answer = (await rl.question('Enter your peer id: ')).trim();
        const result = peerIdSchema.validate(answer);
        if (!result.error && answer) return answer;
        console.log('A peer id is 1-64 characters without spaces.');
    }
}

async function main() {
    const config = loadClientConfig();
    const peerId = config.peerId ?? (await askPeerId());

    const client = new ChatClient({
        peerId,
        host: config.host,
        port: config.port,
        trackerHost: config.trackerHost,
        trackerPort: config.trackerPort,
        heartbeatIntervalMs: config.heartbeatIntervalMs,
        requestTimeoutMs: config.requestTimeoutMs,
        onMessage: (message) => {
            output.write(`\n${formatIncomingMessage(message)}\n> `);
        },
    });

    console.log('='.repeat(60));
    console.log('P2P Chat Client');
    console.log(`Peer ID: ${peerId}`);
    console.log(`Tracker: ${config.trackerHost}:${config.trackerPort}`);
    console.log('='.repeat(60));

    await client.start();
    console.log(`✅ Listening for peers on ${config.host}:${client.port}`);
    console.log(HELP_LINES.join('\n'));

    rl.on('SIGINT', async () => {
        console.log('\nExiting...');
        try {
            await client.stop();
        } catch (error) {
            console.error('Error while stopping:', error);
        } finally {
            rl.close();
            process.exit(0);
        }
    });

    for (;;) {
        const command = parseChatCommand(await rl.question('> '));
        if (!command) continue;

        const result = await executeChatCommand(client, command);
        result.lines.forEach((line) => console.log(line));
        if (result.quit) break;
    }

    rl.close();
    process.exit(0);
}

main().catch(err => {
    console.error('An error occurred:', err);
    rl.close();
    process.exit(1);
});
