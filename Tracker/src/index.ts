#!/usr/bin/env node
import 'dotenv/config';
import { loadTrackerConfig } from './config.js';
import { TrackerServer } from './server.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
    const config = loadTrackerConfig();
    const server = new TrackerServer({
        host: config.host,
        port: config.port,
        monitorPort: config.monitorPort,
        livenessTimeoutMs: config.livenessTimeoutMs,
        sweepIntervalMs: config.sweepIntervalMs,
    });

    const shutdown = async () => {
        logger.info('Shutdown signal received, closing server...');
        try {
            await server.stop();
            process.exit(0);
        } catch (error) {
            logger.error('Error during server shutdown:', error);
            process.exit(1);
        }
    };

    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);

    await server.start();
}

main().catch((error: unknown) => {
    logger.error('❌ Failed to start tracker:', error);
    process.exit(1);
});
