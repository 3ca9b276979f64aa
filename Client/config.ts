import Joi from 'joi';
import * as os from 'os';
import { peerIdSchema } from './utils/validation.js';

export interface ClientConfig {
    /** Unset when the user is to be asked for one. */
    peerId?: string;
    host: string;
    port: number;
    trackerHost: string;
    trackerPort: number;
    heartbeatIntervalMs: number;
    requestTimeoutMs: number;
}

interface ClientEnv {
    PEER_ID?: string;
    PEER_HOST?: string;
    PEER_PORT: number;
    TRACKER_HOST: string;
    TRACKER_PORT: number;
    HEARTBEAT_INTERVAL: number;
    REQUEST_TIMEOUT: number;
}

const clientEnvSchema = Joi.object<ClientEnv>({
    PEER_ID: peerIdSchema,
    PEER_HOST: Joi.string(),
    PEER_PORT: Joi.number().port().default(6000),
    TRACKER_HOST: Joi.string().default('127.0.0.1'),
    TRACKER_PORT: Joi.number().port().default(5000),
    // seconds
    HEARTBEAT_INTERVAL: Joi.number().integer().min(1).default(60),
    REQUEST_TIMEOUT: Joi.number().positive().default(5),
}).unknown(true);

/**
 * Picks the address other peers should dial: the first external IPv4
 * address, or loopback on an isolated host.
 */
export function detectLocalAddress(
    interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]> = os.networkInterfaces(),
): string {
    for (const entries of Object.values(interfaces)) {
        const external = entries?.find(entry => entry.family === 'IPv4' && !entry.internal);
        if (external) return external.address;
    }
    return '127.0.0.1';
}

export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
    const result = clientEnvSchema.validate(env, { convert: true, abortEarly: false });
    if (result.error) {
        throw new Error(`Invalid client configuration: ${result.error.message}`);
    }
    const value: ClientEnv = result.value;
    return {
        peerId: value.PEER_ID,
        host: value.PEER_HOST ?? detectLocalAddress(),
        port: value.PEER_PORT,
        trackerHost: value.TRACKER_HOST,
        trackerPort: value.TRACKER_PORT,
        heartbeatIntervalMs: value.HEARTBEAT_INTERVAL * 1000,
        requestTimeoutMs: value.REQUEST_TIMEOUT * 1000,
    };
}
