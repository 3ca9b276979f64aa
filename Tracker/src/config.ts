import Joi from 'joi';

export interface TrackerConfig {
    host: string;
    port: number;
    monitorPort: number;
    livenessTimeoutMs: number;
    sweepIntervalMs: number;
}

interface TrackerEnv {
    TRACKER_HOST: string;
    TRACKER_PORT: number;
    MONITOR_PORT: number;
    LIVENESS_TIMEOUT: number;
    SWEEP_INTERVAL: number;
}

const trackerEnvSchema = Joi.object<TrackerEnv>({
    TRACKER_HOST: Joi.string().default('0.0.0.0'),
    TRACKER_PORT: Joi.number().port().default(5000),
    MONITOR_PORT: Joi.number().port().default(3000),
    // seconds
    LIVENESS_TIMEOUT: Joi.number().integer().min(1).default(300),
    SWEEP_INTERVAL: Joi.number().integer().min(1).less(Joi.ref('LIVENESS_TIMEOUT')).default(60),
}).unknown(true);

/**
 * Reads the tracker settings from the environment. Throws when a value is
 * present but invalid, so a bad deployment fails at startup.
 */
export function loadTrackerConfig(env: NodeJS.ProcessEnv = process.env): TrackerConfig {
    const result = trackerEnvSchema.validate(env, { convert: true, abortEarly: false });
    if (result.error) {
        throw new Error(`Invalid tracker configuration: ${result.error.message}`);
    }
    const value: TrackerEnv = result.value;
    return {
        host: value.TRACKER_HOST,
        port: value.TRACKER_PORT,
        monitorPort: value.MONITOR_PORT,
        livenessTimeoutMs: value.LIVENESS_TIMEOUT * 1000,
        sweepIntervalMs: value.SWEEP_INTERVAL * 1000,
    };
}
