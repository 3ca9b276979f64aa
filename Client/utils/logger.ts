import winston from 'winston';
import path from 'path';

const logFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
    return `${timestamp} [${level}]: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ''}`;
});

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.colorize(),
            logFormat
        ),
    }),
];

// The chat prompt owns the terminal, so files are written only on request.
if (process.env.LOG_DIR) {
    transports.push(
        new winston.transports.File({
            filename: path.join(process.env.LOG_DIR, 'client-error.log'),
            level: 'error',
            maxsize: 5242880, // 5MB
            maxFiles: 5,
        }),
        new winston.transports.File({
            filename: path.join(process.env.LOG_DIR, 'client.log'),
            maxsize: 5242880, // 5MB
            maxFiles: 5,
        }),
    );
}

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'error' : 'info'),
    format: winston.format.combine(
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json()
    ),
    transports,
    exitOnError: false,
});
