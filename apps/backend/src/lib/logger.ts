import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { ILogger } from '@homehub/types';
import { env } from '../config/env.js';

/**
 * Creates the root pino logger for the orchestrator.
 *
 * Outside tests it writes to both `LOG_FILE` (`pino/file`) and stdout through
 * `pino-pretty`. Components never import this directly; they receive an
 * `ILogger` and derive `child({ module })` loggers from it.
 *
 * Log levels default to `info` in production, `silent` in tests and `debug`
 * elsewhere, and `LOG_LEVEL` overrides all three.
 */
export function createLogger(): pino.Logger {
    const level = env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : env.NODE_ENV === 'test' ? 'silent' : 'debug');
    const base = { service: 'homehub-backend' };

    if (env.NODE_ENV === 'test') {
        return pino({ level, base });
    }

    try {
        mkdirSync(dirname(env.LOG_FILE), { recursive: true });
    } catch (err) {
        console.error('Warning: Could not create log directory:', err);
    }

    const targets: pino.TransportTargetOptions[] = [
        {
            level,
            target: 'pino/file',
            options: { destination: env.LOG_FILE }
        },
        {
            level,
            target: 'pino-pretty',
            options: {
                colorize: true,
                singleLine: false,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
    ];

    return pino({ level, base }, pino.transport({ targets }));
}

/**
 * Root logger for the process entry point.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.error({ error }, 'Failed to connect');
 */
export const logger: ILogger = createLogger();
