// src/infrastructure/monitoring/logger.service.ts
import pino, { Logger, LoggerOptions } from 'pino';
import { LOG_LEVELS, LogLevel } from '../../config/environment';

export type LogMeta = Record<string, unknown>;

function isLogLevel(value: string | undefined): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * LOG_LEVEL when it names a known level, otherwise debug in development and info elsewhere.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
    if (isLogLevel(env.LOG_LEVEL)) {
        return env.LOG_LEVEL;
    }
    return env.NODE_ENV === 'development' ? 'debug' : 'info';
}

export class LoggerService {
    private static instance: LoggerService;
    private readonly logger: Logger;

    private constructor() {
        this.logger = this.createLogger();
    }

    static getInstance(): LoggerService {
        if (!LoggerService.instance) {
            LoggerService.instance = new LoggerService();
        }
        return LoggerService.instance;
    }

    private createLogger(): Logger {
        const isDevelopment = process.env.NODE_ENV === 'development';
        const logLevel = resolveLogLevel(process.env);

        const baseOptions: LoggerOptions = {
            name: 'pocket-ledger',
            level: logLevel,
            timestamp: pino.stdTimeFunctions.isoTime,
            formatters: {
                level: (label) => ({ level: label })
            }
        };

        if (isDevelopment) {
            return pino({
                ...baseOptions,
                transport: {
                    target: 'pino-pretty',
                    options: {
                        colorize: true,
                        translateTime: 'HH:MM:ss Z',
                        ignore: 'pid,hostname'
                    }
                }
            });
        }

        return pino(baseOptions);
    }

    debug(message: string, meta?: LogMeta): void {
        this.logger.debug({ ...meta }, message);
    }

    info(message: string, meta?: LogMeta): void {
        this.logger.info({ ...meta }, message);
    }

    warn(message: string, meta?: LogMeta): void {
        this.logger.warn({ ...meta }, message);
    }

    error(message: string, error?: Error, meta?: LogMeta): void {
        const errorMeta = error ? {
            error: {
                name: error.name,
                message: error.message,
                stack: error.stack
            }
        } : {};

        this.logger.error({ ...meta, ...errorMeta }, message);
    }

    fatal(message: string, error?: Error, meta?: LogMeta): void {
        const errorMeta = error ? {
            error: {
                name: error.name,
                message: error.message,
                stack: error.stack
            }
        } : {};

        this.logger.fatal({ ...meta, ...errorMeta }, message);
    }

    // Prefixed helpers per concern
    persistence(message: string, meta?: LogMeta): void {
        this.info(`[PERSISTENCE] ${message}`, meta);
    }

    performance(message: string, duration?: number, meta?: LogMeta): void {
        const perfMeta = duration !== undefined ? { ...meta, duration: `${duration}ms` } : meta;
        this.info(`[PERFORMANCE] ${message}`, perfMeta);
    }
}

export const logger = LoggerService.getInstance();

