// src/config/environment.ts
import { z } from 'zod';
import { ValidationException } from '../shared/exceptions/validation.exception';
import { ERROR_CODES, ERROR_MESSAGES } from '../shared/constants/error-codes';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const environmentSchema = z.object({
    // Application
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

    // Logging
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

    // Persistence
    LEDGER_EXPORT_FILE: z.string().min(1).default('data/export.txt'),
    LEDGER_DUMP_DIR: z.string().min(1).default('data'),

    // Aggregation
    LEDGER_SUM_WORKERS: z.string()
        .regex(/^\d+$/, 'LEDGER_SUM_WORKERS must be a non-negative integer')
        .default('4')
        .transform(val => parseInt(val, 10))
});

export type Environment = z.infer<typeof environmentSchema>;

export function parseEnvironment(env: NodeJS.ProcessEnv): Environment {
    const result = environmentSchema.safeParse(env);

    if (!result.success) {
        throw new ValidationException(
            ERROR_MESSAGES[ERROR_CODES.INVALID_CONFIGURATION],
            result.error.issues.map(issue => ({
                field: issue.path.join('.'),
                message: issue.message
            })),
            ERROR_CODES.INVALID_CONFIGURATION
        );
    }

    return result.data;
}

export class ConfigService {
    private static instance: ConfigService;
    private readonly config: Environment;

    private constructor(env: NodeJS.ProcessEnv) {
        this.config = parseEnvironment(env);
    }

    static getInstance(): ConfigService {
        if (!ConfigService.instance) {
            ConfigService.instance = new ConfigService(process.env);
        }
        return ConfigService.instance;
    }

    get<K extends keyof Environment>(key: K): Environment[K] {
        return this.config[key];
    }
}
