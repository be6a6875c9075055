import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z.union([
    z.boolean(),
    z
        .string()
        .transform(value => value.trim().toLowerCase())
        .transform(value => ['1', 'true', 'yes', 'on'].includes(value))
]);

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    LOG_FILE: z.string().default('.run/backend.log'),
    MONGODB_URI: z.string().min(1, 'MONGODB_URI is required'),
    REDIS_URL: z.string().min(1, 'REDIS_URL is required'),
    REDIS_NAMESPACE: z.string().default('homehub'),
    TOKEN_SERVICE_URL: z.string().url().default('http://localhost:4100'),
    TOKEN_SERVICE_API_KEY: z.string().optional(),
    PLUGIN_REGISTRY_URL: z.string().url().optional(),
    PLUGIN_REGISTRY_API_KEY: z.string().optional(),
    PLUGIN_REGISTRY_AUTH: z.enum(['bearer', 'api_key']).default('bearer'),
    PLUGIN_WORK_DIR: z.string().default('.run/plugins'),
    INSTALL_QUEUE_DRIVER: z.enum(['memory', 'bullmq']).default('memory'),
    INSTALL_WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),
    INSTALL_QUEUE_CAPACITY: z.coerce.number().int().positive().default(100),
    PLUGIN_INSTALL_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
    PLUGIN_LOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    HEALTH_CHECK_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
    HEALTH_CHECK_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    LOAD_ENABLED_ON_START: booleanFlag.default(true)
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
    console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
    throw new Error('Failed to parse environment variables');
}

export type EnvConfig = z.infer<typeof envSchema>;

export const env: EnvConfig = parsed.data;
