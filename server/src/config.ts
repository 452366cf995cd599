/**
 * Environment configuration with validation
 */
import { z } from 'zod';
import { DEFAULT_QUEUE_CAPACITY, DEFAULT_TICK_MS } from './game/constants.js';

const ConfigSchema = z.object({
    host: z.string().min(1),
    port: z.coerce.number().int().min(0).max(65535),
    tickMs: z.coerce.number().int().positive(),
    commandQueueCapacity: z.coerce.number().int().positive(),
    broadcastHighWaterBytes: z.coerce.number().int().positive(),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
    nodeEnv: z.string()
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, name: string, defaultValue: string): string {
    return env[name] || defaultValue;
}

export function loadConfig(env: Env = process.env): Config {
    const parsed = ConfigSchema.safeParse({
        host: optionalEnv(env, 'HOST', '127.0.0.1'),
        port: optionalEnv(env, 'PORT', '3000'),
        tickMs: optionalEnv(env, 'TICK_MS', `${DEFAULT_TICK_MS}`),
        commandQueueCapacity: optionalEnv(env, 'COMMAND_QUEUE_CAPACITY', `${DEFAULT_QUEUE_CAPACITY}`),
        broadcastHighWaterBytes: optionalEnv(env, 'BROADCAST_HIGH_WATER_BYTES', `${1024 * 1024}`),
        logLevel: optionalEnv(env, 'LOG_LEVEL', 'info'),
        nodeEnv: optionalEnv(env, 'NODE_ENV', 'development')
    });

    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }

    return parsed.data;
}
