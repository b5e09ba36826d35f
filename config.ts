import { z } from 'zod';
import { ConfigError } from './errors';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const isPowerOfTwo = (n: number) => (n & (n - 1)) === 0;

export const configSchema = z.object({
    /** Default prefetch of flatMap/merge/zip/combineLatest/publishOn queues. */
    bufferSize: z.number().int().min(2).refine(isPowerOfTwo, { message: 'must be a power of two' }).default(128),
    /** Number of workers in the default parallel scheduler. */
    parallelism: z.number().int().min(1).default(4),
    logLevel: z.enum(LOG_LEVELS).default('info'),
    /** How long a StepVerifier step waits for the next signal. */
    verifyTimeoutMs: z.number().int().positive().default(5000),
});

export type ReactorConfig = z.infer<typeof configSchema>;

export type LogLevel = ReactorConfig['logLevel'];

type Env = Record<string, string | undefined>;

function numberFrom(value: string | undefined) : number | undefined {
    if (value === undefined || value.trim() === '') {
        return undefined;
    }
    return Number(value);
}

/**
 * Reads the configuration from environment variables, falling back to the
 * schema defaults for anything unset:
 *
 * - `REACTOR_BUFFER_SIZE`
 * - `REACTOR_PARALLELISM`
 * - `REACTOR_LOG_LEVEL`
 * - `REACTOR_VERIFY_TIMEOUT_MS`
 */
export function loadConfig(env: Env = process.env) : ReactorConfig {
    const raw = {
        bufferSize: numberFrom(env.REACTOR_BUFFER_SIZE),
        parallelism: numberFrom(env.REACTOR_PARALLELISM),
        logLevel: env.REACTOR_LOG_LEVEL || undefined,
        verifyTimeoutMs: numberFrom(env.REACTOR_VERIFY_TIMEOUT_MS),
    };

    const result = configSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
    }
    return result.data;
}

let current : ReactorConfig | null = null;

/** The process-wide configuration, loaded from the environment on first use. */
export function getConfig() : ReactorConfig {
    if (current == null) {
        current = loadConfig();
    }
    return current;
}
