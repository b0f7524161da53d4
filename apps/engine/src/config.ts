import 'dotenv/config';
import { WorkflowError } from '@stepweave/sdk';

export type StateBackend = 'memory' | 'redis' | 'postgres';

const STATE_BACKENDS: readonly StateBackend[] = ['memory', 'redis', 'postgres'];

export interface EngineConfig {
    maxConcurrentWorkflows: number;
    maxParallelSteps: number;
    stepTimeoutMs: number;
    maxEventHistory: number;
    stateBackend: StateBackend;
    redisUrl: string;
    redisPrefix: string;
    redisTtlSeconds: number;
    databaseUrl: string | null;
    stateCleanupIntervalMs: number;
    stateMaxAgeMs: number;
    /** agent type → host:port of a remote ExecutorService */
    executorEndpoints: Record<string, string>;
}

function invalid(name: string, value: string, expected: string): WorkflowError {
    return new WorkflowError(`Invalid ${name}: "${value}" (expected ${expected})`, 'CONFIG_INVALID', { name, value });
}

function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
    const raw = env[name] || String(fallback);
    const value = parseInt(raw, 10);
    if (Number.isNaN(value) || value < min || String(value) !== raw.trim()) {
        throw invalid(name, raw, `an integer >= ${min}`);
    }
    return value;
}

function isStateBackend(value: string): value is StateBackend {
    return (STATE_BACKENDS as readonly string[]).includes(value);
}

export function parseExecutorEndpoints(raw: string | undefined): Record<string, string> {
    const endpoints: Record<string, string> = {};
    if (!raw || raw.trim() === '') return endpoints;

    for (const entry of raw.split(',')) {
        const [agentType, address, ...rest] = entry.split('=').map(part => part.trim());
        if (!agentType || !address || rest.length > 0) {
            throw invalid('EXECUTOR_ENDPOINTS', entry, 'agent=host:port');
        }
        endpoints[agentType] = address;
    }
    return endpoints;
}

// Central configuration, read once at startup.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const stateBackend = env.STATE_BACKEND || 'memory';
    if (!isStateBackend(stateBackend)) {
        throw invalid('STATE_BACKEND', stateBackend, STATE_BACKENDS.join(' | '));
    }

    const databaseUrl = env.DATABASE_URL || null;
    if (stateBackend === 'postgres' && databaseUrl === null) {
        throw new WorkflowError('DATABASE_URL is required when STATE_BACKEND=postgres', 'CONFIG_INVALID', {
            name: 'DATABASE_URL',
        });
    }

    return {
        maxConcurrentWorkflows: intFromEnv(env, 'MAX_CONCURRENT_WORKFLOWS', 10, 1),
        maxParallelSteps: intFromEnv(env, 'MAX_PARALLEL_STEPS', 4, 1),
        stepTimeoutMs: intFromEnv(env, 'STEP_TIMEOUT_MS', 300_000, 1),
        maxEventHistory: intFromEnv(env, 'MAX_EVENT_HISTORY', 1000, 1),
        stateBackend,
        redisUrl: env.REDIS_URL || 'redis://localhost:6379',
        redisPrefix: env.REDIS_PREFIX || 'stepweave:state:',
        redisTtlSeconds: intFromEnv(env, 'REDIS_TTL_SECONDS', 86_400, 0),
        databaseUrl,
        stateCleanupIntervalMs: intFromEnv(env, 'STATE_CLEANUP_INTERVAL_MS', 3_600_000, 1),
        stateMaxAgeMs: intFromEnv(env, 'STATE_MAX_AGE_MS', 86_400_000, 0),
        executorEndpoints: parseExecutorEndpoints(env.EXECUTOR_ENDPOINTS),
    };
}
