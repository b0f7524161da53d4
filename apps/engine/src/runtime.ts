import {
    createGrpcExecutor,
    ExecutorRegistry,
    ExecutorServiceClient,
    loadExecutorServiceClient,
} from '@stepweave/sdk';
import { EngineConfig } from './config';
import { createPgDatabase, createPool, createRedis, SqlDatabase } from './db';
import { EventBus } from './services/event-bus';
import { StateReaper } from './services/state-reaper';
import { WorkflowEngine } from './services/workflow-engine';
import { MemoryStateStore } from './stores/memory-state-store';
import { PostgresStateStore } from './stores/postgres-state-store';
import { RedisStateClient, RedisStateStore } from './stores/redis-state-store';
import { StateStore } from './stores/state-store';

const TAG = '[stepweave]';

export interface RuntimeDeps {
    executors?: ExecutorRegistry;
    redis?: RedisStateClient;
    sqlDatabase?: SqlDatabase;
    connectExecutor?: (address: string) => ExecutorServiceClient;
}

export interface Runtime {
    config: EngineConfig;
    engine: WorkflowEngine;
    eventBus: EventBus;
    stateStore: StateStore;
    executors: ExecutorRegistry;
    reaper: StateReaper;
    start(): Promise<void>;
    shutdown(): Promise<void>;
}

function createStateStore(config: EngineConfig, deps: RuntimeDeps): StateStore {
    switch (config.stateBackend) {
        case 'redis':
            return new RedisStateStore(deps.redis ?? createRedis(config.redisUrl), {
                prefix: config.redisPrefix,
                ttlSeconds: config.redisTtlSeconds,
            });
        case 'postgres': {
            if (!deps.sqlDatabase && config.databaseUrl === null) {
                throw new Error('DATABASE_URL is required for the postgres state backend');
            }
            const db = deps.sqlDatabase ?? createPgDatabase(createPool(config.databaseUrl ?? ''));
            return new PostgresStateStore(db);
        }
        case 'memory':
            return new MemoryStateStore();
    }
}

// Wiring: one store, bus, registry, engine and reaper per process.
export function createRuntime(config: EngineConfig, deps: RuntimeDeps = {}): Runtime {
    const stateStore = createStateStore(config, deps);
    const eventBus = new EventBus({ maxHistory: config.maxEventHistory });
    const executors = deps.executors ?? new ExecutorRegistry();
    const engine = new WorkflowEngine({
        stateStore,
        eventBus,
        executors,
        maxConcurrentWorkflows: config.maxConcurrentWorkflows,
        maxParallelSteps: config.maxParallelSteps,
        stepTimeoutMs: config.stepTimeoutMs,
    });
    const reaper = new StateReaper(stateStore, config.stateMaxAgeMs, config.stateCleanupIntervalMs);
    const connectExecutor = deps.connectExecutor ?? ((address: string) => loadExecutorServiceClient(address));
    const clients: ExecutorServiceClient[] = [];

    return {
        config,
        engine,
        eventBus,
        stateStore,
        executors,
        reaper,

        async start() {
            console.log(`${TAG} starting engine... (state: ${config.stateBackend})`);

            if (stateStore instanceof PostgresStateStore) {
                await stateStore.migrate();
            }

            for (const [agentType, address] of Object.entries(config.executorEndpoints)) {
                const client = connectExecutor(address);
                clients.push(client);
                executors.register(agentType, createGrpcExecutor(client));
                console.log(`${TAG} remote executor ${agentType} → ${address}`);
            }

            reaper.start();
            console.log(`${TAG} engine ready`);
        },

        async shutdown() {
            reaper.stop();
            for (const client of clients.splice(0)) client.close();
            await stateStore.close();
            console.log(`${TAG} shutdown complete`);
        },
    };
}
