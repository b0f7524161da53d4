export { loadConfig, parseExecutorEndpoints } from './config';
export type { EngineConfig, StateBackend } from './config';
export { createRuntime } from './runtime';
export type { Runtime, RuntimeDeps } from './runtime';
export * from './services';
export { MemoryStateStore } from './stores/memory-state-store';
export { RedisStateStore } from './stores/redis-state-store';
export type { RedisStateClient, RedisStateStoreOptions } from './stores/redis-state-store';
export { PostgresStateStore } from './stores/postgres-state-store';
export {
    createStateRecord,
    fromPersisted,
    toPersisted,
    persistedStateRecordSchema,
} from './stores/state-record';
export type { NewStateRecord, PersistedStateRecord, StateRecord } from './stores/state-record';
export type { StateStore } from './stores/state-store';
export { createPgDatabase, createPool, createRedis } from './db';
export type { SqlClient, SqlDatabase, SqlQueryResult, SqlTransactionClient } from './db';
export { createRequirementsAnalysisWorkflow, requirementsAnalysisSteps } from './workflows';
