import { ExecutionStatus, NotFoundError, StepData } from '@stepweave/sdk';
import { SqlDatabase } from '../db';
import { TransactionManager } from '../db/transaction.manager';
import {
    CREATE_WORKFLOW_STATES_SQL,
    DELETE_EXPIRED_STATES_SQL,
    DELETE_STATE_SQL,
    SELECT_ALL_STATES_SQL,
    SELECT_STATE_FOR_UPDATE_SQL,
    SELECT_STATE_SQL,
    UPSERT_STATE_SQL,
} from '../db/workflow-state.entity';
import {
    applyProgress,
    applyStatus,
    applyStepCompleted,
    assertProgress,
    fromPersisted,
    StateRecord,
    toPersisted,
} from './state-record';
import { StateStore } from './state-store';

const TAG = '[state:postgres]';

export interface PostgresStateStoreOptions {
    clock?: () => Date;
}

function upsertParams(id: string, record: StateRecord): unknown[] {
    const p = toPersisted(record);
    return [
        id,
        p.workflow_id,
        p.execution_id,
        p.status,
        p.current_step,
        JSON.stringify(p.steps_completed),
        JSON.stringify(p.steps_remaining),
        p.progress,
        JSON.stringify(p.data),
        p.error,
        p.created_at,
        p.updated_at,
        JSON.stringify(p.metadata),
    ];
}

function idOf(row: unknown): string | null {
    if (typeof row === 'object' && row !== null && 'id' in row && typeof row.id === 'string') {
        return row.id;
    }
    return null;
}

// Mutations lock the row with SELECT ... FOR UPDATE inside a transaction, so
// concurrent writers across processes see each other's updates.
export class PostgresStateStore implements StateStore {
    private readonly tx: TransactionManager;
    private readonly clock: () => Date;

    constructor(
        private readonly db: SqlDatabase,
        options: PostgresStateStoreOptions = {},
    ) {
        this.tx = new TransactionManager(db);
        this.clock = options.clock ?? (() => new Date());
    }

    async migrate(): Promise<void> {
        await this.db.query(CREATE_WORKFLOW_STATES_SQL);
        console.log(`${TAG} schema ready`);
    }

    async save(id: string, record: StateRecord): Promise<void> {
        await this.db.query(UPSERT_STATE_SQL, upsertParams(id, record));
    }

    async get(id: string): Promise<StateRecord | null> {
        const res = await this.db.query(SELECT_STATE_SQL, [id]);
        const row = res.rows[0];
        return row === undefined ? null : fromPersisted(row);
    }

    async delete(id: string): Promise<boolean> {
        const res = await this.db.query(DELETE_STATE_SQL, [id]);
        return (res.rowCount ?? 0) > 0;
    }

    async list(): Promise<StateRecord[]> {
        const res = await this.db.query(SELECT_ALL_STATES_SQL);
        return res.rows.map(row => fromPersisted(row));
    }

    async updateProgress(id: string, progress: number, currentStep?: string | null): Promise<void> {
        assertProgress(progress);
        await this.mutate(id, record => applyProgress(record, progress, currentStep, this.clock()));
    }

    async markStepCompleted(id: string, stepName: string, stepOutput?: StepData): Promise<void> {
        await this.mutate(id, record => applyStepCompleted(record, stepName, stepOutput, this.clock()));
    }

    async updateStatus(id: string, status: ExecutionStatus, error?: string | null): Promise<void> {
        await this.mutate(id, record => applyStatus(record, status, error, this.clock()));
    }

    async cleanupExpired(maxAgeMs: number): Promise<string[]> {
        const cutoff = new Date(this.clock().getTime() - maxAgeMs);
        const res = await this.db.query(DELETE_EXPIRED_STATES_SQL, [cutoff.toISOString()]);
        const removed = res.rows.map(idOf).filter((id): id is string => id !== null);
        if (removed.length > 0) {
            console.log(`${TAG} cleaned up ${removed.length} expired states`);
        }
        return removed;
    }

    async close(): Promise<void> {
        await this.db.end();
    }

    private async mutate(id: string, fn: (record: StateRecord) => void): Promise<void> {
        await this.tx.run(async client => {
            const res = await client.query(SELECT_STATE_FOR_UPDATE_SQL, [id]);
            const row = res.rows[0];
            if (row === undefined) throw new NotFoundError('Workflow state', id);

            const record = fromPersisted(row);
            fn(record);
            await client.query(UPSERT_STATE_SQL, upsertParams(id, record));
        });
    }
}
