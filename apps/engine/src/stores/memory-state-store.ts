import { ExecutionStatus, NotFoundError, StepData } from '@stepweave/sdk';
import { Mutex } from '../utils/mutex';
import {
    applyProgress,
    applyStatus,
    applyStepCompleted,
    assertProgress,
    cloneRecord,
    isExpired,
    StateRecord,
} from './state-record';
import { StateStore } from './state-store';

const TAG = '[state:memory]';

export interface MemoryStateStoreOptions {
    clock?: () => Date;
}

// Single-process store. One mutex guards the whole map, records are cloned
// on the way in and out so callers never hold a live reference.
export class MemoryStateStore implements StateStore {
    private states = new Map<string, StateRecord>();
    private readonly lock = new Mutex();
    private readonly clock: () => Date;

    constructor(options: MemoryStateStoreOptions = {}) {
        this.clock = options.clock ?? (() => new Date());
    }

    async save(id: string, record: StateRecord): Promise<void> {
        await this.lock.runExclusive(() => {
            this.states.set(id, cloneRecord(record));
        });
    }

    async get(id: string): Promise<StateRecord | null> {
        return this.lock.runExclusive(() => {
            const record = this.states.get(id);
            return record ? cloneRecord(record) : null;
        });
    }

    async delete(id: string): Promise<boolean> {
        return this.lock.runExclusive(() => this.states.delete(id));
    }

    async list(): Promise<StateRecord[]> {
        return this.lock.runExclusive(() => Array.from(this.states.values(), cloneRecord));
    }

    async updateProgress(id: string, progress: number, currentStep?: string | null): Promise<void> {
        assertProgress(progress);
        await this.mutate(id, record => applyProgress(record, progress, currentStep, this.clock()));
    }

    async markStepCompleted(id: string, stepName: string, stepOutput?: StepData): Promise<void> {
        await this.mutate(id, record => applyStepCompleted(record, stepName, stepOutput, this.clock()));
        console.log(`${TAG} ${id} step completed: ${stepName}`);
    }

    async updateStatus(id: string, status: ExecutionStatus, error?: string | null): Promise<void> {
        await this.mutate(id, record => applyStatus(record, status, error, this.clock()));
    }

    async cleanupExpired(maxAgeMs: number): Promise<string[]> {
        return this.lock.runExclusive(() => {
            const now = this.clock();
            const expired = Array.from(this.states.entries())
                .filter(([, record]) => isExpired(record, maxAgeMs, now))
                .map(([id]) => id);

            for (const id of expired) this.states.delete(id);
            if (expired.length > 0) {
                console.log(`${TAG} cleaned up ${expired.length} expired states`);
            }
            return expired;
        });
    }

    async close(): Promise<void> {
        await this.lock.runExclusive(() => this.states.clear());
    }

    // Mutates a copy and swaps it in, so a throwing mutation leaves the stored record untouched.
    private async mutate(id: string, fn: (record: StateRecord) => void): Promise<void> {
        await this.lock.runExclusive(() => {
            const current = this.states.get(id);
            if (!current) throw new NotFoundError('Workflow state', id);
            const next = cloneRecord(current);
            fn(next);
            this.states.set(id, next);
        });
    }
}
