import { ExecutionStatus, NotFoundError, StepData } from '@stepweave/sdk';
import { Mutex } from '../utils/mutex';
import {
    applyProgress,
    applyStatus,
    applyStepCompleted,
    assertProgress,
    fromPersisted,
    isExpired,
    StateRecord,
    toPersisted,
} from './state-record';
import { StateStore } from './state-store';

const TAG = '[state:redis]';

/** The ioredis commands the store uses; an ioredis client satisfies it. */
export interface RedisStateClient {
    get(key: string): Promise<string | null>;
    set(key: string, value: string): Promise<unknown>;
    setex(key: string, seconds: number, value: string): Promise<unknown>;
    del(key: string): Promise<number>;
    scanStream(options: { match: string; count?: number }): AsyncIterable<string[]>;
    quit(): Promise<unknown>;
}

export interface RedisStateStoreOptions {
    prefix?: string;
    /** Key expiry in seconds; 0 keeps keys until deleted. */
    ttlSeconds?: number;
    clock?: () => Date;
}

// Records are stored as JSON in the persisted shape under `${prefix}${id}`.
// Read-modify-write sequences are serialized in-process; the engine is the
// only writer for the executions it runs.
export class RedisStateStore implements StateStore {
    private readonly prefix: string;
    private readonly ttlSeconds: number;
    private readonly clock: () => Date;
    private readonly lock = new Mutex();

    constructor(
        private readonly redis: RedisStateClient,
        options: RedisStateStoreOptions = {},
    ) {
        this.prefix = options.prefix ?? 'stepweave:state:';
        this.ttlSeconds = options.ttlSeconds ?? 86400;
        this.clock = options.clock ?? (() => new Date());
    }

    async save(id: string, record: StateRecord): Promise<void> {
        await this.lock.runExclusive(() => this.write(id, record));
    }

    async get(id: string): Promise<StateRecord | null> {
        return this.read(this.key(id));
    }

    async delete(id: string): Promise<boolean> {
        return this.lock.runExclusive(async () => (await this.redis.del(this.key(id))) > 0);
    }

    async list(): Promise<StateRecord[]> {
        const records: StateRecord[] = [];
        for (const key of await this.scanKeys()) {
            const record = await this.read(key);
            if (record) records.push(record);
        }
        return records;
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
        return this.lock.runExclusive(async () => {
            const now = this.clock();
            const removed: string[] = [];
            for (const key of await this.scanKeys()) {
                const record = await this.read(key);
                if (record && isExpired(record, maxAgeMs, now)) {
                    await this.redis.del(key);
                    removed.push(key.slice(this.prefix.length));
                }
            }
            if (removed.length > 0) {
                console.log(`${TAG} cleaned up ${removed.length} expired states`);
            }
            return removed;
        });
    }

    async close(): Promise<void> {
        await this.redis.quit();
    }

    // SCAN may repeat a key across batches
    private async scanKeys(): Promise<string[]> {
        const keys = new Set<string>();
        for await (const batch of this.redis.scanStream({ match: `${this.prefix}*`, count: 100 })) {
            for (const key of batch) keys.add(key);
        }
        return [...keys];
    }

    private key(id: string): string {
        return `${this.prefix}${id}`;
    }

    private async read(key: string): Promise<StateRecord | null> {
        const raw = await this.redis.get(key);
        if (raw === null) return null;
        return fromPersisted(JSON.parse(raw));
    }

    private async write(id: string, record: StateRecord): Promise<void> {
        const payload = JSON.stringify(toPersisted(record));
        if (this.ttlSeconds > 0) {
            await this.redis.setex(this.key(id), this.ttlSeconds, payload);
        } else {
            await this.redis.set(this.key(id), payload);
        }
    }

    private async mutate(id: string, fn: (record: StateRecord) => void): Promise<void> {
        await this.lock.runExclusive(async () => {
            const record = await this.read(this.key(id));
            if (!record) throw new NotFoundError('Workflow state', id);
            fn(record);
            await this.write(id, record);
        });
    }
}
