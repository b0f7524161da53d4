import { z } from 'zod';
import {
    deserializeStepData,
    ExecutionStatus,
    isExecutionStatus,
    isTerminalStatus,
    serialize,
    StateError,
    StepData,
} from '@stepweave/sdk';

/**
 * Progress snapshot of one workflow execution, as kept by a StateStore.
 * Invariants: stepsCompleted ∩ stepsRemaining = ∅, updatedAt never decreases.
 */
export interface StateRecord {
    workflowId: string;
    executionId: string;
    status: ExecutionStatus;
    currentStep: string | null;
    stepsCompleted: string[];
    stepsRemaining: string[];
    progress: number;
    data: StepData;
    error: string | null;
    createdAt: Date;
    updatedAt: Date;
    metadata: Record<string, unknown>;
}

export interface NewStateRecord {
    workflowId: string;
    executionId: string;
    steps: readonly string[];
    status?: ExecutionStatus;
    data?: StepData;
    metadata?: Record<string, unknown>;
}

export function createStateRecord(init: NewStateRecord, now: Date = new Date()): StateRecord {
    return {
        workflowId: init.workflowId,
        executionId: init.executionId,
        status: init.status ?? 'pending',
        currentStep: null,
        stepsCompleted: [],
        stepsRemaining: [...init.steps],
        progress: 0,
        data: { ...init.data },
        error: null,
        createdAt: new Date(now),
        updatedAt: new Date(now),
        metadata: { ...init.metadata },
    };
}

export function cloneRecord(record: StateRecord): StateRecord {
    return structuredClone(record);
}

export function assertProgress(progress: number): void {
    if (!Number.isFinite(progress) || progress < 0 || progress > 1) {
        throw new StateError(`Progress must be between 0 and 1, got ${progress}`, { progress });
    }
}

function touch(record: StateRecord, now: Date): void {
    if (now.getTime() > record.updatedAt.getTime()) {
        record.updatedAt = new Date(now);
    }
}

export function applyProgress(record: StateRecord, progress: number, currentStep: string | null | undefined, now: Date): void {
    assertProgress(progress);
    record.progress = progress;
    if (currentStep) record.currentStep = currentStep;
    touch(record, now);
}

export function applyStepCompleted(record: StateRecord, stepName: string, stepOutput: StepData | undefined, now: Date): void {
    if (!record.stepsCompleted.includes(stepName)) {
        record.stepsCompleted.push(stepName);
    }
    record.stepsRemaining = record.stepsRemaining.filter(name => name !== stepName);
    if (stepOutput !== undefined) {
        record.data[`step_${stepName}`] = stepOutput;
    }
    touch(record, now);
}

export function applyStatus(record: StateRecord, status: ExecutionStatus, error: string | null | undefined, now: Date): void {
    if (!isExecutionStatus(status)) {
        throw new StateError(`Invalid workflow status: ${String(status)}`, { status });
    }
    if (isTerminalStatus(record.status) && status !== record.status) {
        throw new StateError(`Execution ${record.executionId} is ${record.status} and cannot become ${status}`, {
            from: record.status,
            to: status,
        });
    }
    record.status = status;
    if (error !== undefined) record.error = error;
    touch(record, now);
}

export function isExpired(record: StateRecord, maxAgeMs: number, now: Date): boolean {
    return now.getTime() - record.createdAt.getTime() >= maxAgeMs;
}

// Persisted shape shared by every durable backend.
export const persistedStateRecordSchema = z.object({
    workflow_id: z.string(),
    execution_id: z.string(),
    status: z.enum(['pending', 'running', 'waiting', 'completed', 'failed', 'terminated']),
    current_step: z.string().nullable().default(null),
    steps_completed: z.array(z.string()),
    steps_remaining: z.array(z.string()),
    progress: z.number().min(0).max(1),
    data: z.record(z.string(), z.unknown()).default({}),
    error: z.string().nullable().default(null),
    created_at: z.coerce.date(),
    updated_at: z.coerce.date(),
    metadata: z.record(z.string(), z.unknown()).default({}),
});

export interface PersistedStateRecord {
    workflow_id: string;
    execution_id: string;
    status: ExecutionStatus;
    current_step: string | null;
    steps_completed: string[];
    steps_remaining: string[];
    progress: number;
    data: StepData;
    error: string | null;
    created_at: string;
    updated_at: string;
    metadata: Record<string, unknown>;
}

const encodedValuesSchema = z.record(z.string(), z.unknown());

// data and metadata are stored as superjson envelopes ({ json, meta }) so
// Dates, BigInts, Maps and Sets come back as themselves.
function encodeValues(values: Record<string, unknown>): Record<string, unknown> {
    return encodedValuesSchema.parse(JSON.parse(serialize(values)));
}

function decodeValues(encoded: Record<string, unknown>): Record<string, unknown> {
    return deserializeStepData(JSON.stringify(encoded));
}

export function toPersisted(record: StateRecord): PersistedStateRecord {
    return {
        workflow_id: record.workflowId,
        execution_id: record.executionId,
        status: record.status,
        current_step: record.currentStep,
        steps_completed: [...record.stepsCompleted],
        steps_remaining: [...record.stepsRemaining],
        progress: record.progress,
        data: encodeValues(record.data),
        error: record.error,
        created_at: record.createdAt.toISOString(),
        updated_at: record.updatedAt.toISOString(),
        metadata: encodeValues(record.metadata),
    };
}

export function fromPersisted(raw: unknown): StateRecord {
    const parsed = persistedStateRecordSchema.safeParse(raw);
    if (!parsed.success) {
        throw new StateError(`Malformed state record: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    const r = parsed.data;
    return {
        workflowId: r.workflow_id,
        executionId: r.execution_id,
        status: r.status,
        currentStep: r.current_step,
        stepsCompleted: r.steps_completed,
        stepsRemaining: r.steps_remaining,
        progress: r.progress,
        data: decodeValues(r.data),
        error: r.error,
        createdAt: r.created_at,
        updatedAt: r.updated_at,
        metadata: decodeValues(r.metadata),
    };
}
