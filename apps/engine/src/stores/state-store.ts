import { ExecutionStatus, StepData } from '@stepweave/sdk';
import { StateRecord } from './state-record';

/**
 * Persistence contract the engine needs for per-execution progress.
 * Read-modify-write operations on one record are serialized by every
 * implementation. Mutations of an unknown id throw NotFoundError.
 */
export interface StateStore {
    /** Whole-record replace. */
    save(id: string, record: StateRecord): Promise<void>;
    get(id: string): Promise<StateRecord | null>;
    delete(id: string): Promise<boolean>;
    list(): Promise<StateRecord[]>;

    /** Rejects progress outside [0, 1] with StateError, leaving the record unchanged. */
    updateProgress(id: string, progress: number, currentStep?: string | null): Promise<void>;
    /** Idempotent on stepsCompleted; stores stepOutput under data[`step_${stepName}`]. */
    markStepCompleted(id: string, stepName: string, stepOutput?: StepData): Promise<void>;
    updateStatus(id: string, status: ExecutionStatus, error?: string | null): Promise<void>;

    /** Removes every record at least maxAgeMs old; returns the removed ids. */
    cleanupExpired(maxAgeMs: number): Promise<string[]>;
    close(): Promise<void>;
}
