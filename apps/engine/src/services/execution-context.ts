import { v7 as uuidv7 } from 'uuid';
import {
    ExecutionStatus,
    isTerminalStatus,
    MissingInputError,
    StateError,
    Step,
    StepData,
} from '@stepweave/sdk';
import { Mutex } from '../utils/mutex';

const TRANSITIONS: Record<ExecutionStatus, readonly ExecutionStatus[]> = {
    pending: ['running', 'failed', 'terminated'],
    running: ['waiting', 'completed', 'failed', 'terminated'],
    waiting: ['running', 'failed', 'terminated'],
    completed: [],
    failed: [],
    terminated: [],
};

export interface ExecutionContextInit {
    workflowId: string;
    executionId?: string;
    data?: StepData;
    metadata?: Record<string, unknown>;
}

/**
 * Mutable state of one workflow execution. Owned by the engine: status
 * changes go through transition(), data grows only through mergeOutputs().
 */
export class ExecutionContext {
    readonly workflowId: string;
    readonly executionId: string;
    readonly metadata: Record<string, unknown>;

    private _status: ExecutionStatus = 'pending';
    private _startTime: Date | null = null;
    private _endTime: Date | null = null;
    private _currentStep: string | null = null;
    private _error: string | null = null;
    private _terminationReason: string | null = null;
    private readonly _data: StepData;
    // output key → step that last wrote it
    private readonly writers = new Map<string, string>();
    private readonly lock = new Mutex();

    constructor(init: ExecutionContextInit) {
        this.workflowId = init.workflowId;
        this.executionId = init.executionId ?? uuidv7();
        this._data = { ...init.data };
        this.metadata = { ...init.metadata };
    }

    get status(): ExecutionStatus {
        return this._status;
    }

    get startTime(): Date | null {
        return this._startTime;
    }

    get endTime(): Date | null {
        return this._endTime;
    }

    get currentStep(): string | null {
        return this._currentStep;
    }

    get error(): string | null {
        return this._error;
    }

    get terminationReason(): string | null {
        return this._terminationReason;
    }

    get data(): Readonly<StepData> {
        return this._data;
    }

    get isTerminal(): boolean {
        return isTerminalStatus(this._status);
    }

    canTransition(to: ExecutionStatus): boolean {
        return TRANSITIONS[this._status].includes(to);
    }

    transition(to: ExecutionStatus, now: Date = new Date()): void {
        if (!this.canTransition(to)) {
            throw new StateError(`Execution ${this.executionId} cannot move from ${this._status} to ${to}`, {
                from: this._status,
                to,
            });
        }
        this._status = to;
        if (to === 'running' && this._startTime === null) this._startTime = now;
        if (isTerminalStatus(to)) this._endTime = now;
    }

    start(now?: Date): void {
        this.transition('running', now);
    }

    complete(now?: Date): void {
        this.transition('completed', now);
        this._currentStep = null;
    }

    fail(error: string, now?: Date): void {
        this.transition('failed', now);
        this._error = error;
    }

    /** Returns false when the execution has already finished. */
    terminate(reason: string, now?: Date): boolean {
        if (this.isTerminal) return false;
        this.transition('terminated', now);
        this._terminationReason = reason;
        this._error = `Terminated: ${reason}`;
        return true;
    }

    /** Adds caller input to a context that has not started yet. */
    seed(input: StepData): void {
        if (this._status !== 'pending') {
            throw new StateError(`Execution ${this.executionId} has already started`, { status: this._status });
        }
        Object.assign(this._data, input);
    }

    setCurrentStep(name: string | null): void {
        this._currentStep = name;
    }

    /** Required and present optional inputs of `step`, copied from the data. */
    resolveInputs(step: Step): StepData {
        const missing = step.validateInputs(this._data);
        if (missing.length > 0) {
            throw new MissingInputError(step.name, missing);
        }

        const input: StepData = {};
        for (const name of step.allInputs()) {
            if (Object.prototype.hasOwnProperty.call(this._data, name)) {
                input[name] = this._data[name];
            }
        }
        return input;
    }

    /**
     * Writes `outputs` into the data under the context lock. Returns one
     * warning per key that another step had already written.
     */
    async mergeOutputs(stepName: string, outputs: StepData): Promise<string[]> {
        return this.lock.runExclusive(() => {
            const warnings: string[] = [];
            for (const [key, value] of Object.entries(outputs)) {
                const previous = this.writers.get(key);
                if (previous !== undefined && previous !== stepName) {
                    warnings.push(`Output "${key}" of step "${stepName}" overwrote the value written by step "${previous}"`);
                }
                this._data[key] = value;
                this.writers.set(key, stepName);
            }
            return warnings;
        });
    }

    snapshotData(): StepData {
        return { ...this._data };
    }

    toJSON(): Record<string, unknown> {
        return {
            workflowId: this.workflowId,
            executionId: this.executionId,
            status: this._status,
            startTime: this._startTime?.toISOString() ?? null,
            endTime: this._endTime?.toISOString() ?? null,
            currentStep: this._currentStep,
            data: this.snapshotData(),
            metadata: { ...this.metadata },
            error: this._error,
            terminationReason: this._terminationReason,
        };
    }
}
