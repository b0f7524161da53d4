export type StepData = Record<string, unknown>;

/**
 * Lifecycle states for a single workflow execution.
 * Executions progress: PENDING → RUNNING → COMPLETED/FAILED/TERMINATED
 */
export type ExecutionStatus =
    | 'pending'
    | 'running'
    | 'waiting'
    | 'completed'
    | 'failed'
    | 'terminated';

export const EXECUTION_STATUSES: readonly ExecutionStatus[] = [
    'pending',
    'running',
    'waiting',
    'completed',
    'failed',
    'terminated',
];

export const TERMINAL_STATUSES: ReadonlySet<ExecutionStatus> = new Set<ExecutionStatus>([
    'completed',
    'failed',
    'terminated',
]);

export function isTerminalStatus(status: ExecutionStatus): boolean {
    return TERMINAL_STATUSES.has(status);
}

export function isExecutionStatus(value: unknown): value is ExecutionStatus {
    return typeof value === 'string' && (EXECUTION_STATUSES as readonly string[]).includes(value);
}

export type ExecutionStrategy = 'sequential' | 'parallel' | 'adaptive';

export type StepErrorKind = 'timeout' | 'execution' | 'contract';

export interface RetryPolicy {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    retryableKinds: readonly StepErrorKind[];
}

export interface StepSpec {
    name: string;
    description?: string;
    agentType: string;
    requiredInputs?: Iterable<string>;
    optionalInputs?: Iterable<string>;
    outputs?: Iterable<string>;
    timeoutMs?: number;
    retryPolicy?: Partial<RetryPolicy>;
    metadata?: Record<string, unknown>;
}

export const WorkflowEvents = {
    WORKFLOW_STARTED: 'workflow_started',
    WORKFLOW_COMPLETED: 'workflow_completed',
    WORKFLOW_FAILED: 'workflow_failed',
    WORKFLOW_TERMINATED: 'workflow_terminated',
    STEP_STARTED: 'step_started',
    STEP_RETRYING: 'step_retrying',
    STEP_COMPLETED: 'step_completed',
    STEP_FAILED: 'step_failed',
} as const;

export type WorkflowEventType = (typeof WorkflowEvents)[keyof typeof WorkflowEvents];

export interface WorkflowResult {
    readonly workflowId: string;
    readonly executionId: string;
    readonly status: ExecutionStatus;
    readonly success: boolean;
    readonly stepsResults: Readonly<Record<string, StepData>>;
    readonly data: Readonly<StepData>;
    readonly startTime: Date;
    readonly endTime: Date;
    readonly durationMs: number;
    readonly errors: readonly string[];
    readonly warnings: readonly string[];
    /** First fatal cause, null on success. */
    readonly error: string | null;
    readonly failedStep: string | null;
    readonly metadata: Readonly<Record<string, unknown>>;
}
