import { StepErrorKind } from './types';

export class WorkflowError extends Error {
    readonly code: string;
    readonly details: Record<string, unknown>;

    constructor(message: string, code = 'WORKFLOW_ERROR', details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'WorkflowError';
        this.code = code;
        this.details = details;
    }
}

export type ValidationIssue =
    | 'no_steps'
    | 'duplicate_step'
    | 'unknown_step'
    | 'cycle'
    | 'unsatisfied_input'
    | 'frozen'
    | 'duplicate_definition';

// Structural problems with a workflow definition. Raised at registration,
// never after a definition has been (partially) applied.
export class ValidationError extends WorkflowError {
    readonly issue: ValidationIssue;
    readonly stepName: string | null;

    constructor(issue: ValidationIssue, message: string, stepName: string | null = null) {
        super(message, 'VALIDATION_FAILED', { issue, stepName });
        this.name = 'ValidationError';
        this.issue = issue;
        this.stepName = stepName;
    }
}

export class DuplicateDefinitionError extends ValidationError {
    readonly workflowId: string;

    constructor(workflowId: string) {
        super('duplicate_definition', `Workflow "${workflowId}" is already registered`);
        this.name = 'DuplicateDefinitionError';
        this.workflowId = workflowId;
    }
}

export class NotFoundError extends WorkflowError {
    constructor(what: string, id: string) {
        super(`${what} "${id}" not found`, 'NOT_FOUND', { what, id });
        this.name = 'NotFoundError';
    }
}

export class ConcurrencyLimitError extends WorkflowError {
    readonly limit: number;

    constructor(limit: number) {
        super(`Maximum of ${limit} concurrent workflow executions reached`, 'CONCURRENCY_LIMIT', { limit });
        this.name = 'ConcurrencyLimitError';
        this.limit = limit;
    }
}

export class MissingInputError extends WorkflowError {
    readonly stepName: string;
    readonly missing: readonly string[];

    constructor(stepName: string, missing: readonly string[]) {
        super(`Step "${stepName}" is missing required inputs: ${missing.join(', ')}`, 'MISSING_INPUT', {
            stepName,
            missing,
        });
        this.name = 'MissingInputError';
        this.stepName = stepName;
        this.missing = missing;
    }
}

export class StepTimeoutError extends WorkflowError {
    readonly kind: StepErrorKind = 'timeout';
    readonly stepName: string;
    readonly timeoutMs: number;

    constructor(stepName: string, timeoutMs: number) {
        super(`Step "${stepName}" timed out after ${timeoutMs}ms`, 'STEP_TIMEOUT', { stepName, timeoutMs });
        this.name = 'StepTimeoutError';
        this.stepName = stepName;
        this.timeoutMs = timeoutMs;
    }
}

export class StepExecutionError extends WorkflowError {
    readonly kind: StepErrorKind;
    readonly stepName: string;

    constructor(stepName: string, reason: string, kind: 'execution' | 'contract' = 'execution', cause?: unknown) {
        super(`Step "${stepName}" failed: ${reason}`, 'STEP_FAILED', { stepName, kind }, { cause });
        this.name = 'StepExecutionError';
        this.kind = kind;
        this.stepName = stepName;
    }
}

export class ExecutionTimeoutError extends WorkflowError {
    constructor(workflowId: string, budgetMs: number) {
        super(`Workflow "${workflowId}" exceeded its ${budgetMs}ms execution budget`, 'EXECUTION_TIMEOUT', {
            workflowId,
            budgetMs,
        });
        this.name = 'ExecutionTimeoutError';
    }
}

export class StateError extends WorkflowError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, 'STATE_ERROR', details);
        this.name = 'StateError';
    }
}

export type StepFailure = StepTimeoutError | StepExecutionError;

export function isStepFailure(err: unknown): err is StepFailure {
    return err instanceof StepTimeoutError || err instanceof StepExecutionError;
}

export function describeError(err: unknown): { message: string; name: string } {
    return err instanceof Error
        ? { message: err.message, name: err.name }
        : { message: String(err), name: 'Error' };
}
