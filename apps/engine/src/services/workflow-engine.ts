import {
    ConcurrencyLimitError,
    describeError,
    DuplicateDefinitionError,
    ExecutionTimeoutError,
    executorRegistry,
    ExecutorRegistry,
    NotFoundError,
    StateError,
    Step,
    StepData,
    WorkflowDefinition,
    WorkflowEvents,
    WorkflowResult,
} from '@stepweave/sdk';
import { MemoryStateStore } from '../stores/memory-state-store';
import { createStateRecord, StateRecord } from '../stores/state-record';
import { StateStore } from '../stores/state-store';
import { EventBus } from './event-bus';
import { ExecutionContext } from './execution-context';
import { runStep } from './step-runner';

const TAG = '[engine]';

export interface WorkflowEngineOptions {
    stateStore?: StateStore;
    eventBus?: EventBus;
    executors?: ExecutorRegistry;
    maxConcurrentWorkflows?: number;
    /** Batch size for the adaptive strategy. */
    maxParallelSteps?: number;
    /** Upper bound on any single step attempt. */
    stepTimeoutMs?: number;
    sleep?: (ms: number) => Promise<void>;
    clock?: () => Date;
}

interface Run {
    definition: WorkflowDefinition;
    ctx: ExecutionContext;
    order: string[];
    deadline: number | null;
    completed: Set<string>;
    stepsResults: Record<string, StepData>;
    errors: string[];
    warnings: string[];
    failedStep: string | null;
}

/**
 * Registers workflow definitions and runs executions of them: dependency
 * order, per-step timeout and retry, progress persisted to the state store,
 * lifecycle events on the bus.
 */
export class WorkflowEngine {
    readonly stateStore: StateStore;
    readonly eventBus: EventBus;
    readonly executors: ExecutorRegistry;
    readonly maxConcurrentWorkflows: number;
    readonly maxParallelSteps: number;
    readonly stepTimeoutMs: number;

    private readonly definitions = new Map<string, WorkflowDefinition>();
    private readonly active = new Map<string, ExecutionContext>();
    // workflow id → most recent execution id
    private readonly latest = new Map<string, string>();
    private readonly sleep: ((ms: number) => Promise<void>) | undefined;
    private readonly clock: () => Date;

    constructor(options: WorkflowEngineOptions = {}) {
        this.stateStore = options.stateStore ?? new MemoryStateStore();
        this.eventBus = options.eventBus ?? new EventBus();
        this.executors = options.executors ?? executorRegistry;
        this.maxConcurrentWorkflows = options.maxConcurrentWorkflows ?? 10;
        this.maxParallelSteps = options.maxParallelSteps ?? 4;
        this.stepTimeoutMs = options.stepTimeoutMs ?? Number.POSITIVE_INFINITY;
        this.sleep = options.sleep;
        this.clock = options.clock ?? (() => new Date());

        if (!Number.isInteger(this.maxConcurrentWorkflows) || this.maxConcurrentWorkflows < 1) {
            throw new Error('maxConcurrentWorkflows must be a positive integer');
        }
        if (!Number.isInteger(this.maxParallelSteps) || this.maxParallelSteps < 1) {
            throw new Error('maxParallelSteps must be a positive integer');
        }
    }

    register(definition: WorkflowDefinition): void {
        if (this.definitions.has(definition.id)) {
            throw new DuplicateDefinitionError(definition.id);
        }
        definition.assertValid();
        definition.freeze();
        this.definitions.set(definition.id, definition);
        console.log(`${TAG} registered workflow: ${definition.id} (${definition.steps.length} steps, ${definition.strategy})`);
    }

    unregister(workflowId: string): boolean {
        for (const ctx of this.active.values()) {
            if (ctx.workflowId === workflowId) {
                throw new StateError(`Workflow "${workflowId}" has running executions`, { workflowId });
            }
        }
        return this.definitions.delete(workflowId);
    }

    getDefinition(workflowId: string): WorkflowDefinition | undefined {
        return this.definitions.get(workflowId);
    }

    listWorkflows(): string[] {
        return Array.from(this.definitions.keys());
    }

    get runningCount(): number {
        return this.active.size;
    }

    getContext(executionId: string): ExecutionContext | undefined {
        return this.active.get(executionId);
    }

    /**
     * Runs one execution to a terminal status. Step failures resolve to a
     * result with `success: false`; only an unknown workflow, a full engine
     * or an unusable context reject.
     */
    async execute(workflowId: string, input: StepData = {}, context?: ExecutionContext): Promise<WorkflowResult> {
        // everything up to `active.set` runs before the first await
        const definition = this.definitions.get(workflowId);
        if (!definition) {
            throw new NotFoundError('Workflow', workflowId);
        }
        if (this.active.size >= this.maxConcurrentWorkflows) {
            throw new ConcurrencyLimitError(this.maxConcurrentWorkflows);
        }
        if (context && context.workflowId !== workflowId) {
            throw new StateError(`Context belongs to workflow "${context.workflowId}", not "${workflowId}"`, {
                executionId: context.executionId,
            });
        }
        if (context && context.status !== 'pending') {
            throw new StateError(`Context ${context.executionId} is ${context.status}; only pending contexts can be executed`, {
                executionId: context.executionId,
            });
        }

        const ctx = context ?? new ExecutionContext({ workflowId });
        ctx.seed(input);
        this.active.set(ctx.executionId, ctx);
        this.latest.set(workflowId, ctx.executionId);

        try {
            return await this.run(definition, ctx, input);
        } finally {
            this.active.delete(ctx.executionId);
        }
    }

    /** Cooperative: the run stops before its next step. Returns false if it had already finished. */
    async terminate(executionId: string, reason = 'terminated by request'): Promise<boolean> {
        const ctx = this.active.get(executionId);
        if (!ctx) {
            throw new NotFoundError('Running execution', executionId);
        }
        if (!ctx.terminate(reason, this.clock())) return false;

        console.warn(`${TAG} execution ${executionId} terminated: ${reason}`);
        await this.stateStore.updateStatus(executionId, 'terminated', ctx.error);
        await this.eventBus.publish(WorkflowEvents.WORKFLOW_TERMINATED, {
            workflowId: ctx.workflowId,
            executionId,
            reason,
        });
        return true;
    }

    /** `id` is an execution id, or a workflow id meaning its latest execution. */
    async getState(id: string): Promise<StateRecord | null> {
        return this.stateStore.get(this.resolveExecutionId(id));
    }

    async updateState(id: string, record: StateRecord): Promise<void> {
        await this.stateStore.save(this.resolveExecutionId(id), record);
    }

    private resolveExecutionId(id: string): string {
        return this.latest.get(id) ?? id;
    }

    private async run(definition: WorkflowDefinition, ctx: ExecutionContext, input: StepData): Promise<WorkflowResult> {
        const startTime = this.clock();
        const run: Run = {
            definition,
            ctx,
            order: definition.getExecutionOrder(),
            deadline: definition.maxExecutionTimeMs === null ? null : startTime.getTime() + definition.maxExecutionTimeMs,
            completed: new Set(),
            stepsResults: {},
            errors: [],
            warnings: [],
            failedStep: null,
        };
        const ids = { workflowId: definition.id, executionId: ctx.executionId };

        ctx.start(startTime);
        console.log(`${TAG} execution ${ctx.executionId} of ${definition.id} started (${definition.strategy})`);

        try {
            await this.eventBus.publish(WorkflowEvents.WORKFLOW_STARTED, {
                ...ids,
                input: { ...input },
                strategy: definition.strategy,
                steps: [...run.order],
            });
            await this.stateStore.save(
                ctx.executionId,
                createStateRecord(
                    {
                        ...ids,
                        steps: run.order,
                        status: 'running',
                        data: ctx.snapshotData(),
                        metadata: { ...ctx.metadata, version: definition.version },
                    },
                    startTime,
                ),
            );

            if (definition.strategy === 'sequential') {
                await this.runSequential(run);
            } else {
                await this.runFrontiers(run);
            }
        } catch (err) {
            const { message } = describeError(err);
            if (run.errors.length === 0) run.errors.push(message);
            const cause = run.errors[0] ?? message;

            if (!ctx.isTerminal) {
                ctx.fail(cause, this.clock());
                console.error(`${TAG} execution ${ctx.executionId} failed at ${run.failedStep ?? '-'}: ${cause}`);
                await this.recordOutcome(ctx.executionId, () => this.stateStore.updateStatus(ctx.executionId, 'failed', cause));
                await this.eventBus.publish(WorkflowEvents.WORKFLOW_FAILED, {
                    ...ids,
                    error: cause,
                    failedStep: run.failedStep,
                });
            }
            return this.buildResult(run, startTime);
        }

        if (!ctx.isTerminal) {
            ctx.complete(this.clock());
            await this.recordOutcome(ctx.executionId, async () => {
                await this.stateStore.updateProgress(ctx.executionId, 1);
                await this.stateStore.updateStatus(ctx.executionId, 'completed', null);
            });
            const result = this.buildResult(run, startTime);
            console.log(`${TAG} execution ${ctx.executionId} completed in ${result.durationMs}ms`);
            await this.eventBus.publish(WorkflowEvents.WORKFLOW_COMPLETED, {
                ...ids,
                durationMs: result.durationMs,
                stepsCompleted: [...run.completed],
            });
            return result;
        }
        return this.buildResult(run, startTime);
    }

    // The result stands even when the store cannot record it.
    private async recordOutcome(executionId: string, write: () => Promise<void>): Promise<void> {
        try {
            await write();
        } catch (err) {
            const { name, message } = describeError(err);
            console.error(`${TAG} could not record the outcome of ${executionId}: ${name}: ${message}`);
        }
    }

    private async runSequential(run: Run): Promise<void> {
        for (const name of run.order) {
            if (run.ctx.isTerminal) return;
            await this.runOne(run, name);
        }
    }

    // parallel dispatches the whole ready frontier; adaptive at most
    // maxParallelSteps of it at a time
    private async runFrontiers(run: Run): Promise<void> {
        while (run.completed.size < run.order.length) {
            if (run.ctx.isTerminal) return;

            const frontier = run.definition.getParallelSteps(run.completed);
            if (frontier.length === 0) {
                throw new StateError(`No runnable steps left in ${run.definition.id}`, { completed: [...run.completed] });
            }
            const batch = run.definition.strategy === 'adaptive' ? frontier.slice(0, this.maxParallelSteps) : frontier;

            const settled = await Promise.allSettled(batch.map(name => this.runOne(run, name)));
            const rejected = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
            if (rejected) throw rejected.reason;
        }
    }

    private async runOne(run: Run, name: string): Promise<void> {
        const { ctx, definition } = run;
        const ids = { workflowId: definition.id, executionId: ctx.executionId };
        const step = definition.getStep(name);
        if (!step) {
            throw new NotFoundError('Step', name);
        }

        ctx.setCurrentStep(name);
        await this.eventBus.publish(WorkflowEvents.STEP_STARTED, { ...ids, stepName: name, agentType: step.agentType });

        try {
            const input = ctx.resolveInputs(step);
            const executor = this.executors.resolve({ agentType: step.agentType, ...ids, step });
            const outputs = await runStep(step, executor, input, {
                attemptTimeout: () => this.attemptTimeout(run, step),
                shouldRetry: () => !ctx.isTerminal,
                onRetry: notice => {
                    console.warn(`${TAG} step ${name} attempt ${notice.attempt} failed, retrying in ${notice.delayMs}ms`);
                    return this.eventBus.publish(WorkflowEvents.STEP_RETRYING, {
                        ...ids,
                        stepName: name,
                        attempt: notice.attempt,
                        delayMs: notice.delayMs,
                        error: notice.error.message,
                    });
                },
                sleep: this.sleep,
            });

            run.warnings.push(...(await ctx.mergeOutputs(name, outputs)));
            run.stepsResults[name] = outputs;
            run.completed.add(name);

            await this.stateStore.markStepCompleted(ctx.executionId, name, outputs);
            await this.stateStore.updateProgress(ctx.executionId, run.completed.size / run.order.length, name);
            await this.eventBus.publish(WorkflowEvents.STEP_COMPLETED, { ...ids, stepName: name, outputs: { ...outputs } });
        } catch (err) {
            const { message, name: errorName } = describeError(err);
            run.errors.push(message);
            if (run.failedStep === null) run.failedStep = name;
            await this.eventBus.publish(WorkflowEvents.STEP_FAILED, { ...ids, stepName: name, error: message, errorName });
            throw err;
        }
    }

    private attemptTimeout(run: Run, step: Step): number {
        const timeoutMs = Math.min(step.timeoutMs, this.stepTimeoutMs);
        if (run.deadline === null) return timeoutMs;

        const remaining = run.deadline - this.clock().getTime();
        if (remaining <= 0) {
            throw new ExecutionTimeoutError(run.definition.id, run.definition.maxExecutionTimeMs ?? 0);
        }
        return Math.min(timeoutMs, remaining);
    }

    private buildResult(run: Run, startTime: Date): WorkflowResult {
        const { ctx, definition } = run;
        const endTime = ctx.endTime ?? this.clock();
        return Object.freeze({
            workflowId: definition.id,
            executionId: ctx.executionId,
            status: ctx.status,
            success: ctx.status === 'completed',
            stepsResults: { ...run.stepsResults },
            data: ctx.snapshotData(),
            startTime,
            endTime,
            durationMs: endTime.getTime() - startTime.getTime(),
            errors: [...run.errors],
            warnings: [...run.warnings],
            error: ctx.status === 'completed' ? null : (run.errors[0] ?? ctx.error),
            failedStep: run.failedStep,
            metadata: {
                ...ctx.metadata,
                strategy: definition.strategy,
                version: definition.version,
                stepsCompleted: [...run.completed],
                terminationReason: ctx.terminationReason,
            },
        });
    }
}
