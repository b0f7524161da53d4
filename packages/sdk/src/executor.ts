import { NotFoundError } from './errors';
import { Step } from './step';
import { StepData } from './types';

export interface ExecuteOptions {
    /** Aborted when the engine stops waiting for this attempt (timeout). */
    signal: AbortSignal;
    /** 1-indexed attempt number. */
    attempt: number;
}

/**
 * The one capability the engine needs from an agent: take the resolved step
 * inputs, return an object carrying every output the step declares.
 */
export interface Executor {
    execute(input: StepData, options: ExecuteOptions): Promise<StepData>;
}

export interface ExecutorContext {
    agentType: string;
    workflowId: string;
    executionId: string;
    step: Step;
}

export type ExecutorFactory = (ctx: ExecutorContext) => Executor;

export type ExecutorBinding = Executor | ExecutorFactory;

// Maps an agent type to the executor that does its work. Factories are
// called once per step invocation; plain executors are shared.
export class ExecutorRegistry {
    private factories = new Map<string, ExecutorFactory>();

    register(agentType: string, binding: ExecutorBinding): void {
        if (!agentType) {
            throw new Error('Agent type cannot be empty');
        }
        // Re-registering replaces the previous binding.
        this.factories.set(agentType, typeof binding === 'function' ? binding : () => binding);
    }

    unregister(agentType: string): boolean {
        return this.factories.delete(agentType);
    }

    has(agentType: string): boolean {
        return this.factories.has(agentType);
    }

    list(): string[] {
        return Array.from(this.factories.keys());
    }

    resolve(ctx: ExecutorContext): Executor {
        const factory = this.factories.get(ctx.agentType);
        if (!factory) {
            throw new NotFoundError('Executor for agent type', ctx.agentType);
        }
        return factory(ctx);
    }
}

export const executorRegistry = new ExecutorRegistry();

/**
 * Bind an executor to an agent type in the shared registry.
 *
 * @example
 * registerExecutor('business_analyst', executorFrom(async (input) => {
 *   return { business_rules: await analyst.run(input.clarified_requirements) };
 * }));
 */
export function registerExecutor(agentType: string, binding: ExecutorBinding): void {
    executorRegistry.register(agentType, binding);
}

export function executorFrom(fn: (input: StepData, options: ExecuteOptions) => Promise<StepData>): Executor {
    return { execute: fn };
}
