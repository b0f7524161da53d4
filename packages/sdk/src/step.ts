import { RetryPolicy, StepData, StepSpec } from './types';

export const DEFAULT_STEP_TIMEOUT_MS = 300_000;

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
    maxRetries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 60_000,
    retryableKinds: Object.freeze(['timeout'] as const),
});

/**
 * Declarative contract for one unit of work: which inputs it reads from the
 * execution data, which outputs it promises to write back, and how the engine
 * should time it out and retry it. The work itself is done by whatever
 * executor is bound to `agentType`.
 */
export class Step {
    readonly name: string;
    readonly description: string;
    readonly agentType: string;
    readonly requiredInputs: ReadonlySet<string>;
    readonly optionalInputs: ReadonlySet<string>;
    readonly outputs: ReadonlySet<string>;
    readonly timeoutMs: number;
    readonly retryPolicy: Readonly<RetryPolicy>;
    readonly metadata: Readonly<Record<string, unknown>>;

    constructor(spec: StepSpec) {
        if (!spec.name) {
            throw new Error('Step name cannot be empty');
        }
        if (!spec.agentType) {
            throw new Error(`Step "${spec.name}" has no agent type`);
        }
        const timeoutMs = spec.timeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
        if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
            throw new Error(`Step "${spec.name}" timeout must be a positive number of milliseconds`);
        }

        this.name = spec.name;
        this.description = spec.description ?? '';
        this.agentType = spec.agentType;
        this.requiredInputs = new Set(spec.requiredInputs ?? []);
        this.optionalInputs = new Set(spec.optionalInputs ?? []);
        this.outputs = new Set(spec.outputs ?? []);
        this.timeoutMs = timeoutMs;
        this.retryPolicy = resolveRetryPolicy(spec.name, spec.retryPolicy);
        this.metadata = Object.freeze({ ...spec.metadata });
        Object.freeze(this);
    }

    /** Names of required inputs absent from `provided`, in declaration order. */
    validateInputs(provided: Readonly<StepData>): string[] {
        const missing: string[] = [];
        for (const name of this.requiredInputs) {
            if (!Object.prototype.hasOwnProperty.call(provided, name)) {
                missing.push(name);
            }
        }
        return missing;
    }

    allInputs(): Set<string> {
        return new Set([...this.requiredInputs, ...this.optionalInputs]);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            description: this.description,
            agentType: this.agentType,
            requiredInputs: [...this.requiredInputs],
            optionalInputs: [...this.optionalInputs],
            outputs: [...this.outputs],
            timeoutMs: this.timeoutMs,
            retryPolicy: { ...this.retryPolicy, retryableKinds: [...this.retryPolicy.retryableKinds] },
            metadata: { ...this.metadata },
        };
    }
}

function resolveRetryPolicy(stepName: string, overrides: Partial<RetryPolicy> = {}): Readonly<RetryPolicy> {
    const policy: RetryPolicy = {
        maxRetries: overrides.maxRetries ?? DEFAULT_RETRY_POLICY.maxRetries,
        baseDelayMs: overrides.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
        maxDelayMs: overrides.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
        retryableKinds: Object.freeze([...(overrides.retryableKinds ?? DEFAULT_RETRY_POLICY.retryableKinds)]),
    };
    if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
        throw new Error(`Step "${stepName}" maxRetries must be a non-negative integer`);
    }
    if (!Number.isFinite(policy.baseDelayMs) || policy.baseDelayMs < 0) {
        throw new Error(`Step "${stepName}" baseDelayMs must be a non-negative number of milliseconds`);
    }
    if (!Number.isFinite(policy.maxDelayMs) || policy.maxDelayMs < policy.baseDelayMs) {
        throw new Error(`Step "${stepName}" maxDelayMs must be a finite number no smaller than baseDelayMs`);
    }
    return Object.freeze(policy);
}

export function step(spec: StepSpec): Step {
    return new Step(spec);
}
