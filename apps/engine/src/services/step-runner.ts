import {
    describeError,
    Executor,
    isStepFailure,
    Step,
    StepData,
    StepExecutionError,
    StepFailure,
    StepTimeoutError,
} from '@stepweave/sdk';
import { calculateBackOff } from '../utils/backoff';

export interface RetryNotice {
    /** 1-indexed number of the attempt that failed. */
    attempt: number;
    delayMs: number;
    error: StepFailure;
}

export interface RunStepOptions {
    /**
     * Timeout for the next attempt. Called before every attempt so a caller
     * can cap it by a shrinking budget; may throw to stop retrying.
     */
    attemptTimeout?: () => number;
    /** Checked after a failed attempt; false stops further retries. */
    shouldRetry?: () => boolean;
    onRetry?: (notice: RetryNotice) => Promise<void> | void;
    sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Runs one step against its executor with timeout and retry. Resolves with
 * exactly the declared outputs; rejects with the last StepFailure once the
 * retry policy gives up.
 */
export async function runStep(step: Step, executor: Executor, input: StepData, options: RunStepOptions = {}): Promise<StepData> {
    const policy = step.retryPolicy;
    const sleep = options.sleep ?? defaultSleep;

    for (let attempt = 0; ; attempt++) {
        const timeoutMs = options.attemptTimeout ? options.attemptTimeout() : step.timeoutMs;

        try {
            const result = await runAttempt(step, executor, input, attempt + 1, timeoutMs);
            return pickDeclaredOutputs(step, result);
        } catch (err) {
            const failure = toStepFailure(step, err);
            const retryable = policy.retryableKinds.includes(failure.kind);
            if (!retryable || attempt >= policy.maxRetries || options.shouldRetry?.() === false) {
                throw failure;
            }

            const delayMs = calculateBackOff(attempt, policy.baseDelayMs, policy.maxDelayMs);
            await options.onRetry?.({ attempt: attempt + 1, delayMs, error: failure });
            await sleep(delayMs);
        }
    }
}

async function runAttempt(step: Step, executor: Executor, input: StepData, attempt: number, timeoutMs: number): Promise<StepData> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new StepTimeoutError(step.name, timeoutMs));
        }, timeoutMs);
    });

    // synchronous throws from execute() become rejections
    const work = Promise.resolve().then(() => executor.execute({ ...input }, { signal: controller.signal, attempt }));

    try {
        return await Promise.race([work, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

function pickDeclaredOutputs(step: Step, result: unknown): StepData {
    if (typeof result !== 'object' || result === null || Array.isArray(result)) {
        throw new StepExecutionError(step.name, 'executor must return an object of outputs', 'contract');
    }

    const missing = [...step.outputs].filter(name => !Object.prototype.hasOwnProperty.call(result, name));
    if (missing.length > 0) {
        throw new StepExecutionError(step.name, `missing declared outputs: ${missing.join(', ')}`, 'contract');
    }

    const outputs: StepData = {};
    for (const name of step.outputs) {
        outputs[name] = Reflect.get(result, name);
    }
    return outputs;
}

function toStepFailure(step: Step, err: unknown): StepFailure {
    if (isStepFailure(err)) return err;
    return new StepExecutionError(step.name, describeError(err).message, 'execution', err);
}
