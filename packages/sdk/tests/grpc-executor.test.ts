import * as grpc from '@grpc/grpc-js';
import { createGrpcExecutor, ExecuteRequest, ExecuteResponse, ExecutorServiceClient } from '../src/grpc-executor';
import { step } from '../src/step';
import { deserialize, serialize } from '../src/utils/serialization';

type Reply = ExecuteResponse | grpc.ServiceError | null;

// In-process stand-in for the generated client; `reply` decides the outcome,
// null leaves the call hanging.
function fakeClient(reply: (req: ExecuteRequest) => Reply) {
    const requests: ExecuteRequest[] = [];
    const cancel = jest.fn();
    const client: ExecutorServiceClient = {
        execute: (request, _options, callback) => {
            requests.push(request);
            const outcome = reply(request);
            if (outcome instanceof Error) {
                setImmediate(() => callback(outcome));
            } else if (outcome !== null) {
                setImmediate(() => callback(null, outcome));
            }
            return { cancel };
        },
        close: jest.fn(),
    };
    return { client, requests, cancel };
}

const summarize = step({ name: 'summarize', agentType: 'summarizer', outputs: ['summary'] });
const ctx = { agentType: 'summarizer', workflowId: 'wf', executionId: 'exec-1', step: summarize };

describe('createGrpcExecutor', () => {
    it('sends the step identity and encoded input, and decodes the output', async () => {
        const { client, requests } = fakeClient(() => ({ output: Buffer.from(serialize({ summary: 'short' })) }));
        const executor = createGrpcExecutor(client)(ctx);

        const result = await executor.execute({ text: 'long text' }, { signal: new AbortController().signal, attempt: 2 });

        expect(result).toEqual({ summary: 'short' });
        expect(requests).toHaveLength(1);
        expect(requests[0]).toMatchObject({
            agent_type: 'summarizer',
            workflow_id: 'wf',
            execution_id: 'exec-1',
            step_name: 'summarize',
            attempt: 2,
        });
        expect(deserialize(requests[0].input.toString('utf-8'))).toEqual({ text: 'long text' });
    });

    it('rejects with the error reported by the agent', async () => {
        const { client } = fakeClient(() => ({ error: 'agent crashed' }));
        const executor = createGrpcExecutor(client)(ctx);

        await expect(executor.execute({}, { signal: new AbortController().signal, attempt: 1 })).rejects.toThrow('agent crashed');
    });

    it('rejects with transport errors', async () => {
        const unavailable = Object.assign(new Error('14 UNAVAILABLE: connection refused'), {
            code: grpc.status.UNAVAILABLE,
            details: 'connection refused',
            metadata: new grpc.Metadata(),
        });
        const { client } = fakeClient(() => unavailable);
        const executor = createGrpcExecutor(client)(ctx);

        await expect(executor.execute({}, { signal: new AbortController().signal, attempt: 1 })).rejects.toBe(unavailable);
    });

    it('cancels the call when the attempt is aborted', () => {
        const { client, cancel } = fakeClient(() => null);
        const controller = new AbortController();
        const pending = createGrpcExecutor(client)(ctx).execute({}, { signal: controller.signal, attempt: 1 });
        pending.catch(() => undefined);

        controller.abort();

        expect(cancel).toHaveBeenCalledTimes(1);
    });

    it('does not call the agent when already aborted', async () => {
        const { client, requests } = fakeClient(() => ({}));
        const controller = new AbortController();
        controller.abort();

        await expect(
            createGrpcExecutor(client)(ctx).execute({}, { signal: controller.signal, attempt: 1 }),
        ).rejects.toThrow('call to summarizer aborted before start');
        expect(requests).toHaveLength(0);
    });
});
