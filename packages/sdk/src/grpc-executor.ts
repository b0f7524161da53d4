import path from 'path';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { ExecutorFactory } from './executor';
import { StepData } from './types';
import { deserializeStepData, serialize } from './utils/serialization';

export const EXECUTOR_PROTO_PATH = path.join(__dirname, '../proto/executor.proto');

const protoOptions = {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
};

export interface ExecuteRequest {
    agent_type: string;
    workflow_id: string;
    execution_id: string;
    step_name: string;
    attempt: number;
    input: Buffer;
}

export interface ExecuteResponse {
    output?: Buffer;
    error?: string;
}

type GrpcCallback<T> = (err: grpc.ServiceError | null, res?: T) => void;

export interface ExecutorServiceClient {
    execute(request: ExecuteRequest, options: grpc.CallOptions, callback: GrpcCallback<ExecuteResponse>): { cancel(): void };
    close(): void;
}

function lookupService(root: grpc.GrpcObject, pkg: string, service: string): grpc.ServiceClientConstructor {
    const ns = root[pkg];
    if (!ns || typeof ns === 'function' || 'format' in ns) {
        throw new Error(`gRPC package "${pkg}" not found in ${EXECUTOR_PROTO_PATH}`);
    }
    const ctor = ns[service];
    if (typeof ctor !== 'function') {
        throw new Error(`gRPC service "${pkg}.${service}" not found in ${EXECUTOR_PROTO_PATH}`);
    }
    return ctor;
}

export function loadExecutorServiceClient(
    address: string,
    credentials: grpc.ChannelCredentials = grpc.credentials.createInsecure(),
): ExecutorServiceClient {
    const packageDef = protoLoader.loadSync(EXECUTOR_PROTO_PATH, protoOptions);
    const Client = lookupService(grpc.loadPackageDefinition(packageDef), 'stepweave', 'ExecutorService');
    const client = new Client(address, credentials);

    return {
        execute: (request, options, callback) => client.execute(request, options, callback),
        close: () => client.close(),
    };
}

/**
 * Executor factory that forwards each step invocation to a remote agent over
 * gRPC. Aborting the attempt (step timeout) cancels the call.
 */
export function createGrpcExecutor(client: ExecutorServiceClient): ExecutorFactory {
    return ctx => ({
        execute: (input, { signal, attempt }) =>
            new Promise<StepData>((resolve, reject) => {
                if (signal.aborted) {
                    reject(new Error(`call to ${ctx.agentType} aborted before start`));
                    return;
                }

                const request: ExecuteRequest = {
                    agent_type: ctx.agentType,
                    workflow_id: ctx.workflowId,
                    execution_id: ctx.executionId,
                    step_name: ctx.step.name,
                    attempt,
                    input: Buffer.from(serialize(input)),
                };

                const call = client.execute(request, {}, (err, res) => {
                    signal.removeEventListener('abort', onAbort);
                    if (err) return reject(err);
                    if (res?.error) return reject(new Error(res.error));
                    try {
                        resolve(deserializeStepData(res?.output?.toString('utf-8')));
                    } catch (decodeErr) {
                        reject(decodeErr);
                    }
                });
                const onAbort = () => call.cancel();
                signal.addEventListener('abort', onAbort, { once: true });
            }),
    });
}
