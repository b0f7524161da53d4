// public api for @stepweave/sdk
// usage:
//   import { defineWorkflow, Step } from '@stepweave/sdk';
//   const wf = defineWorkflow({ id: 'triage', name: 'Triage', steps: [...], dependencies: {...} });

export * from './types';
export * from './errors';
export { Step, step, DEFAULT_RETRY_POLICY, DEFAULT_STEP_TIMEOUT_MS } from './step';
export { WorkflowDefinition, defineWorkflow } from './workflow';
export type { WorkflowSpec, ValidationResult } from './workflow';
export { buildGraph, findCycle, topologicalOrder } from './graph';
export type { StepGraph } from './graph';
export { ExecutorRegistry, executorRegistry, registerExecutor, executorFrom } from './executor';
export type { Executor, ExecutorBinding, ExecutorContext, ExecutorFactory, ExecuteOptions } from './executor';
export { createGrpcExecutor, loadExecutorServiceClient, EXECUTOR_PROTO_PATH } from './grpc-executor';
export type { ExecutorServiceClient, ExecuteRequest, ExecuteResponse } from './grpc-executor';
export { serialize, deserialize, deserializeStepData, SerializationError, MAX_PAYLOAD_SIZE } from './utils/serialization';
