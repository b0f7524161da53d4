export { EventBus } from './event-bus';
export type { EventBusOptions, EventHandler, EventHistoryQuery, EventPayload, EventRecord } from './event-bus';
export { ExecutionContext } from './execution-context';
export type { ExecutionContextInit } from './execution-context';
export { runStep } from './step-runner';
export type { RetryNotice, RunStepOptions } from './step-runner';
export { WorkflowEngine } from './workflow-engine';
export type { WorkflowEngineOptions } from './workflow-engine';
export { StateReaper } from './state-reaper';
