import { describeError } from '@stepweave/sdk';
import { RingBuffer } from '../utils/ring-buffer';

const TAG = '[event-bus]';

export type EventPayload = Record<string, unknown>;

export type EventHandler = (payload: EventPayload) => Promise<void> | void;

export interface EventRecord {
    type: string;
    workflowId: string | null;
    timestamp: Date;
    data: EventPayload;
}

export interface EventHistoryQuery {
    type?: string;
    workflowId?: string;
    limit?: number;
}

export interface EventBusOptions {
    maxHistory?: number;
}

/**
 * In-process publish/subscribe for workflow lifecycle notifications.
 * Each publish is recorded in a bounded history and delivered concurrently
 * to every handler subscribed to its type at the time of publishing.
 */
export class EventBus {
    private subscribers = new Map<string, EventHandler[]>();
    private history: RingBuffer<EventRecord>;

    constructor(options: EventBusOptions = {}) {
        this.history = new RingBuffer(options.maxHistory ?? 1000);
    }

    async publish(type: string, payload: EventPayload): Promise<void> {
        const workflowId = typeof payload.workflowId === 'string' ? payload.workflowId : null;
        this.history.push({ type, workflowId, timestamp: new Date(), data: payload });

        const handlers = [...(this.subscribers.get(type) ?? [])];
        if (handlers.length === 0) return;

        // synchronous throws surface as rejections here too
        const results = await Promise.allSettled(handlers.map(handler => Promise.resolve().then(() => handler(payload))));

        results.forEach(result => {
            if (result.status === 'rejected') {
                const { name, message } = describeError(result.reason);
                console.error(`${TAG} handler for ${type} failed: ${name}: ${message}`);
            }
        });
    }

    /** Returns a function that removes this subscription. */
    subscribe(type: string, handler: EventHandler): () => void {
        const handlers = this.subscribers.get(type) ?? [];
        handlers.push(handler);
        this.subscribers.set(type, handlers);
        return () => {
            this.unsubscribe(type, handler);
        };
    }

    unsubscribe(type: string, handler: EventHandler): boolean {
        const handlers = this.subscribers.get(type);
        if (!handlers) return false;

        const idx = handlers.indexOf(handler);
        if (idx === -1) return false;

        handlers.splice(idx, 1);
        if (handlers.length === 0) this.subscribers.delete(type);
        return true;
    }

    listenerCount(type: string): number {
        return this.subscribers.get(type)?.length ?? 0;
    }

    getEventHistory(query: EventHistoryQuery = {}): EventRecord[] {
        const { type, workflowId, limit = 100 } = query;
        const matching = this.history
            .toArray()
            .filter(event => type === undefined || event.type === type)
            .filter(event => workflowId === undefined || event.workflowId === workflowId);
        return limit > 0 ? matching.slice(-limit) : [];
    }

    clearHistory(): void {
        this.history.clear();
    }
}
