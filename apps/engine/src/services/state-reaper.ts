import { StateStore } from '../stores/state-store';

const TAG = '[reaper]';

// Periodically drops state records older than maxAgeMs from the store.
export class StateReaper {
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isReaping = false;

    constructor(
        private readonly store: StateStore,
        private readonly maxAgeMs = 86_400_000,
        private readonly intervalMs = 3_600_000,
    ) { }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }

        this.running = true;
        console.log(`${TAG} started (interval: ${this.intervalMs}ms, max age: ${this.maxAgeMs}ms)`);

        // Fire immediately, then on schedule
        void this.reap();
        this.intervalHandle = setInterval(() => void this.reap(), this.intervalMs);
        this.intervalHandle.unref();
    }

    stop(): void {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    async reap(): Promise<string[]> {
        if (this.isReaping) return [];
        this.isReaping = true;

        try {
            const removed = await this.store.cleanupExpired(this.maxAgeMs);
            if (removed.length > 0) {
                console.log(`${TAG} reaped ${removed.length} states: ${removed.join(', ')}`);
            }
            return removed;
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
            return [];
        } finally {
            this.isReaping = false;
        }
    }
}
