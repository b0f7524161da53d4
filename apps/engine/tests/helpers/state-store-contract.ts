import { NotFoundError, StateError } from '@stepweave/sdk';
import { createStateRecord, StateRecord } from '../../src/stores/state-record';
import { StateStore } from '../../src/stores/state-store';
import { FakeClock } from './clock';

export interface StoreHarness {
    store: StateStore;
    teardown?: () => Promise<void>;
}

// Behaviour every StateStore backend must share.
export function describeStateStore(name: string, create: (clock: FakeClock) => StoreHarness): void {
    describe(`${name} (StateStore contract)`, () => {
        let clock: FakeClock;
        let harness: StoreHarness;
        let store: StateStore;

        const record = (executionId = 'exec-1'): StateRecord =>
            createStateRecord({ workflowId: 'wf', executionId, steps: ['a', 'b', 'c'] }, clock.now());

        beforeEach(() => {
            clock = new FakeClock();
            harness = create(clock);
            store = harness.store;
        });

        afterEach(async () => {
            await harness.teardown?.();
        });

        it('saves and reads back a record', async () => {
            const saved = record();
            await store.save('exec-1', saved);
            expect(await store.get('exec-1')).toEqual(saved);
        });

        it('returns null for an unknown id', async () => {
            expect(await store.get('missing')).toBeNull();
        });

        it('marks a step completed idempotently', async () => {
            await store.save('exec-1', record());
            await store.markStepCompleted('exec-1', 'a', { x: 1 });
            await store.markStepCompleted('exec-1', 'a', { x: 1 });

            const state = await store.get('exec-1');
            expect(state?.stepsCompleted).toEqual(['a']);
            expect(state?.stepsRemaining).toEqual(['b', 'c']);
            expect(state?.data.step_a).toEqual({ x: 1 });
        });

        it('returns Dates and BigInts in step outputs as themselves', async () => {
            const at = new Date('2026-02-03T04:05:06.000Z');
            await store.save('exec-1', record());
            await store.markStepCompleted('exec-1', 'a', { at, n: 10n, tags: new Set(['x']) });

            const output = (await store.get('exec-1'))?.data.step_a;
            expect(output).toEqual({ at, n: 10n, tags: new Set(['x']) });
        });

        it('rejects progress outside [0, 1] and keeps the stored value', async () => {
            await store.save('exec-1', record());
            await store.updateProgress('exec-1', 0.5, 'b');

            await expect(store.updateProgress('exec-1', 1.5)).rejects.toThrow(StateError);
            await expect(store.updateProgress('exec-1', -0.1)).rejects.toThrow('Progress must be between 0 and 1, got -0.1');

            const state = await store.get('exec-1');
            expect(state?.progress).toBe(0.5);
            expect(state?.currentStep).toBe('b');
        });

        it('refuses to leave a terminal status', async () => {
            await store.save('exec-1', record());
            await store.updateStatus('exec-1', 'running');
            await store.updateStatus('exec-1', 'failed', 'boom');

            await expect(store.updateStatus('exec-1', 'running')).rejects.toThrow(StateError);

            const state = await store.get('exec-1');
            expect(state?.status).toBe('failed');
            expect(state?.error).toBe('boom');
        });

        it('throws NotFoundError when mutating an unknown id', async () => {
            await expect(store.updateStatus('missing', 'running')).rejects.toThrow(NotFoundError);
            await expect(store.markStepCompleted('missing', 'a')).rejects.toThrow('Workflow state "missing" not found');
            await expect(store.updateProgress('missing', 0.1)).rejects.toThrow(NotFoundError);
        });

        it('never moves updatedAt backwards', async () => {
            await store.save('exec-1', record());
            clock.advance(1000);
            await store.markStepCompleted('exec-1', 'a');
            expect((await store.get('exec-1'))?.updatedAt.toISOString()).toBe('2026-01-01T00:00:01.000Z');

            clock.set('2025-12-31T00:00:00.000Z');
            await store.updateProgress('exec-1', 0.4);
            expect((await store.get('exec-1'))?.updatedAt.toISOString()).toBe('2026-01-01T00:00:01.000Z');
        });

        it('deletes and lists records', async () => {
            await store.save('exec-1', record('exec-1'));
            clock.advance(10);
            await store.save('exec-2', record('exec-2'));

            expect((await store.list()).map(r => r.executionId).sort()).toEqual(['exec-1', 'exec-2']);
            expect(await store.delete('exec-1')).toBe(true);
            expect(await store.delete('exec-1')).toBe(false);
            expect((await store.list()).map(r => r.executionId)).toEqual(['exec-2']);
        });

        it('removes records at least maxAgeMs old', async () => {
            await store.save('exec-1', record('exec-1'));
            clock.advance(5000);
            await store.save('exec-2', record('exec-2'));
            clock.advance(1000);

            expect(await store.cleanupExpired(6000)).toEqual(['exec-1']);
            expect(await store.get('exec-1')).toBeNull();
            expect(await store.get('exec-2')).not.toBeNull();
        });

        it('clears everything with cleanupExpired(0)', async () => {
            await store.save('exec-1', record('exec-1'));
            await store.save('exec-2', record('exec-2'));

            expect((await store.cleanupExpired(0)).sort()).toEqual(['exec-1', 'exec-2']);
            expect(await store.list()).toEqual([]);
        });
    });
}
