import { ValidationError } from '../src/errors';
import { step } from '../src/step';
import { defineWorkflow, WorkflowDefinition } from '../src/workflow';

const task = (name: string, requiredInputs: string[] = [], outputs: string[] = []) =>
    step({ name, agentType: 'worker', requiredInputs, outputs });

function diamond(): WorkflowDefinition {
    return defineWorkflow({
        id: 'diamond',
        name: 'Diamond',
        steps: [task('a', [], ['x']), task('b', ['x'], ['y']), task('c', ['x'], ['z']), task('d', ['y', 'z'], ['done'])],
        dependencies: { b: ['a'], c: ['a'], d: ['b', 'c'] },
    });
}

function issueOf(definition: WorkflowDefinition): string | null {
    const result = definition.validate();
    return result.ok ? null : result.error.issue;
}

describe('WorkflowDefinition', () => {
    it('applies defaults', () => {
        const wf = defineWorkflow({ id: 'wf', name: 'Workflow', steps: [task('a')] });
        expect(wf.version).toBe('1.0.0');
        expect(wf.strategy).toBe('sequential');
        expect(wf.description).toBe('');
        expect(wf.maxExecutionTimeMs).toBeNull();
    });

    it('rejects malformed workflow ids', () => {
        expect(() => defineWorkflow({ id: '', name: 'x' })).toThrow('Workflow id cannot be empty');
        expect(() => defineWorkflow({ id: 'bad id!', name: 'x' })).toThrow(/alphanumeric/);
        expect(() => defineWorkflow({ id: 'a'.repeat(101), name: 'x' })).toThrow(/maximum length of 100/);
    });

    it('orders a chain A -> B -> C', () => {
        const wf = defineWorkflow({
            id: 'chain',
            name: 'Chain',
            steps: [task('c', ['y'], ['z']), task('b', ['x'], ['y']), task('a', [], ['x'])],
            dependencies: { b: ['a'], c: ['b'] },
        });
        expect(wf.validate()).toEqual({ ok: true });
        expect(wf.getExecutionOrder()).toEqual(['a', 'b', 'c']);
    });

    it('orders a diamond deterministically', () => {
        expect(diamond().getExecutionOrder()).toEqual(['a', 'b', 'c', 'd']);
    });

    it('records addDependency(from, to) as a prerequisite of `to`', () => {
        const wf = defineWorkflow({ id: 'wf', name: 'Workflow', steps: [task('a'), task('b')] });
        wf.addDependency('a', 'b');
        wf.addDependency('a', 'b');
        expect(wf.getStepDependencies('b')).toEqual(['a']);
        expect(wf.getDependentSteps('a')).toEqual(['b']);
        expect(wf.getExecutionOrder()).toEqual(['a', 'b']);
    });

    describe('validate', () => {
        it('rejects a workflow without steps', () => {
            expect(issueOf(defineWorkflow({ id: 'empty', name: 'Empty' }))).toBe('no_steps');
        });

        it('rejects duplicate step names', () => {
            const wf = defineWorkflow({ id: 'dup', name: 'Dup', steps: [task('a'), task('a')] });
            const result = wf.validate();
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.issue).toBe('duplicate_step');
                expect(result.error.stepName).toBe('a');
            }
        });

        it('rejects references to unknown steps', () => {
            const wf = defineWorkflow({ id: 'ghost', name: 'Ghost', steps: [task('b')], dependencies: { b: ['ghost'] } });
            expect(issueOf(wf)).toBe('unknown_step');
        });

        it('rejects cycles and names the offending step', () => {
            const wf = defineWorkflow({
                id: 'loop',
                name: 'Loop',
                steps: [task('a'), task('b')],
                dependencies: { a: ['b'], b: ['a'] },
            });
            const result = wf.validate();
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.issue).toBe('cycle');
                expect(result.error.stepName).toBe('a');
            }
            expect(() => wf.getExecutionOrder()).toThrow(ValidationError);
        });

        it('rejects a required input nothing provides', () => {
            const wf = defineWorkflow({ id: 'wf', name: 'Workflow', steps: [task('a', ['missing'])] });
            const result = wf.validate();
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.issue).toBe('unsatisfied_input');
                expect(result.error.stepName).toBe('a');
                expect(result.error.message).toBe(
                    'Input missing of step a is not provided by initial inputs or any preceding step',
                );
            }
        });

        it('accepts inputs supplied as initial inputs', () => {
            const wf = defineWorkflow({ id: 'wf', name: 'Workflow', steps: [task('a', ['seed'])], initialInputs: ['seed'] });
            expect(wf.validate()).toEqual({ ok: true });
        });

        it('rejects an input produced only by a later step', () => {
            const wf = defineWorkflow({ id: 'wf', name: 'Workflow', steps: [task('a', ['late']), task('b', [], ['late'])] });
            expect(issueOf(wf)).toBe('unsatisfied_input');
        });

        it('rejects a sibling output under a frontier strategy', () => {
            const spec = {
                id: 'wf',
                name: 'Workflow',
                steps: [task('a', [], ['x']), task('b', ['x'])],
            };
            expect(defineWorkflow(spec).validate()).toEqual({ ok: true });

            const parallel = defineWorkflow({ ...spec, strategy: 'parallel' }).validate();
            expect(parallel.ok).toBe(false);
            if (!parallel.ok) {
                expect(parallel.error.issue).toBe('unsatisfied_input');
                expect(parallel.error.stepName).toBe('b');
                expect(parallel.error.message).toBe('Input x of step b is not provided by initial inputs or any step it depends on');
            }
            expect(issueOf(defineWorkflow({ ...spec, strategy: 'adaptive' }))).toBe('unsatisfied_input');
        });

        it('accepts outputs of transitive dependencies under a frontier strategy', () => {
            const wf = defineWorkflow({
                id: 'wf',
                name: 'Workflow',
                strategy: 'parallel',
                steps: [task('a', [], ['x']), task('b', [], ['y']), task('c', ['x', 'y'])],
                dependencies: { b: ['a'], c: ['b'] },
            });
            expect(wf.validate()).toEqual({ ok: true });
        });

        it('throws the same error from assertValid', () => {
            expect(() => defineWorkflow({ id: 'empty', name: 'Empty' }).assertValid()).toThrow('Workflow empty defines no steps');
        });
    });

    it('lists the ready frontier for a completed set', () => {
        const wf = diamond();
        expect(wf.getParallelSteps(new Set())).toEqual(['a']);
        expect(wf.getParallelSteps(new Set(['a']))).toEqual(['b', 'c']);
        expect(wf.getParallelSteps(new Set(['a', 'b']))).toEqual(['c']);
        expect(wf.getParallelSteps(new Set(['a', 'b', 'c']))).toEqual(['d']);
        expect(wf.getParallelSteps(new Set(['a', 'b', 'c', 'd']))).toEqual([]);
    });

    it('lists the steps gated by the step that just finished', () => {
        const wf = diamond();
        expect(wf.getNextSteps(null, new Set())).toEqual(['a']);
        expect(wf.getNextSteps('a', new Set(['a']))).toEqual(['b', 'c']);
        expect(wf.getNextSteps('b', new Set(['a', 'b']))).toEqual([]);
        expect(wf.getNextSteps('c', new Set(['a', 'b', 'c']))).toEqual(['d']);
    });

    it('refuses structural changes once frozen', () => {
        const wf = diamond();
        wf.freeze();
        expect(wf.frozen).toBe(true);
        expect(() => wf.addStep(task('e'))).toThrow(ValidationError);
        expect(() => wf.addDependency('a', 'd')).toThrow(/can no longer change structure/);
        wf.updateMetadata('owner', 'team-a');
        expect(wf.metadata.owner).toBe('team-a');
    });

    it('serializes dependencies as a plain object', () => {
        const json = diamond().toJSON();
        expect(json.dependencies).toEqual({ b: ['a'], c: ['a'], d: ['b', 'c'] });
        expect(json.strategy).toBe('sequential');
    });
});
