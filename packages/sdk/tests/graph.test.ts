import { ValidationError } from '../src/errors';
import { buildGraph, findCycle, topologicalOrder } from '../src/graph';

const deps = (entries: Record<string, string[]>) => new Map(Object.entries(entries));

describe('StepGraph', () => {
    it('interns names to indices in declaration order', () => {
        const graph = buildGraph(['a', 'b', 'c'], deps({ c: ['a', 'b'] }));
        expect(graph.index.get('c')).toBe(2);
        expect(graph.predecessors[2]).toEqual([0, 1]);
        expect(graph.successors[0]).toEqual([2]);
        expect(graph.successors[1]).toEqual([2]);
    });

    it('ignores a repeated dependency edge', () => {
        const graph = buildGraph(['a', 'b'], deps({ b: ['a', 'a'] }));
        expect(graph.predecessors[1]).toEqual([0]);
    });

    it('rejects duplicate step names', () => {
        expect(() => buildGraph(['a', 'a'], deps({}))).toThrow(ValidationError);
        expect(() => buildGraph(['a', 'a'], deps({}))).toThrow('Duplicate step name: a');
    });

    it('rejects dependencies on unknown steps', () => {
        expect(() => buildGraph(['a'], deps({ a: ['ghost'] }))).toThrow('Step a depends on unknown step ghost');
        expect(() => buildGraph(['a'], deps({ ghost: ['a'] }))).toThrow('Dependencies declared for unknown step: ghost');
    });

    it('orders independent steps by declaration', () => {
        expect(topologicalOrder(buildGraph(['c', 'a', 'b'], deps({})))).toEqual(['c', 'a', 'b']);
    });

    it('puts every step after its dependencies', () => {
        const order = topologicalOrder(buildGraph(['report', 'load', 'clean', 'fetch'], deps({
            report: ['clean'],
            clean: ['load'],
            load: ['fetch'],
        })));
        expect(order).toEqual(['fetch', 'load', 'clean', 'report']);
    });

    it('finds a self loop', () => {
        expect(findCycle(buildGraph(['a'], deps({ a: ['a'] })))).toBe('a');
    });

    it('returns null for an acyclic graph', () => {
        expect(findCycle(buildGraph(['a', 'b'], deps({ b: ['a'] })))).toBeNull();
    });

    it('throws instead of returning a partial order for a cycle', () => {
        const graph = buildGraph(['start', 'a', 'b'], deps({ a: ['b'], b: ['a'] }));
        try {
            topologicalOrder(graph);
            throw new Error('expected topologicalOrder to throw');
        } catch (err) {
            expect(err).toBeInstanceOf(ValidationError);
            if (err instanceof ValidationError) {
                expect(err.issue).toBe('cycle');
                expect(err.stepName).toBe('a');
            }
        }
    });
});
