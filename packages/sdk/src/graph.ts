import { ValidationError } from './errors';

/**
 * Arena-plus-index view of a dependency map. Step names are interned to
 * integer indices in declaration order; edges are stored as index lists so
 * ordering and cycle detection run in O(V + E).
 */
export interface StepGraph {
    readonly names: readonly string[];
    readonly index: ReadonlyMap<string, number>;
    /** predecessors[i]: indices of the steps that step i depends on */
    readonly predecessors: readonly (readonly number[])[];
    /** successors[i]: indices of the steps that depend on step i */
    readonly successors: readonly (readonly number[])[];
}

export function buildGraph(names: readonly string[], dependencies: ReadonlyMap<string, readonly string[]>): StepGraph {
    const index = new Map<string, number>();
    names.forEach((name, i) => {
        if (index.has(name)) {
            throw new ValidationError('duplicate_step', `Duplicate step name: ${name}`, name);
        }
        index.set(name, i);
    });

    const predecessors: number[][] = names.map(() => []);
    const successors: number[][] = names.map(() => []);

    for (const [stepName, deps] of dependencies) {
        const to = index.get(stepName);
        if (to === undefined) {
            throw new ValidationError('unknown_step', `Dependencies declared for unknown step: ${stepName}`, stepName);
        }
        for (const dep of deps) {
            const from = index.get(dep);
            if (from === undefined) {
                throw new ValidationError('unknown_step', `Step ${stepName} depends on unknown step ${dep}`, stepName);
            }
            if (!predecessors[to].includes(from)) {
                predecessors[to].push(from);
            }
        }
    }

    // successors[i] lists dependents in declaration order
    predecessors.forEach((preds, to) => {
        for (const from of preds) successors[from].push(to);
    });

    return { names, index, predecessors, successors };
}

/**
 * Depth-first search tracking the current path. Returns the name of the step
 * at which a back edge closes a cycle, or null for an acyclic graph.
 */
export function findCycle(graph: StepGraph): string | null {
    const visited = new Set<number>();
    const path = new Set<number>();

    const visit = (node: number): number | null => {
        visited.add(node);
        path.add(node);
        for (const next of graph.predecessors[node]) {
            if (path.has(next)) return next;
            if (!visited.has(next)) {
                const found = visit(next);
                if (found !== null) return found;
            }
        }
        path.delete(node);
        return null;
    };

    for (let i = 0; i < graph.names.length; i++) {
        if (visited.has(i)) continue;
        const found = visit(i);
        if (found !== null) return graph.names[found];
    }
    return null;
}

/**
 * Kahn's algorithm. Throws rather than returning a partial order when the
 * graph contains a cycle.
 */
export function topologicalOrder(graph: StepGraph): string[] {
    const inDegree = graph.predecessors.map(preds => preds.length);
    const queue: number[] = [];
    inDegree.forEach((degree, i) => {
        if (degree === 0) queue.push(i);
    });

    const ordered: string[] = [];
    for (let head = 0; head < queue.length; head++) {
        const current = queue[head];
        ordered.push(graph.names[current]);
        for (const next of graph.successors[current]) {
            inDegree[next]--;
            if (inDegree[next] === 0) queue.push(next);
        }
    }

    if (ordered.length !== graph.names.length) {
        const stuck = graph.names.find((_, i) => inDegree[i] > 0) ?? null;
        throw new ValidationError(
            'cycle',
            `Cannot determine execution order: cyclic dependency involving step ${stuck}`,
            stuck,
        );
    }
    return ordered;
}
