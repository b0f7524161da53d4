import { ValidationError } from './errors';
import { buildGraph, findCycle, StepGraph, topologicalOrder } from './graph';
import { Step } from './step';
import { ExecutionStrategy, StepSpec } from './types';

export interface WorkflowSpec {
    id: string;
    name: string;
    description?: string;
    version?: string;
    steps?: Array<Step | StepSpec>;
    /** step name → names of the steps it requires */
    dependencies?: Record<string, string[]>;
    initialInputs?: Iterable<string>;
    strategy?: ExecutionStrategy;
    maxExecutionTimeMs?: number;
    metadata?: Record<string, unknown>;
}

export type ValidationResult = { ok: true } | { ok: false; error: ValidationError };

const ID_PATTERN = /^[a-zA-Z0-9_-]+$/;
const MAX_ID_LENGTH = 100;

export class WorkflowDefinition {
    readonly id: string;
    readonly name: string;
    readonly description: string;
    readonly version: string;
    readonly initialInputs: ReadonlySet<string>;
    readonly strategy: ExecutionStrategy;
    readonly maxExecutionTimeMs: number | null;
    readonly createdAt: Date;

    private readonly _steps: Step[] = [];
    private readonly _dependencies = new Map<string, string[]>();
    private readonly _metadata: Record<string, unknown>;
    private _updatedAt: Date;
    private _frozen = false;
    private graph: StepGraph | null = null;

    constructor(spec: WorkflowSpec) {
        if (!spec.id) {
            throw new Error('Workflow id cannot be empty');
        }
        if (spec.id.length > MAX_ID_LENGTH) {
            throw new Error(`Workflow id exceeds maximum length of ${MAX_ID_LENGTH} characters`);
        }
        if (!ID_PATTERN.test(spec.id)) {
            throw new Error('Workflow id must contain only alphanumeric characters, dashes, and underscores');
        }

        this.id = spec.id;
        this.name = spec.name;
        this.description = spec.description ?? '';
        this.version = spec.version ?? '1.0.0';
        this.initialInputs = new Set(spec.initialInputs ?? []);
        this.strategy = spec.strategy ?? 'sequential';
        this.maxExecutionTimeMs = spec.maxExecutionTimeMs ?? null;
        this._metadata = { ...spec.metadata };
        this.createdAt = new Date();
        this._updatedAt = this.createdAt;

        for (const s of spec.steps ?? []) {
            this.addStep(s instanceof Step ? s : new Step(s));
        }
        for (const [to, froms] of Object.entries(spec.dependencies ?? {})) {
            for (const from of froms) this.addDependency(from, to);
        }
    }

    get steps(): readonly Step[] {
        return this._steps;
    }

    get dependencies(): ReadonlyMap<string, readonly string[]> {
        return this._dependencies;
    }

    get metadata(): Readonly<Record<string, unknown>> {
        return this._metadata;
    }

    get updatedAt(): Date {
        return this._updatedAt;
    }

    get frozen(): boolean {
        return this._frozen;
    }

    addStep(s: Step): void {
        this.assertMutable();
        this._steps.push(s);
        this.touch();
    }

    /** Records that `to` cannot start until `from` has completed. */
    addDependency(from: string, to: string): void {
        this.assertMutable();
        const deps = this._dependencies.get(to) ?? [];
        if (!deps.includes(from)) deps.push(from);
        this._dependencies.set(to, deps);
        this.touch();
    }

    /** Called by the engine on registration; structure is fixed from here on. */
    freeze(): void {
        this._frozen = true;
    }

    updateMetadata(key: string, value: unknown): void {
        this._metadata[key] = value;
        this._updatedAt = new Date();
    }

    validate(): ValidationResult {
        try {
            this.assertValid();
            return { ok: true };
        } catch (err) {
            if (err instanceof ValidationError) return { ok: false, error: err };
            throw err;
        }
    }

    assertValid(): void {
        if (this._steps.length === 0) {
            throw new ValidationError('no_steps', `Workflow ${this.id} defines no steps`);
        }

        // duplicate names and dangling references surface from buildGraph
        const graph = this.getGraph();

        const cyclic = findCycle(graph);
        if (cyclic !== null) {
            throw new ValidationError('cycle', `Cyclic dependency detected at step ${cyclic}`, cyclic);
        }

        this.validateConnectivity(graph);
    }

    getExecutionOrder(): string[] {
        return topologicalOrder(this.getGraph());
    }

    getParallelSteps(completed: ReadonlySet<string>): string[] {
        return this._steps
            .filter(s => !completed.has(s.name))
            .filter(s => this.getStepDependencies(s.name).every(dep => completed.has(dep)))
            .map(s => s.name);
    }

    getNextSteps(current: string | null, completed: ReadonlySet<string>): string[] {
        if (current === null) {
            return this._steps
                .filter(s => this.getStepDependencies(s.name).length === 0 && !completed.has(s.name))
                .map(s => s.name);
        }

        return this._steps
            .filter(s => !completed.has(s.name))
            .filter(s => {
                const deps = this.getStepDependencies(s.name);
                return deps.includes(current) && deps.every(dep => dep === current || completed.has(dep));
            })
            .map(s => s.name);
    }

    getStep(name: string): Step | undefined {
        return this._steps.find(s => s.name === name);
    }

    getStepDependencies(name: string): readonly string[] {
        return this._dependencies.get(name) ?? [];
    }

    getDependentSteps(name: string): string[] {
        const dependents: string[] = [];
        for (const [to, froms] of this._dependencies) {
            if (froms.includes(name)) dependents.push(to);
        }
        return dependents;
    }

    toJSON(): Record<string, unknown> {
        return {
            id: this.id,
            name: this.name,
            description: this.description,
            version: this.version,
            steps: this._steps.map(s => s.toJSON()),
            dependencies: Object.fromEntries(this._dependencies),
            initialInputs: [...this.initialInputs],
            strategy: this.strategy,
            maxExecutionTimeMs: this.maxExecutionTimeMs,
            metadata: { ...this._metadata },
            createdAt: this.createdAt.toISOString(),
            updatedAt: this._updatedAt.toISOString(),
        };
    }

    // Sequential runs see the outputs of every earlier step; frontier
    // strategies only those of a step's ancestors.
    private validateConnectivity(graph: StepGraph): void {
        const ancestry = new Map<string, Set<string>>();
        const providers = this.strategy === 'sequential' ? 'any preceding step' : 'any step it depends on';
        let previous = new Set(this.initialInputs);

        for (const name of topologicalOrder(graph)) {
            const s = this.getStep(name);
            if (!s) continue;

            const available = new Set(this.strategy === 'sequential' ? previous : this.initialInputs);
            if (this.strategy !== 'sequential') {
                for (const dep of this.getStepDependencies(name)) {
                    for (const output of ancestry.get(dep) ?? []) available.add(output);
                }
            }

            for (const input of s.requiredInputs) {
                if (!available.has(input)) {
                    throw new ValidationError(
                        'unsatisfied_input',
                        `Input ${input} of step ${s.name} is not provided by initial inputs or ${providers}`,
                        s.name,
                    );
                }
            }
            for (const output of s.outputs) available.add(output);
            ancestry.set(name, available);
            previous = available;
        }
    }

    private getGraph(): StepGraph {
        if (!this.graph) {
            this.graph = buildGraph(
                this._steps.map(s => s.name),
                this._dependencies,
            );
        }
        return this.graph;
    }

    private assertMutable(): void {
        if (this._frozen) {
            throw new ValidationError('frozen', `Workflow ${this.id} is registered and can no longer change structure`);
        }
    }

    private touch(): void {
        this.graph = null;
        this._updatedAt = new Date();
    }
}

export function defineWorkflow(spec: WorkflowSpec): WorkflowDefinition {
    return new WorkflowDefinition(spec);
}
