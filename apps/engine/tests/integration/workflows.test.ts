import { defineWorkflow, executorFrom, ExecutorRegistry, step, StepData } from '@stepweave/sdk';
import { WorkflowEngine } from '../../src/services/workflow-engine';
import { createRequirementsAnalysisWorkflow, requirementsAnalysisSteps } from '../../src/workflows';

describe('requirements analysis workflow', () => {
    it('is a valid definition', () => {
        expect(createRequirementsAnalysisWorkflow().validate()).toEqual({ ok: true });
    });

    it('orders the steps from analysis to documentation', () => {
        expect(createRequirementsAnalysisWorkflow().getExecutionOrder()).toEqual([
            'initial_analysis',
            'clarification',
            'business_analysis',
            'technical_analysis',
            'quality_review',
            'documentation',
        ]);
    });

    it('runs business and technical analysis side by side', () => {
        const wf = createRequirementsAnalysisWorkflow();
        expect(wf.getParallelSteps(new Set(['initial_analysis', 'clarification']))).toEqual([
            'business_analysis',
            'technical_analysis',
        ]);
        expect(wf.getNextSteps('business_analysis', new Set(['initial_analysis', 'clarification', 'business_analysis']))).toEqual([]);
    });

    it('cannot require business_rules in technical analysis', () => {
        const base = createRequirementsAnalysisWorkflow();
        const strict = defineWorkflow({
            id: 'requirements-strict',
            name: base.name,
            strategy: base.strategy,
            initialInputs: base.initialInputs,
            steps: base.steps.map(s =>
                s.name === 'technical_analysis'
                    ? step({
                          name: s.name,
                          agentType: s.agentType,
                          requiredInputs: ['clarified_requirements', 'business_rules'],
                          outputs: s.outputs,
                      })
                    : s,
            ),
            dependencies: Object.fromEntries([...base.dependencies].map(([to, froms]) => [to, [...froms]])),
        });

        const result = strict.validate();
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.stepName).toBe('technical_analysis');
    });

    it('produces a requirements document with stand-in agents', async () => {
        const executors = new ExecutorRegistry();
        const seen = new Map<string, StepData>();
        for (const s of requirementsAnalysisSteps) {
            executors.register(s.agentType, executorFrom(async input => {
                seen.set(s.name, input);
                return Object.fromEntries([...s.outputs].map(output => [output, `${output} (${s.name})`]));
            }));
        }
        const engine = new WorkflowEngine({ executors });
        engine.register(createRequirementsAnalysisWorkflow('req-1'));

        const result = await engine.execute('req-1', {
            initial_requirements: 'Let teams share dashboards',
            project_context: 'internal analytics',
        });

        expect(result.success).toBe(true);
        expect(result.metadata.strategy).toBe('parallel');
        expect(Object.keys(result.stepsResults).sort()).toEqual([
            'business_analysis',
            'clarification',
            'documentation',
            'initial_analysis',
            'quality_review',
            'technical_analysis',
        ]);
        expect(result.data.requirements_document).toBe('requirements_document (documentation)');
        expect(seen.get('documentation')).toEqual({
            clarified_requirements: 'clarified_requirements (clarification)',
            business_analysis_result: 'business_analysis_result (business_analysis)',
            technical_analysis_result: 'technical_analysis_result (technical_analysis)',
            quality_review_result: 'quality_review_result (quality_review)',
        });
        expect(seen.get('initial_analysis')).toEqual({
            initial_requirements: 'Let teams share dashboards',
            project_context: 'internal analytics',
        });
    });
});
