import { defineWorkflow, step, WorkflowDefinition } from '@stepweave/sdk';

// Requirements analysis: analyse → clarify → business ∥ technical → review → document.
export const requirementsAnalysisSteps = [
    step({
        name: 'initial_analysis',
        description: 'Analyse the initial requirements',
        agentType: 'requirements_analyzer',
        requiredInputs: ['initial_requirements', 'project_context'],
        outputs: ['initial_analysis_result', 'requirement_points', 'analysis_depth'],
    }),
    step({
        name: 'clarification',
        description: 'Clarify requirement details through questions',
        agentType: 'requirement_clarifier',
        requiredInputs: ['initial_analysis_result', 'requirement_points'],
        outputs: ['clarified_requirements', 'clarification_questions'],
    }),
    step({
        name: 'business_analysis',
        description: 'Assess business value and impact',
        agentType: 'business_analyst',
        requiredInputs: ['clarified_requirements'],
        outputs: ['business_analysis_result', 'business_rules'],
    }),
    step({
        name: 'technical_analysis',
        description: 'Assess technical feasibility',
        agentType: 'technical_analyst',
        requiredInputs: ['clarified_requirements'],
        // runs beside business_analysis, so its rules may not exist yet
        optionalInputs: ['business_rules'],
        outputs: ['technical_analysis_result', 'technical_constraints'],
    }),
    step({
        name: 'quality_review',
        description: 'Review requirement quality and completeness',
        agentType: 'quality_reviewer',
        requiredInputs: ['clarified_requirements', 'business_analysis_result', 'technical_analysis_result'],
        outputs: ['quality_review_result', 'improvement_suggestions'],
    }),
    step({
        name: 'documentation',
        description: 'Write the requirements specification document',
        agentType: 'technical_writer',
        requiredInputs: [
            'clarified_requirements',
            'business_analysis_result',
            'technical_analysis_result',
            'quality_review_result',
        ],
        outputs: ['requirements_document'],
    }),
];

export function createRequirementsAnalysisWorkflow(id = 'requirements-analysis'): WorkflowDefinition {
    return defineWorkflow({
        id,
        name: 'Requirements analysis',
        description: 'Multi-agent requirements analysis',
        version: '1.0.0',
        initialInputs: ['initial_requirements', 'project_context'],
        strategy: 'parallel',
        steps: requirementsAnalysisSteps,
        dependencies: {
            clarification: ['initial_analysis'],
            business_analysis: ['clarification'],
            technical_analysis: ['clarification'],
            quality_review: ['business_analysis', 'technical_analysis'],
            documentation: ['quality_review'],
        },
        metadata: {
            maxClarificationRounds: 3,
            supportsParallelExecution: true,
        },
    });
}
