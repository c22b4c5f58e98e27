import { describe, it, expect } from 'vitest';
import { summarize, synthesize, truncate } from '../../../src/agents/synthesizer';
import { AgentResult, AnalyzerFields, EvaluatorFields, ImprovementFields } from '../../../src/types/evaluation';

function agentResult<TFields>(
    agent: AgentResult<TFields>['agent'],
    parsedFields: TFields
): AgentResult<TFields> {
    return {
        agent,
        raw_model_text: '',
        parsed_fields: parsedFields,
        parse_succeeded: true,
        attempts: 1
    };
}

function input(analyzer: AnalyzerFields, feedback: string) {
    return {
        evaluator: agentResult<EvaluatorFields>('evaluator', { score: 4, rationale: 'Solid' }),
        analyzer: agentResult<AnalyzerFields>('analyzer', analyzer),
        improvement: agentResult<ImprovementFields>('improvement', { feedback })
    };
}

describe('Synthesizer', () => {
    describe('synthesize', () => {
        it('should merge the three agent outputs', () => {
            const result = synthesize(input(
                { strengths: ['Clear'], weaknesses: ['Brief'], summary: 'Correct but brief.' },
                'Add a concrete example.'
            ));

            expect(result).toEqual({
                score: 4,
                summary: 'Correct but brief.',
                improvement: 'Add a concrete example.'
            });
            expect(Object.isFrozen(result)).toBe(true);
        });

        it('should cap the summary at 200 and the improvement at 300 characters', () => {
            const result = synthesize(input(
                { strengths: [], weaknesses: ['Brief'], summary: 's'.repeat(250) },
                'i'.repeat(301)
            ));

            expect(result.summary).toBe(`${'s'.repeat(197)}...`);
            expect(result.improvement).toBe(`${'i'.repeat(297)}...`);
        });
    });

    describe('summarize', () => {
        it('should condense strengths and weaknesses without a summary', () => {
            expect(summarize({ strengths: ['Clear', 'Correct'], weaknesses: ['No example'] }))
                .toBe('Strengths: Clear; Correct. Weaknesses: No example.');
        });

        it('should mention only the lists that are present', () => {
            expect(summarize({ strengths: [], weaknesses: ['No example'] })).toBe('Weaknesses: No example.');
        });

        it('should report when there is nothing to summarize', () => {
            expect(summarize({ strengths: [], weaknesses: [] })).toBe('No summary available');
        });
    });

    describe('truncate', () => {
        it('should leave text at the limit untouched', () => {
            expect(truncate('abcde', 5)).toBe('abcde');
        });

        it('should end cut text with an ellipsis inside the limit', () => {
            expect(truncate('abcdef', 5)).toBe('ab...');
        });
    });
});
