import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AgentDependencies } from '../../../src/agents/base.agent';
import { DEFAULT_SCORE, EVALUATOR_SYSTEM_PROMPT, EvaluatorAgent } from '../../../src/agents/evaluator.agent';
import { ANALYZER_SYSTEM_PROMPT, AnalyzerAgent } from '../../../src/agents/analyzer.agent';
import { DEFAULT_IMPROVEMENT, IMPROVEMENT_SYSTEM_PROMPT, ImprovementAgent } from '../../../src/agents/improvement.agent';
import { ParseError } from '../../../src/errors';
import { AgentResult, AnalyzerFields, EvaluatorFields, PipelineState } from '../../../src/types/evaluation';

const mockGenerate = vi.fn();

const deps: AgentDependencies = {
    llm: { generate: mockGenerate },
    modelConfig: { model: 'test-llm-model', temperature: 0, maxTokens: 500, timeoutMs: 1000 },
    logger: globalThis.testUtils.createMockLogger(),
    parseAttempts: 2
};

const baseState: PipelineState = {
    question_context: 'Explain database indexing.',
    candidate_answer: 'An index lets the database find rows without a full scan.'
};

function evaluatorResult(parseSucceeded: boolean): AgentResult<EvaluatorFields> {
    return {
        agent: 'evaluator',
        raw_model_text: '{"score": 4}',
        parsed_fields: { score: 4, rationale: 'Correct but brief.' },
        parse_succeeded: parseSucceeded,
        attempts: 1
    };
}

function analyzerResult(parseSucceeded: boolean, weaknesses: string[]): AgentResult<AnalyzerFields> {
    return {
        agent: 'analyzer',
        raw_model_text: '{}',
        parsed_fields: { strengths: ['Clear'], weaknesses },
        parse_succeeded: parseSucceeded,
        attempts: 1
    };
}

describe('Evaluator Agent', () => {
    const agent = new EvaluatorAgent(deps);

    it('should prompt with the question and answer only', () => {
        expect(agent.buildPrompt(baseState)).toEqual({
            system: EVALUATOR_SYSTEM_PROMPT,
            user: "Question: Explain database indexing.\n\nCandidate's Answer:\nAn index lets the database find rows without a full scan."
        });
    });

    it('should accept whole-number scores as numbers or numeric strings', () => {
        expect(agent.parse('{"score": 4, "rationale": "Strong"}').score).toBe(4);
        expect(agent.parse('{"score": "2", "rationale": "Weak"}').score).toBe(2);
        expect(agent.parse('{"score": " 5 ", "rationale": "Excellent"}').score).toBe(5);
    });

    it('should reject scores outside 1-5 or with a fraction', () => {
        for (const score of ['11', '0', '-3', '4.5', '"2.4"']) {
            expect(() => agent.parse(`{"score": ${score}, "rationale": "Any"}`)).toThrow(ParseError);
        }
        expect(() => agent.parse('{"score": 11, "rationale": "Outstanding"}')).toThrow('score must be at most 5');
        expect(() => agent.parse('{"score": 0, "rationale": "Off topic"}')).toThrow('score must be at least 1');
    });

    it('should retry an out-of-range score and keep the next valid one', async () => {
        mockGenerate.mockReset();
        mockGenerate
            .mockResolvedValueOnce('{"score": 11, "rationale": "Outstanding"}')
            .mockResolvedValueOnce('{"score": 4, "rationale": "Strong"}');

        const result = await agent.run(baseState);

        expect(result.parse_succeeded).toBe(true);
        expect(result.attempts).toBe(2);
        expect(result.parsed_fields.score).toBe(4);
    });

    it('should default the score when every response is out of range', async () => {
        mockGenerate.mockReset();
        mockGenerate
            .mockResolvedValueOnce('{"score": 0, "rationale": "Off topic"}')
            .mockResolvedValueOnce('{"score": 4.5, "rationale": "Strong"}');

        const result = await agent.run(baseState);

        expect(result.parse_succeeded).toBe(false);
        expect(result.parsed_fields.score).toBe(DEFAULT_SCORE);
        expect(mockGenerate).toHaveBeenCalledTimes(2);
    });

    it('should accept a justification in place of a rationale', () => {
        expect(agent.parse('{"score": 3, "justification": "Average"}')).toEqual({ score: 3, rationale: 'Average' });
    });

    it('should reject a non-numeric score', () => {
        expect(() => agent.parse('{"score": "four", "rationale": "Good"}')).toThrow(ParseError);
    });
});

describe('Analyzer Agent', () => {
    const agent = new AnalyzerAgent(deps);

    it('should include the evaluator score when it was parsed', () => {
        const prompt = agent.buildPrompt({ ...baseState, evaluator: evaluatorResult(true) });

        expect(prompt.system).toBe(ANALYZER_SYSTEM_PROMPT);
        expect(prompt.user.endsWith('\n\nEvaluator Score: 4/5')).toBe(true);
    });

    it('should leave out a defaulted evaluator score', () => {
        const prompt = agent.buildPrompt({ ...baseState, evaluator: evaluatorResult(false) });

        expect(prompt.user).not.toContain('Evaluator Score');
    });

    it('should accept single strings and drop blank entries', () => {
        expect(agent.parse('{"strengths": " Clear ", "weaknesses": ["", "No example"]}')).toEqual({
            strengths: ['Clear'],
            weaknesses: ['No example']
        });
    });

    it('should keep the optional summary', () => {
        const fields = agent.parse('{"strengths": ["Clear"], "weaknesses": [], "summary": "Brief but right."}');

        expect(fields.summary).toBe('Brief but right.');
    });

    it('should reject a response with neither strengths nor weaknesses', () => {
        expect(() => agent.parse('{"strengths": [], "weaknesses": []}'))
            .toThrow('strengths or weaknesses must be present');
    });

    it('should fall back to placeholder lists', async () => {
        mockGenerate.mockReset();
        mockGenerate.mockResolvedValue('no analysis');

        const result = await agent.run(baseState);

        expect(result.parsed_fields).toEqual({
            strengths: ['Unable to analyze strengths'],
            weaknesses: ['Unable to analyze weaknesses']
        });
    });
});

describe('Improvement Agent', () => {
    const agent = new ImprovementAgent(deps);

    beforeEach(() => {
        mockGenerate.mockReset();
    });

    it('should build on the score and the identified weaknesses', () => {
        const prompt = agent.buildPrompt({
            ...baseState,
            evaluator: evaluatorResult(true),
            analyzer: analyzerResult(true, ['No write cost', 'No example'])
        });

        expect(prompt).toEqual({
            system: IMPROVEMENT_SYSTEM_PROMPT,
            user: "Question: Explain database indexing.\n\nCandidate's Answer:\nAn index lets the database find rows without a full scan." +
                '\n\nEvaluator Score: 4/5' +
                '\n\nIdentified Weaknesses:\n- No write cost\n- No example'
        });
    });

    it('should leave out weaknesses from a defaulted analysis', () => {
        const prompt = agent.buildPrompt({
            ...baseState,
            evaluator: evaluatorResult(true),
            analyzer: analyzerResult(false, ['Unable to analyze weaknesses'])
        });

        expect(prompt.user).not.toContain('Identified Weaknesses');
    });

    it('should read the suggestion as feedback', () => {
        expect(agent.parse('{"suggestion": "  Mention the write cost of indexes.  "}'))
            .toEqual({ feedback: 'Mention the write cost of indexes.' });
    });

    it('should fall back to the default improvement', async () => {
        mockGenerate.mockResolvedValue('{"advice": "missing key"}');

        const result = await agent.run(baseState);

        expect(result.parse_succeeded).toBe(false);
        expect(result.parsed_fields.feedback).toBe(DEFAULT_IMPROVEMENT);
        expect(mockGenerate).toHaveBeenCalledTimes(2);
    });
});
