import { analyzerOutputSchema } from '../schemas/evaluation.schema';
import { LLMPrompt } from '../services/llm.service';
import { AnalyzerFields, PipelineState } from '../types/evaluation';
import { BaseAgent, describeAnswer } from './base.agent';

export const ANALYZER_SYSTEM_PROMPT = `You are an expert technical interviewer analyzing a candidate's answer.

Give a balanced analysis:
1. strengths: what the candidate did well (accuracy, clarity, approach)
2. weaknesses: what is missing, wrong or could be improved
3. summary: one line, at most 200 characters, capturing the essence of the answer

Be specific. Focus on technical content, not style.

Respond ONLY with valid JSON in this exact format:
{
    "strengths": ["<strength>", "..."],
    "weaknesses": ["<weakness>", "..."],
    "summary": "<one-line summary>"
}`;

/**
 * Analyzer Agent
 *
 * Lists strengths and weaknesses. Sees the evaluator's score when available.
 */
export class AnalyzerAgent extends BaseAgent<AnalyzerFields> {
    readonly name = 'analyzer' as const;
    protected readonly schema = analyzerOutputSchema;

    buildPrompt(state: PipelineState): LLMPrompt {
        let user = describeAnswer(state);

        if (state.evaluator?.parse_succeeded) {
            user += `\n\nEvaluator Score: ${state.evaluator.parsed_fields.score}/5`;
        }

        return { system: ANALYZER_SYSTEM_PROMPT, user };
    }

    protected fallback(): AnalyzerFields {
        return {
            strengths: ['Unable to analyze strengths'],
            weaknesses: ['Unable to analyze weaknesses']
        };
    }
}
