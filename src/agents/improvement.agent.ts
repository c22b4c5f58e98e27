import { improvementOutputSchema } from '../schemas/evaluation.schema';
import { LLMPrompt } from '../services/llm.service';
import { ImprovementFields, PipelineState } from '../types/evaluation';
import { BaseAgent, describeAnswer } from './base.agent';

export const IMPROVEMENT_SYSTEM_PROMPT = `You are an expert technical interviewer giving constructive feedback.

Give ONE specific, actionable improvement suggestion:
- concrete, not generic ("study more" is not acceptable)
- the single most impactful change
- at most 300 characters
- constructive in tone, naming a next step or concept to learn

Respond ONLY with valid JSON in this exact format:
{
    "suggestion": "<one specific improvement suggestion>"
}`;

export const DEFAULT_IMPROVEMENT = 'Review the question requirements and ensure your answer addresses all key points with specific examples.';

/**
 * Improvement Agent
 *
 * Builds on the score and the analyzer's weaknesses.
 */
export class ImprovementAgent extends BaseAgent<ImprovementFields> {
    readonly name = 'improvement' as const;
    protected readonly schema = improvementOutputSchema;

    buildPrompt(state: PipelineState): LLMPrompt {
        let user = describeAnswer(state);

        if (state.evaluator?.parse_succeeded) {
            user += `\n\nEvaluator Score: ${state.evaluator.parsed_fields.score}/5`;
        }
        if (state.analyzer?.parse_succeeded && state.analyzer.parsed_fields.weaknesses.length > 0) {
            user += `\n\nIdentified Weaknesses:\n${state.analyzer.parsed_fields.weaknesses.map(item => `- ${item}`).join('\n')}`;
        }

        return { system: IMPROVEMENT_SYSTEM_PROMPT, user };
    }

    protected fallback(): ImprovementFields {
        return { feedback: DEFAULT_IMPROVEMENT };
    }
}
