import { evaluatorOutputSchema } from '../schemas/evaluation.schema';
import { LLMPrompt } from '../services/llm.service';
import { EvaluatorFields, PipelineState } from '../types/evaluation';
import { BaseAgent, describeAnswer } from './base.agent';

export const EVALUATOR_SYSTEM_PROMPT = `You are an expert technical interviewer scoring a candidate's answer.

Score the answer on a 1-5 scale:
- 5: Exceptional. Deep understanding, optimal approach, edge cases considered.
- 4: Strong. Correct approach, clear explanation, minor gaps.
- 3: Average. Workable but shallow.
- 2: Weak. Some knowledge, significant gaps or errors.
- 1: Poor. Incorrect or no real understanding.

Weigh technical accuracy, clarity, completeness and depth.

Respond ONLY with valid JSON in this exact format:
{
    "score": <integer 1-5>,
    "rationale": "<short explanation of the score>"
}`;

export const DEFAULT_SCORE = 3;

/**
 * Evaluator Agent
 *
 * Assigns the 1-5 score that ranking sorts on.
 */
export class EvaluatorAgent extends BaseAgent<EvaluatorFields> {
    readonly name = 'evaluator' as const;
    protected readonly schema = evaluatorOutputSchema;

    buildPrompt(state: PipelineState): LLMPrompt {
        return {
            system: EVALUATOR_SYSTEM_PROMPT,
            user: describeAnswer(state)
        };
    }

    protected fallback(): EvaluatorFields {
        return {
            score: DEFAULT_SCORE,
            rationale: 'Score defaulted to the midpoint because the evaluator response could not be parsed.'
        };
    }
}
