import {
    AgentResult,
    AnalyzerFields,
    EvaluationResult,
    EvaluatorFields,
    ImprovementFields
} from '../types/evaluation';

export const MAX_SUMMARY_LENGTH = 200;
export const MAX_IMPROVEMENT_LENGTH = 300;

export interface SynthesizerInput {
    evaluator: AgentResult<EvaluatorFields>;
    analyzer: AgentResult<AnalyzerFields>;
    improvement: AgentResult<ImprovementFields>;
}

/**
 * Merge the three agent outputs into the final, frozen EvaluationResult.
 */
export function synthesize({ evaluator, analyzer, improvement }: SynthesizerInput): EvaluationResult {
    return Object.freeze({
        score: evaluator.parsed_fields.score,
        summary: truncate(summarize(analyzer.parsed_fields), MAX_SUMMARY_LENGTH),
        improvement: truncate(improvement.parsed_fields.feedback, MAX_IMPROVEMENT_LENGTH)
    });
}

/**
 * The analyzer's own one-liner wins; otherwise strengths and weaknesses are
 * condensed into one sentence each.
 */
export function summarize(fields: AnalyzerFields): string {
    if (fields.summary) {
        return fields.summary;
    }

    const parts: string[] = [];
    if (fields.strengths.length > 0) {
        parts.push(`Strengths: ${fields.strengths.join('; ')}.`);
    }
    if (fields.weaknesses.length > 0) {
        parts.push(`Weaknesses: ${fields.weaknesses.join('; ')}.`);
    }

    return parts.length > 0 ? parts.join(' ') : 'No summary available';
}

export function truncate(text: string, maxLength: number): string {
    return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}
