/**
 * TypeScript interfaces for evaluation data
 *
 * Agent outputs, the immutable accumulator passed between pipeline stages,
 * and the result shapes returned to the request layer.
 */

export type AgentName = 'evaluator' | 'analyzer' | 'improvement';

// Evaluator: numeric score and its rationale
export interface EvaluatorFields {
    score: number;
    rationale: string;
}

// Analyzer: ordered strengths and weaknesses, optional one-line summary
export interface AnalyzerFields {
    strengths: string[];
    weaknesses: string[];
    summary?: string;
}

// Improvement: single actionable suggestion
export interface ImprovementFields {
    feedback: string;
}

export interface AgentResult<TFields> {
    agent: AgentName;
    raw_model_text: string;
    parsed_fields: TFields;
    parse_succeeded: boolean;
    attempts: number;
}

/**
 * Accumulator handed from stage to stage. Each stage returns a new frozen
 * copy with its own result added.
 */
export interface PipelineState {
    readonly question_context: string;
    readonly candidate_answer: string;
    readonly evaluator?: Readonly<AgentResult<EvaluatorFields>>;
    readonly analyzer?: Readonly<AgentResult<AnalyzerFields>>;
    readonly improvement?: Readonly<AgentResult<ImprovementFields>>;
}

// Final result structure returned to callers and stored in the cache
export interface EvaluationResult {
    readonly score: number;
    readonly summary: string;
    readonly improvement: string;
}

export interface CacheEntry {
    fingerprint: string;
    result: EvaluationResult;
    created_at: string;
    ttl_seconds: number;
}

export interface CandidateAnswer {
    candidate_id: string;
    answer: string;
}

export interface RankedCandidate extends EvaluationResult {
    readonly candidate_id: string;
    readonly rank: number;
    readonly evaluation_failed: boolean;
}

export interface RankingResult {
    candidates: RankedCandidate[];
    total_candidates: number;
}
