import pLimit from 'p-limit';
import { logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import { MAX_SUMMARY_LENGTH, truncate } from '../agents/synthesizer';
import { errorMessage } from '../errors';
import { getEvaluationPipeline, IEvaluationPipeline } from '../pipeline/evaluation-pipeline';
import { CandidateAnswer, EvaluationResult, RankedCandidate, RankingResult } from '../types/evaluation';

export interface RankingConfig {
    maxConcurrency: number;
    deadlineMs: number;
}

export interface CandidateOutcome {
    candidate_id: string;
    result: EvaluationResult;
    evaluation_failed: boolean;
}

export const SENTINEL_IMPROVEMENT = 'Unable to provide feedback because the answer could not be evaluated.';

/**
 * Placeholder for a candidate whose evaluation never completed. Score 0
 * sorts it below every real evaluation.
 */
export function failedEvaluation(reason: string): EvaluationResult {
    return Object.freeze({
        score: 0,
        summary: truncate(`Evaluation failed: ${reason}`, MAX_SUMMARY_LENGTH),
        improvement: SENTINEL_IMPROVEMENT
    });
}

/**
 * Ranking Coordinator
 *
 * Evaluates every candidate against one question with bounded concurrency
 * and an overall deadline, then orders them by score. Never rejects: failed
 * or unfinished candidates come back as flagged sentinel entries.
 */
export class RankingService {
    constructor(
        private pipeline: IEvaluationPipeline,
        private config: RankingConfig,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): RankingService {
        const settings = getSettings();
        return new RankingService(getEvaluationPipeline(), settings.ranking, logger);
    }

    async rank(questionContext: string, candidates: readonly CandidateAnswer[]): Promise<RankingResult> {
        const startedAt = Date.now();
        const controller = new AbortController();
        const limit = pLimit(this.config.maxConcurrency);
        // One slot per candidate, written only by that candidate's task
        const outcomes: Array<CandidateOutcome | undefined> = candidates.map(() => undefined);

        this.logger.info({
            candidatesCount: candidates.length,
            maxConcurrency: this.config.maxConcurrency,
            deadlineMs: this.config.deadlineMs
        }, 'Ranking candidates');

        const tasks = candidates.map((candidate, index) =>
            limit(() => this.evaluateCandidate(questionContext, candidate, controller.signal))
                .then(outcome => {
                    outcomes[index] = outcome;
                })
        );

        const deadlineExpired = await this.waitWithDeadline(Promise.all(tasks));

        if (deadlineExpired) {
            limit.clearQueue();
            controller.abort(new Error(`Ranking deadline of ${this.config.deadlineMs}ms exceeded`));
        }

        const settled: CandidateOutcome[] = candidates.map((candidate, index) => {
            const outcome = outcomes[index];
            if (outcome) {
                return outcome;
            }

            this.logger.warn({
                candidateId: candidate.candidate_id,
                deadlineMs: this.config.deadlineMs
            }, 'Candidate not evaluated before deadline');

            return {
                candidate_id: candidate.candidate_id,
                result: failedEvaluation(`deadline of ${this.config.deadlineMs}ms exceeded`),
                evaluation_failed: true
            };
        });

        const ranked = orderByScore(settled);

        this.logger.info({
            candidatesCount: ranked.length,
            failedCount: ranked.filter(candidate => candidate.evaluation_failed).length,
            deadlineExpired,
            durationMs: Date.now() - startedAt
        }, 'Ranking completed');

        return {
            candidates: ranked,
            total_candidates: ranked.length
        };
    }

    private async evaluateCandidate(
        questionContext: string,
        candidate: CandidateAnswer,
        signal: AbortSignal
    ): Promise<CandidateOutcome> {
        if (signal.aborted) {
            return {
                candidate_id: candidate.candidate_id,
                result: failedEvaluation('ranking deadline exceeded before evaluation started'),
                evaluation_failed: true
            };
        }

        try {
            const result = await this.pipeline.evaluate(questionContext, candidate.answer, { signal });
            return { candidate_id: candidate.candidate_id, result, evaluation_failed: false };
        } catch (error: unknown) {
            this.logger.error({
                candidateId: candidate.candidate_id,
                error: errorMessage(error)
            }, 'Candidate evaluation failed');

            return {
                candidate_id: candidate.candidate_id,
                result: failedEvaluation(errorMessage(error)),
                evaluation_failed: true
            };
        }
    }

    /**
     * Resolves true if the deadline fires before `work` settles.
     */
    private async waitWithDeadline(work: Promise<unknown>): Promise<boolean> {
        let timer: NodeJS.Timeout | undefined;

        const deadline = new Promise<boolean>(resolve => {
            timer = setTimeout(() => resolve(true), this.config.deadlineMs);
        });

        try {
            return await Promise.race([work.then(() => false), deadline]);
        } finally {
            clearTimeout(timer);
        }
    }
}

/**
 * Score descending; equal scores keep submission order. Ranks are 1-based
 * and contiguous.
 */
export function orderByScore(outcomes: readonly CandidateOutcome[]): RankedCandidate[] {
    return outcomes
        .map((outcome, index) => ({ outcome, index }))
        .sort((a, b) => (b.outcome.result.score - a.outcome.result.score) || (a.index - b.index))
        .map(({ outcome }, position) => ({
            candidate_id: outcome.candidate_id,
            score: outcome.result.score,
            summary: outcome.result.summary,
            improvement: outcome.result.improvement,
            rank: position + 1,
            evaluation_failed: outcome.evaluation_failed
        }));
}

// Singleton instance
let rankingService: RankingService | null = null;

export function getRankingService(): RankingService {
    if (!rankingService) {
        rankingService = RankingService.create();
    }
    return rankingService;
}
