import { logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import { AnalyzerAgent } from '../agents/analyzer.agent';
import { AgentDependencies, BaseAgent } from '../agents/base.agent';
import { EvaluatorAgent } from '../agents/evaluator.agent';
import { ImprovementAgent } from '../agents/improvement.agent';
import { synthesize } from '../agents/synthesizer';
import { PipelineError, PipelineStage, UpstreamError, errorMessage } from '../errors';
import { getCacheStore, ICacheStore } from '../services/cache.service';
import { getLLMService, ILanguageModelClient, ModelConfig } from '../services/llm.service';
import { AgentResult, EvaluationResult, PipelineState } from '../types/evaluation';
import { computeFingerprint } from '../utils/fingerprint.util';

export interface PipelineConfig {
    cachingEnabled: boolean;
    cacheTtlSeconds: number;
    pipelineVersion: string;
    parseAttempts: number;
    modelConfig: ModelConfig;
}

export interface EvaluateOptions {
    signal?: AbortSignal;
}

export interface IEvaluationPipeline {
    evaluate(questionContext: string, candidateAnswer: string, options?: EvaluateOptions): Promise<EvaluationResult>;
}

/**
 * Evaluation Pipeline
 *
 * Runs one candidate answer through the fixed stage order
 * Evaluator -> Analyzer -> Improvement -> Synthesizer, with a cache lookup in
 * front and a best-effort cache write behind.
 *
 * Each stage gets a frozen accumulator and hands back a new one; no state is
 * held on the instance between calls, so concurrent evaluations are
 * independent.
 */
export class EvaluationPipeline implements IEvaluationPipeline {
    private evaluator: EvaluatorAgent;
    private analyzer: AnalyzerAgent;
    private improvement: ImprovementAgent;

    constructor(
        llm: ILanguageModelClient,
        private cache: ICacheStore | null,
        private config: PipelineConfig,
        private logger: ILogger
    ) {
        const deps: AgentDependencies = {
            llm,
            modelConfig: config.modelConfig,
            logger,
            parseAttempts: config.parseAttempts
        };

        this.evaluator = new EvaluatorAgent(deps);
        this.analyzer = new AnalyzerAgent(deps);
        this.improvement = new ImprovementAgent(deps);
    }

    /**
     * Factory method for production use
     */
    static create(): EvaluationPipeline {
        const settings = getSettings();

        return new EvaluationPipeline(
            getLLMService(),
            settings.cache.enabled ? getCacheStore() : null,
            {
                cachingEnabled: settings.cache.enabled,
                cacheTtlSeconds: settings.cache.ttlSeconds,
                pipelineVersion: settings.pipelineVersion,
                parseAttempts: settings.parseAttempts,
                modelConfig: {
                    model: settings.llm.model,
                    temperature: settings.llm.temperature,
                    maxTokens: settings.llm.maxTokens,
                    timeoutMs: settings.llm.timeoutMs
                }
            },
            logger
        );
    }

    /**
     * Evaluate one answer. Rejects only with PipelineError.
     */
    async evaluate(questionContext: string, candidateAnswer: string, options: EvaluateOptions = {}): Promise<EvaluationResult> {
        const fingerprint = computeFingerprint(questionContext, candidateAnswer, this.config.pipelineVersion);
        const startedAt = Date.now();

        this.logger.info({
            fingerprint,
            answerLength: candidateAnswer.length,
            hasQuestion: questionContext.trim() !== ''
        }, 'Starting evaluation');

        const cached = await this.readCache(fingerprint);
        if (cached) {
            this.logger.info({ fingerprint, score: cached.score }, 'Cache hit');
            return cached;
        }

        let state: PipelineState = Object.freeze({
            question_context: questionContext,
            candidate_answer: candidateAnswer
        });

        const evaluator = await this.runStage('evaluator', this.evaluator, state, options);
        state = Object.freeze({ ...state, evaluator });

        const analyzer = await this.runStage('analyzer', this.analyzer, state, options);
        state = Object.freeze({ ...state, analyzer });

        const improvement = await this.runStage('improvement', this.improvement, state, options);

        const result = synthesize({ evaluator, analyzer, improvement });

        this.writeCache(fingerprint, result);

        this.logger.info({
            fingerprint,
            score: result.score,
            defaultedAgents: [evaluator, analyzer, improvement]
                .filter(stage => !stage.parse_succeeded)
                .map(stage => stage.agent),
            durationMs: Date.now() - startedAt
        }, 'Evaluation completed');

        return result;
    }

    private async runStage<TFields>(
        stage: PipelineStage,
        agent: BaseAgent<TFields>,
        state: PipelineState,
        options: EvaluateOptions
    ): Promise<AgentResult<TFields>> {
        this.logger.debug({ stage }, 'Running pipeline stage');

        try {
            return Object.freeze(await agent.run(state, { signal: options.signal }));
        } catch (error: unknown) {
            this.logger.error({
                stage,
                error: errorMessage(error),
                upstream: error instanceof UpstreamError
            }, 'Pipeline stage failed');

            throw new PipelineError(stage, error);
        }
    }

    private async readCache(fingerprint: string): Promise<EvaluationResult | null> {
        if (!this.config.cachingEnabled || !this.cache) {
            return null;
        }

        try {
            return await this.cache.get(fingerprint);
        } catch (error: unknown) {
            this.logger.warn({ fingerprint, error: errorMessage(error) }, 'Cache lookup failed, evaluating without cache');
            return null;
        }
    }

    /**
     * Fire-and-forget: the caller never waits on or sees a cache write.
     */
    private writeCache(fingerprint: string, result: EvaluationResult): void {
        if (!this.config.cachingEnabled || !this.cache) {
            return;
        }

        const write = async (store: ICacheStore) => {
            try {
                await store.set(fingerprint, result, this.config.cacheTtlSeconds);
            } catch (error: unknown) {
                this.logger.warn({ fingerprint, error: errorMessage(error) }, 'Cache write failed');
            }
        };

        void write(this.cache);
    }
}

// Singleton instance
let evaluationPipeline: EvaluationPipeline | null = null;

export function getEvaluationPipeline(): EvaluationPipeline {
    if (!evaluationPipeline) {
        evaluationPipeline = EvaluationPipeline.create();
    }
    return evaluationPipeline;
}
