import { ZodType, ZodTypeDef } from 'zod';
import { ILogger } from '../config/logger';
import { ParseError } from '../errors';
import { GenerateOptions, ILanguageModelClient, LLMPrompt, ModelConfig } from '../services/llm.service';
import { AgentName, AgentResult, PipelineState } from '../types/evaluation';
import { extractJsonObject } from '../utils/json.util';

export interface AgentDependencies {
    llm: ILanguageModelClient;
    modelConfig: ModelConfig;
    logger: ILogger;
    parseAttempts: number;
}

/**
 * Base Agent
 *
 * One model-backed stage. Sends the same prompt up to `parseAttempts` times
 * until the response validates against the agent's schema, then falls back to
 * the agent's default fields. Upstream errors from the client are not caught.
 */
export abstract class BaseAgent<TFields> {
    abstract readonly name: AgentName;
    protected abstract readonly schema: ZodType<TFields, ZodTypeDef, unknown>;

    constructor(protected deps: AgentDependencies) { }

    abstract buildPrompt(state: PipelineState): LLMPrompt;

    protected abstract fallback(): TFields;

    async run(state: PipelineState, options: GenerateOptions = {}): Promise<AgentResult<TFields>> {
        const prompt = this.buildPrompt(state);
        const attempts = Math.max(1, this.deps.parseAttempts);
        let rawText = '';

        for (let attempt = 1; attempt <= attempts; attempt++) {
            rawText = await this.deps.llm.generate(prompt, this.deps.modelConfig, options);

            try {
                const fields = this.parse(rawText);

                this.deps.logger.info({
                    agent: this.name,
                    attempt
                }, `${this.name} agent completed`);

                return {
                    agent: this.name,
                    raw_model_text: rawText,
                    parsed_fields: fields,
                    parse_succeeded: true,
                    attempts: attempt
                };
            } catch (error: unknown) {
                if (!(error instanceof ParseError)) {
                    throw error;
                }

                this.deps.logger.warn({
                    agent: this.name,
                    attempt,
                    maxAttempts: attempts,
                    error: error.message
                }, `${this.name} agent response could not be parsed`);
            }
        }

        this.deps.logger.warn({
            agent: this.name,
            attempts
        }, `${this.name} agent fell back to default output`);

        return {
            agent: this.name,
            raw_model_text: rawText,
            parsed_fields: this.fallback(),
            parse_succeeded: false,
            attempts
        };
    }

    parse(rawText: string): TFields {
        const parsed = this.schema.safeParse(extractJsonObject(rawText));

        if (!parsed.success) {
            const issues = parsed.error.issues
                .map(issue => `${issue.path.join('.') || 'response'}: ${issue.message}`)
                .join('; ');
            throw new ParseError(`Invalid ${this.name} output: ${issues}`, rawText);
        }

        return parsed.data;
    }
}

/**
 * Shared user-message layout: question first (when present), then the answer.
 */
export function describeAnswer(state: PipelineState): string {
    const answer = `Candidate's Answer:\n${state.candidate_answer}`;
    return state.question_context.trim() === ''
        ? answer
        : `Question: ${state.question_context}\n\n${answer}`;
}
