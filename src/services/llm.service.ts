import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import {
    ConfigurationError,
    PermanentUpstreamError,
    TransientUpstreamError,
    UpstreamError,
    errorMessage
} from '../errors';
import { createTimeoutSignal, rejectOnAbort } from '../utils/abort.util';
import { RetryUtil, IRetryUtil } from '../utils/retry.util';

// Narrow view of the SDK client for better testability
export interface IChatCompletionClient {
    chat: {
        completions: {
            create: (
                params: ChatCompletionCreateParamsNonStreaming,
                options?: { signal?: AbortSignal; timeout?: number; maxRetries?: number }
            ) => Promise<{
                choices: Array<{ message: { content: string | null } }>;
                usage?: { total_tokens: number };
            }>;
        };
    };
}

export interface LLMPrompt {
    system: string;
    user: string;
}

export interface ModelConfig {
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
}

export interface GenerateOptions {
    signal?: AbortSignal;
}

/**
 * Language-Model Client contract consumed by the agents.
 *
 * Fails with TransientUpstreamError once retries are spent, or with
 * PermanentUpstreamError straight away.
 */
export interface ILanguageModelClient {
    generate(prompt: LLMPrompt, modelConfig: ModelConfig, options?: GenerateOptions): Promise<string>;
}

/**
 * Language-Model Service with Dependency Injection
 *
 * Sends JSON-mode chat completions through the OpenAI SDK (or any
 * OpenAI-compatible endpoint), bounds every call by a timeout, and maps SDK
 * failures onto the upstream error taxonomy.
 */
export class LLMService implements ILanguageModelClient {
    constructor(
        private client: IChatCompletionClient,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private maxAttempts: number = 3
    ) { }

    /**
     * Factory method for production use
     */
    static create(): LLMService {
        const settings = getSettings();

        if (!settings.llm.apiKey) {
            throw new ConfigurationError(['OPENAI_API_KEY: required to reach the language model']);
        }

        const openai = new OpenAI({
            apiKey: settings.llm.apiKey,
            baseURL: settings.llm.baseURL,
            maxRetries: 0
        });

        const client: IChatCompletionClient = {
            chat: {
                completions: {
                    create: (params, options) => openai.chat.completions.create(params, options)
                }
            }
        };

        return new LLMService(client, RetryUtil, logger, settings.llm.maxAttempts);
    }

    /**
     * Generate a completion, retrying transient failures
     */
    async generate(prompt: LLMPrompt, modelConfig: ModelConfig, options: GenerateOptions = {}): Promise<string> {
        return await this.retryUtil.executeWithRetry(
            () => this.complete(prompt, modelConfig, options.signal),
            {
                maxAttempts: this.maxAttempts,
                baseDelay: 1000,
                maxDelay: 5000,
                operationName: 'LLM completion',
                signal: options.signal
            }
        );
    }

    /**
     * Cheap round trip used at startup
     */
    async testConnection(modelConfig: ModelConfig): Promise<boolean> {
        try {
            await this.complete(
                { system: 'Respond ONLY with valid JSON.', user: 'Return {"status": "ok"}' },
                { ...modelConfig, maxTokens: 20 },
                undefined
            );
            this.logger.info({ model: modelConfig.model }, 'LLM connection test successful');
            return true;
        } catch (error: unknown) {
            this.logger.error({ error: errorMessage(error) }, 'LLM connection test failed');
            return false;
        }
    }

    private async complete(prompt: LLMPrompt, modelConfig: ModelConfig, callerSignal: AbortSignal | undefined): Promise<string> {
        const call = createTimeoutSignal(callerSignal, modelConfig.timeoutMs);

        try {
            this.logger.debug({
                model: modelConfig.model,
                temperature: modelConfig.temperature,
                promptLength: prompt.system.length + prompt.user.length
            }, 'Generating LLM completion');

            const response = await Promise.race([
                this.client.chat.completions.create({
                    model: modelConfig.model,
                    messages: [
                        { role: 'system', content: prompt.system },
                        { role: 'user', content: prompt.user }
                    ],
                    temperature: modelConfig.temperature,
                    max_tokens: modelConfig.maxTokens,
                    response_format: { type: 'json_object' }
                }, {
                    signal: call.signal,
                    timeout: modelConfig.timeoutMs,
                    maxRetries: 0
                }),
                rejectOnAbort(call.signal)
            ]);

            const content = response.choices[0]?.message?.content ?? '';

            this.logger.debug({
                tokensUsed: response.usage?.total_tokens ?? 0,
                contentLength: content.length
            }, 'LLM completion generated');

            return content;
        } catch (error: unknown) {
            throw classifyUpstreamError(error, {
                timedOut: call.timedOut(),
                aborted: callerSignal?.aborted === true,
                timeoutMs: modelConfig.timeoutMs
            });
        } finally {
            call.cleanup();
        }
    }
}

/**
 * Map any failure of a completion call onto Transient/PermanentUpstreamError.
 */
export function classifyUpstreamError(
    error: unknown,
    context: { timedOut: boolean; aborted: boolean; timeoutMs: number }
): UpstreamError {
    if (error instanceof UpstreamError) {
        return error;
    }

    if (context.timedOut) {
        return new TransientUpstreamError(`Language model call timed out after ${context.timeoutMs}ms`, { cause: error });
    }

    if (context.aborted) {
        return new PermanentUpstreamError('Language model call aborted by caller', { cause: error });
    }

    const status = typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
        ? error.status
        : undefined;

    if (RetryUtil.isRetryableError(error)) {
        return new TransientUpstreamError(errorMessage(error), { status, cause: error });
    }

    return new PermanentUpstreamError(errorMessage(error), { status, cause: error });
}

// Singleton instance
let llmService: LLMService | null = null;

export function getLLMService(): LLMService {
    if (!llmService) {
        llmService = LLMService.create();
    }
    return llmService;
}
