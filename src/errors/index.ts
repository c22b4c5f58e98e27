/**
 * Error taxonomy for the evaluation core.
 *
 * ParseError stays inside an agent, upstream errors come from the
 * Language-Model Client, and PipelineError is the only failure `evaluate`
 * surfaces to its caller.
 */

export type PipelineStage = 'evaluator' | 'analyzer' | 'improvement';

/**
 * Thrown when an agent response cannot be turned into its expected fields.
 */
export class ParseError extends Error {
    public readonly rawText: string;

    constructor(message: string, rawText: string) {
        super(message);
        this.name = 'ParseError';
        this.rawText = rawText;
    }
}

/**
 * Base class for failures of the Language-Model Client.
 */
export abstract class UpstreamError extends Error {
    public abstract readonly retryable: boolean;
    public readonly status?: number;

    constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.status = options.status;
    }
}

/**
 * Timeouts, rate limits and connection drops. Eligible for retry.
 */
export class TransientUpstreamError extends UpstreamError {
    public readonly retryable = true;

    constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
        super(message, options);
        this.name = 'TransientUpstreamError';
    }
}

/**
 * Invalid credentials, malformed requests, caller aborts. Never retried.
 */
export class PermanentUpstreamError extends UpstreamError {
    public readonly retryable = false;

    constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
        super(message, options);
        this.name = 'PermanentUpstreamError';
    }
}

/**
 * The answer was never actually evaluated because a stage lost its upstream.
 */
export class PipelineError extends Error {
    public readonly stage: PipelineStage;

    constructor(stage: PipelineStage, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Evaluation failed at ${stage} stage: ${reason}`, { cause });
        this.name = 'PipelineError';
        this.stage = stage;
    }
}

export class ConfigurationError extends Error {
    public readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigurationError';
        this.issues = issues;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
