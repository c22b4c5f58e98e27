import { z } from 'zod';

/**
 * Validation schemas for model output, cached entries and HTTP requests.
 */

const numericScore = z.union([
    z.number().finite(),
    z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'score must be numeric').transform(Number)
]);

// Whole numbers 1-5 only; anything else fails parsing and goes through retry and default
export const evaluatorOutputSchema = z.object({
    score: numericScore.pipe(z.number().int('score must be a whole number').min(1, 'score must be at least 1').max(5, 'score must be at most 5')),
    justification: z.string().trim().min(1).optional(),
    rationale: z.string().trim().min(1).optional()
}).transform((output, ctx) => {
    const rationale = output.rationale ?? output.justification;
    if (!rationale) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'rationale is required' });
        return z.NEVER;
    }
    return { score: output.score, rationale };
});

const textList = z.union([
    z.array(z.string()),
    z.string().transform(value => [value])
]).transform(items => items.map(item => item.trim()).filter(item => item.length > 0));

export const analyzerOutputSchema = z.object({
    strengths: textList,
    weaknesses: textList,
    summary: z.string().trim().min(1).optional()
}).refine(
    output => output.strengths.length > 0 || output.weaknesses.length > 0,
    { message: 'strengths or weaknesses must be present' }
);

export const improvementOutputSchema = z.object({
    suggestion: z.string().trim().min(1).optional(),
    feedback: z.string().trim().min(1).optional()
}).transform((output, ctx) => {
    const feedback = output.feedback ?? output.suggestion;
    if (!feedback) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'suggestion is required' });
        return z.NEVER;
    }
    return { feedback };
});

export const evaluationResultSchema = z.object({
    score: z.number().int().min(1).max(5),
    summary: z.string(),
    improvement: z.string()
});

export const cacheEntrySchema = z.object({
    fingerprint: z.string(),
    result: evaluationResultSchema,
    created_at: z.string(),
    ttl_seconds: z.number().int().positive()
});

const answerText = z
    .string()
    .max(5000, 'Answer must be at most 5000 characters')
    .transform(value => value.trim())
    .refine(value => value.length >= 10, 'Answer must be at least 10 characters');

const questionText = z
    .string()
    .max(1000, 'Question context must be at most 1000 characters')
    .transform(value => value.trim())
    .optional()
    .transform(value => value ?? '');

export const evaluateAnswerSchema = z.object({
    candidate_answer: answerText,
    question_context: questionText
});

export const rankCandidatesSchema = z.object({
    candidates: z.array(z.object({
        candidate_id: z.string().trim().min(1, 'Candidate ID is required').max(100),
        answer: answerText
    })).min(1, 'At least one candidate is required').max(100, 'At most 100 candidates per request'),
    question_context: questionText
}).refine(
    request => new Set(request.candidates.map(candidate => candidate.candidate_id)).size === request.candidates.length,
    { message: 'Candidate IDs must be unique', path: ['candidates'] }
);

export type EvaluateAnswerRequest = z.infer<typeof evaluateAnswerSchema>;
export type RankCandidatesRequest = z.infer<typeof rankCandidatesSchema>;
