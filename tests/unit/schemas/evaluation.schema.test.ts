import { describe, it, expect } from 'vitest';
import { evaluateAnswerSchema, rankCandidatesSchema } from '../../../src/schemas/evaluation.schema';

const validAnswer = 'An index lets the database find rows without a full scan.';

function issueMessages(result: { success: boolean; error?: { issues: Array<{ message: string }> } }): string[] {
    return result.error ? result.error.issues.map(issue => issue.message) : [];
}

describe('Request Schemas', () => {
    describe('evaluateAnswerSchema', () => {
        it('should trim the answer and default the question', () => {
            const parsed = evaluateAnswerSchema.parse({ candidate_answer: `  ${validAnswer}  ` });

            expect(parsed).toEqual({ candidate_answer: validAnswer, question_context: '' });
        });

        it('should measure the minimum length after trimming', () => {
            const result = evaluateAnswerSchema.safeParse({ candidate_answer: `   ${'x'.repeat(9)}   ` });

            expect(result.success).toBe(false);
            expect(issueMessages(result)).toEqual(['Answer must be at least 10 characters']);
        });

        it('should reject an answer over 5000 characters', () => {
            const result = evaluateAnswerSchema.safeParse({ candidate_answer: 'a'.repeat(5001) });

            expect(issueMessages(result)).toEqual(['Answer must be at most 5000 characters']);
        });

        it('should reject a question over 1000 characters', () => {
            const result = evaluateAnswerSchema.safeParse({
                candidate_answer: validAnswer,
                question_context: 'q'.repeat(1001)
            });

            expect(issueMessages(result)).toEqual(['Question context must be at most 1000 characters']);
        });
    });

    describe('rankCandidatesSchema', () => {
        it('should accept a valid batch', () => {
            const parsed = rankCandidatesSchema.parse({
                question_context: ' Explain database indexing. ',
                candidates: [
                    { candidate_id: 'c1', answer: validAnswer },
                    { candidate_id: 'c2', answer: validAnswer }
                ]
            });

            expect(parsed.question_context).toBe('Explain database indexing.');
            expect(parsed.candidates).toHaveLength(2);
        });

        it('should reject duplicate candidate ids', () => {
            const result = rankCandidatesSchema.safeParse({
                candidates: [
                    { candidate_id: 'c1', answer: validAnswer },
                    { candidate_id: 'c1', answer: validAnswer }
                ]
            });

            expect(result.success).toBe(false);
            expect(result.error?.issues[0]).toMatchObject({
                message: 'Candidate IDs must be unique',
                path: ['candidates']
            });
        });

        it('should reject an empty batch', () => {
            const result = rankCandidatesSchema.safeParse({ candidates: [] });

            expect(issueMessages(result)).toEqual(['At least one candidate is required']);
        });

        it('should reject more than 100 candidates', () => {
            const candidates = Array.from({ length: 101 }, (_, index) => ({
                candidate_id: `c${index}`,
                answer: validAnswer
            }));

            const result = rankCandidatesSchema.safeParse({ candidates });

            expect(issueMessages(result)).toEqual(['At most 100 candidates per request']);
        });
    });
});
