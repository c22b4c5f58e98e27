import { Router, Request, Response } from "express";
import { logger } from "../config/logger";
import { PipelineError, errorMessage } from "../errors";
import { getEvaluationPipeline } from "../pipeline/evaluation-pipeline";
import { evaluateAnswerSchema } from "../schemas/evaluation.schema";

const router = Router();

/**
 * POST /evaluate-answer
 *
 * Score a single candidate answer through the multi-agent pipeline.
 *
 * Body: { candidate_answer: string, question_context?: string }
 * Returns: { score: number, summary: string, improvement: string }
 */
router.post('/', async (req: Request, res: Response) => {
    const parsed = evaluateAnswerSchema.safeParse(req.body);

    if (!parsed.success) {
        return res.status(400).json({
            error: 'Validation failed',
            details: parsed.error.issues
        });
    }

    const { candidate_answer, question_context } = parsed.data;

    try {
        const result = await getEvaluationPipeline().evaluate(question_context, candidate_answer);

        logger.info({ score: result.score }, 'Evaluation request served');

        return res.json(result);

    } catch (error: unknown) {
        if (error instanceof PipelineError) {
            logger.error({ stage: error.stage, error: error.message }, 'Evaluation request failed upstream');
            return res.status(502).json({
                error: 'EvaluationError',
                message: 'Failed to evaluate answer',
                details: { stage: error.stage, error: error.message }
            });
        }

        logger.error({ error: errorMessage(error) }, 'Evaluation request failed');
        return res.status(500).json({
            error: 'Evaluation request failed',
            message: errorMessage(error)
        });
    }
});

export { router as evaluateRoutes };
