import { Router, Request, Response } from "express";
import { logger } from "../config/logger";
import { errorMessage } from "../errors";
import { rankCandidatesSchema } from "../schemas/evaluation.schema";
import { getRankingService } from "../services/ranking.service";

const router = Router();

/**
 * POST /rank-candidates
 *
 * Evaluate several answers to the same question in parallel and rank them.
 * Individual failures come back as entries flagged `evaluation_failed`.
 *
 * Body: { candidates: [{ candidate_id, answer }], question_context?: string }
 * Returns: { candidates: RankedCandidate[], total_candidates: number }
 */
router.post('/', async (req: Request, res: Response) => {
    const parsed = rankCandidatesSchema.safeParse(req.body);

    if (!parsed.success) {
        return res.status(400).json({
            error: 'Validation failed',
            details: parsed.error.issues
        });
    }

    const { candidates, question_context } = parsed.data;

    try {
        const ranking = await getRankingService().rank(question_context, candidates);

        logger.info({
            totalCandidates: ranking.total_candidates
        }, 'Ranking request served');

        return res.json(ranking);

    } catch (error: unknown) {
        logger.error({ error: errorMessage(error) }, 'Ranking request failed');
        return res.status(500).json({
            error: 'Ranking request failed',
            message: errorMessage(error)
        });
    }
});

export { router as rankRoutes };
