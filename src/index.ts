import "dotenv/config";
import cors from "cors";
import express, { Express, Request, Response } from "express";
import { logger } from "./config/logger";
import { getSettings, Settings } from "./config/settings";
import { errorHandler } from "./middleware/error-handler";
import { evaluateRoutes } from "./routes/evaluate";
import { rankRoutes } from "./routes/rank";
import { getCacheStore } from "./services/cache.service";
import { getLLMService } from "./services/llm.service";
import { getEvaluationPipeline } from "./pipeline/evaluation-pipeline";
import { getRankingService } from "./services/ranking.service";

const API_VERSION = "1.0.0";

function createApp(settings: Readonly<Settings>): Express {
    const app = express();

    // Middleware
    app.use(cors({
        origin: settings.corsOrigins,
        credentials: true
    }));
    app.use(express.json({ limit: "1mb" }));

    // Routes
    app.use("/evaluate-answer", evaluateRoutes);
    app.use("/rank-candidates", rankRoutes);

    // Health check
    app.get("/health", async (req: Request, res: Response) => {
        const redisConnected = settings.cache.enabled ? await getCacheStore().ping() : false;

        res.json({
            status: "healthy",
            version: API_VERSION,
            llm_model: settings.llm.model,
            caching_enabled: settings.cache.enabled,
            redis_connected: redisConnected,
            timestamp: new Date().toISOString()
        });
    });

    // Root route
    app.get("/", (req: Request, res: Response) => {
        res.json({
            message: "Interview Answer Screener API",
            version: API_VERSION,
            description: "Multi-agent LLM evaluation and ranking of interview answers",
            endpoints: {
                "Evaluation": {
                    "POST /evaluate-answer": "Score one answer (score, summary, improvement)",
                    "POST /rank-candidates": "Evaluate and rank several answers to one question"
                },
                "System": {
                    "GET /health": "Health check",
                    "GET /": "API information"
                }
            }
        });
    });

    // Errors thrown by the body parser or any route
    app.use(errorHandler);

    return app;
}

async function startServer() {
    try {
        const settings = getSettings();

        const llmService = getLLMService();
        const llmConnected = await llmService.testConnection({
            model: settings.llm.model,
            temperature: settings.llm.temperature,
            maxTokens: settings.llm.maxTokens,
            timeoutMs: settings.llm.timeoutMs
        });
        if (llmConnected) {
            logger.info({ model: settings.llm.model }, "LLM service initialized and connected");
        } else {
            logger.warn({ model: settings.llm.model }, "LLM service initialized but connection test failed");
        }

        if (settings.cache.enabled) {
            const redisConnected = await getCacheStore().ping();
            logger.info({ redisConnected, ttlSeconds: settings.cache.ttlSeconds }, "Cache store initialized");
        } else {
            logger.info({}, "Caching disabled");
        }

        getEvaluationPipeline();
        getRankingService();

        const app = createApp(settings);
        const server = app.listen(settings.port, () => {
            logger.info({
                port: settings.port,
                pipelineVersion: settings.pipelineVersion,
                maxConcurrency: settings.ranking.maxConcurrency
            }, `Server running at http://localhost:${settings.port}`);
        });

        const shutdown = (signal: string) => {
            logger.info({ signal }, "Shutting down");
            server.close(() => {
                const closing = settings.cache.enabled ? getCacheStore().close() : Promise.resolve();
                void closing.finally(() => process.exit(0));
            });
        };

        process.on("SIGTERM", () => shutdown("SIGTERM"));
        process.on("SIGINT", () => shutdown("SIGINT"));
    } catch (error: unknown) {
        logger.error({ err: error }, "Failed to start server");
        process.exit(1);
    }
}

void startServer();
