import "reflect-metadata";
import express, { Request, Response } from "express";
import type { Server } from "http";
import { AppDataSource } from "./db/data-source";
import { jobRoutes } from "./routes/jobs";
import { answerRoutes } from "./routes/answers";
import { resultRoutes } from "./routes/result";
import { errorFields, logger } from "./config/logger";
import { getSettings } from "./config/settings";
import { getQueueConfig } from "./queue/queue-config";
import { evaluationProcessor } from "./workers/evaluation-worker";
import { getResponseCache } from "./cache/response-cache.service";
import { getSharedStore } from "./cache/shared-store";

const settings = getSettings();

const app = express();

// Middleware
app.use(express.json({ limit: "1mb" }));
app.use(express.urlencoded({ extended: true }));

// Routes
app.use("/jobs", jobRoutes);
app.use("/answers", answerRoutes);
app.use("/result", resultRoutes);

// Health check
app.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
});

// Root route
app.get("/", (req: Request, res: Response) => {
    res.json({
        message: "Interview Evaluation Engine API",
        version: "1.0.0",
        description: "Competency frameworks, interview questions and rubric-based answer evaluation with cohort percentiles",
        endpoints: {
            "Job Contexts": {
                "POST /jobs": "Register a job description",
                "POST /jobs/:id/framework": "Generate the competency framework",
                "POST /jobs/:id/questions": "Generate the question set"
            },
            "Evaluation": {
                "POST /answers": "Submit an answer for evaluation (async)",
                "GET /result/:answerId": "Get the evaluation report"
            },
            "System": {
                "GET /health": "Health check",
                "GET /": "API information"
            }
        },
        providers: settings.PROVIDER_ORDER
    });
});

// Initialize database and start server
async function startServer(): Promise<Server> {
    await AppDataSource.initialize();
    logger.info({}, "Database connection established");

    getResponseCache().start();
    logger.info({ capacity: settings.CACHE_CAPACITY }, "Response cache sweeper started");

    getQueueConfig().startWorker(evaluationProcessor);
    logger.info({}, "Queue system initialized and worker started");

    return app.listen(settings.PORT, () => {
        logger.info({
            port: settings.PORT,
            providers: settings.PROVIDER_ORDER,
            endpoints: ["POST /jobs", "POST /jobs/:id/framework", "POST /jobs/:id/questions", "POST /answers", "GET /result/:answerId"]
        }, `Server running at http://localhost:${settings.PORT}`);
    });
}

// Stop accepting requests, let running jobs finish, then release connections
async function shutdown(server: Server, signal: string): Promise<void> {
    logger.info({ signal }, "Shutdown signal received");
    await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
    });
    await getQueueConfig().close();
    getResponseCache().stop();
    await getSharedStore().close();
    await AppDataSource.destroy();
    logger.info({ signal }, "Shutdown complete");
}

startServer()
    .then(server => {
        let shuttingDown = false;
        const handleSignal = (signal: string) => {
            if (shuttingDown) {
                logger.warn({ signal }, "Forced shutdown, exiting immediately");
                process.exit(1);
            }
            shuttingDown = true;
            shutdown(server, signal)
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error(errorFields(error), "Shutdown failed");
                    process.exit(1);
                });
        };
        process.on("SIGINT", () => handleSignal("SIGINT"));
        process.on("SIGTERM", () => handleSignal("SIGTERM"));
    })
    .catch((error: unknown) => {
        logger.error(errorFields(error), "Failed to start server");
        process.exit(1);
    });
