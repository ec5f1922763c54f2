/**
 * Express API 앱
 */
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { logDebug } from "../utils/logger.js";
import { createHealthRouter, type HealthInfo } from "./routes/health.js";
import { createAnalyzeRouter } from "./routes/analyze.js";
import { createJobsRouter } from "./routes/jobs.js";
import { handleError } from "./lib/errorHandler.js";
import type { AnalysisService } from "../jobs/analysisService.js";

export interface AppOptions {
    service: AnalysisService;
    health: HealthInfo;
    corsOrigins?: string[];
}

export function createApp({ service, health, corsOrigins }: AppOptions): Express {
    const app: Express = express();

    // 미들웨어
    app.use(cors(corsOrigins ? { origin: corsOrigins } : {}));
    app.use(express.json({ limit: "1mb" }));

    // 요청 로깅
    app.use((req, _res, next) => {
        logDebug(`📨 ${req.method} ${req.path}`);
        next();
    });

    // 라우터 등록
    app.use("/api/health", createHealthRouter(health));
    app.use("/api/analyze", createAnalyzeRouter(service));
    app.use("/api/jobs", createJobsRouter(service));

    // 404 핸들러
    app.use((_req, res) => {
        res.status(404).json({ error: "Not Found" });
    });

    // 에러 핸들러
    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        handleError(res, err);
    });

    return app;
}
