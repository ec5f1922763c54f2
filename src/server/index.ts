/**
 * Express API 서버
 * 분석 요청 접수, 진행 상황 조회, 보고서 다운로드
 */
import dotenv from "dotenv";
dotenv.config();

import { pathToFileURL } from "url";
import { env } from "../../shared/config/env.js";
import { logError, logInfo } from "../utils/logger.js";
import { createApp } from "./app.js";
import { createAnalysisService } from "./bootstrap.js";

export function startServer(port = Number(env.API_PORT())): void {
    const service = createAnalysisService();
    const { config } = service.deps;

    const corsOrigins = env
        .CORS_ORIGINS()
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0);

    const app = createApp({
        service,
        corsOrigins: corsOrigins.length > 0 ? corsOrigins : undefined,
        health: {
            embeddingProvider: config.embeddingProvider,
            explanationMode: config.explanationMode,
            repositorySource: config.repositorySource,
        },
    });

    app.listen(port, () => {
        logInfo(`
🚀 API Server is running!
━━━━━━━━━━━━━━━━━━━━━━━━━━━
📍 URL: http://localhost:${port}
📋 Endpoints:
   GET  /api/health            - 서버 상태 확인
   POST /api/analyze           - 분석 요청
   GET  /api/jobs              - 작업 목록
   GET  /api/jobs/:id          - 작업 상태
   GET  /api/jobs/:id/report   - 분석 보고서
   POST /api/jobs/:id/cancel   - 작업 취소
━━━━━━━━━━━━━━━━━━━━━━━━━━━
`);
    });
}

const entry = process.argv[1];
const isEntryPoint = entry !== undefined && pathToFileURL(entry).href === import.meta.url;

if (isEntryPoint) {
    try {
        startServer();
    } catch (error) {
        logError("서버 시작 실패", error);
        process.exit(1);
    }
}
