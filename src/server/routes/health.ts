/**
 * 헬스체크 라우터
 */
import { Router, type IRouter, type Request, type Response } from "express";

export interface HealthInfo {
    embeddingProvider: string;
    explanationMode: string;
    repositorySource: string;
}

export function createHealthRouter(info: HealthInfo): IRouter {
    const router: IRouter = Router();

    /**
     * GET /api/health
     */
    router.get("/", (_req: Request, res: Response) => {
        res.json({
            status: "ok",
            timestamp: new Date().toISOString(),
            ...info,
        });
    });

    return router;
}
