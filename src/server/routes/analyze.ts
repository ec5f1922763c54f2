/**
 * 분석 요청 라우터
 */
import { Router, type IRouter, type Request, type Response } from "express";
import { parseAnalyzeRequest } from "../schemas.js";
import { handleError } from "../lib/errorHandler.js";
import type { AnalysisService } from "../../jobs/analysisService.js";

export function createAnalyzeRouter(service: AnalysisService): IRouter {
    const router: IRouter = Router();

    /**
     * POST /api/analyze
     * Body: { repos: string[], language: string, threshold?, branch?, aggressive? }
     * 202 { jobId, status }; the job runs in the background
     */
    router.post("/", (req: Request, res: Response) => {
        try {
            const input = parseAnalyzeRequest(req.body);
            const { job } = service.submit(input);
            res.status(202).json({ jobId: job.id, status: job.status });
        } catch (error) {
            handleError(res, error, "분석 요청 처리 중 오류가 발생했습니다.");
        }
    });

    return router;
}
