/**
 * 작업 조회/취소 라우터
 */
import { Router, type IRouter, type Request, type Response } from "express";
import { NotFoundError } from "../../errors.js";
import { jobIdParamsSchema } from "../schemas.js";
import { handleError } from "../lib/errorHandler.js";
import type { AnalysisService } from "../../jobs/analysisService.js";

function jobIdOf(req: Request): string {
    const parsed = jobIdParamsSchema.safeParse(req.params);
    if (!parsed.success) {
        throw new NotFoundError(`Job not found: ${req.params.id ?? ""}`);
    }
    return parsed.data.id;
}

export function createJobsRouter(service: AnalysisService): IRouter {
    const router: IRouter = Router();

    /**
     * GET /api/jobs
     */
    router.get("/", (_req: Request, res: Response) => {
        res.json({ jobs: service.listJobs() });
    });

    /**
     * GET /api/jobs/:id
     */
    router.get("/:id", (req: Request, res: Response) => {
        try {
            res.json(service.getJob(jobIdOf(req)));
        } catch (error) {
            handleError(res, error);
        }
    });

    /**
     * GET /api/jobs/:id/report[?download=1]
     */
    router.get("/:id/report", (req: Request, res: Response) => {
        try {
            const id = jobIdOf(req);
            const report = service.getReport(id);
            if (req.query.download === "1" || req.query.download === "true") {
                res.setHeader("Content-Disposition", `attachment; filename="similarity-report-${id}.json"`);
            }
            res.json(report);
        } catch (error) {
            handleError(res, error);
        }
    });

    /**
     * POST /api/jobs/:id/cancel (idempotent)
     */
    router.post("/:id/cancel", (req: Request, res: Response) => {
        try {
            res.json(service.cancel(jobIdOf(req)));
        } catch (error) {
            handleError(res, error);
        }
    });

    return router;
}
